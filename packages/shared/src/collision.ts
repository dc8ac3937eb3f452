/**
 * Collision Resolver
 *
 * Keeps the set of file names already assigned in a target area and hands
 * out unique ones. Owned by the single commit cursor of a batch, so a claim
 * is checked and recorded in one step.
 */

import type { CanonicalName } from './types';
import { fileName } from './types';
import type { CollisionStrategy } from './policy';
import { truncateBase } from './naming';
import { CollisionResolutionExhaustedError } from './errors';
import { logger } from './logger';

export interface AssignedNamesOptions {
  strategy: CollisionStrategy;
  maxAttempts: number;
  maxNameLength: number;
}

/** Suffix for the n-th collision: "_1", "_2" or "_v2", "_v3" */
export function collisionSuffix(strategy: CollisionStrategy, attempt: number): string {
  return strategy === 'version' ? `_v${attempt + 1}` : `_${attempt}`;
}

export class AssignedNames {
  /** Names already present in the area before this run */
  private readonly seeded = new Set<string>();
  /** Names handed out during this run */
  private readonly claimed = new Set<string>();

  constructor(
    private readonly options: AssignedNamesOptions,
    existing: Iterable<string> = []
  ) {
    for (const name of existing) {
      this.seeded.add(AssignedNames.key(name));
    }
  }

  /** File systems we target compare names case-insensitively. */
  static key(name: string): string {
    return name.normalize('NFC').toLowerCase();
  }

  get size(): number {
    let size = this.seeded.size;
    for (const key of this.claimed) {
      if (!this.seeded.has(key)) size++;
    }
    return size;
  }

  has(name: string): boolean {
    const key = AssignedNames.key(name);
    return this.seeded.has(key) || this.claimed.has(key);
  }

  /**
   * Claim a name, disambiguating it when already taken. `ownName` is the
   * document's current file name in the same area: a document may keep it
   * unless another document already claimed it in this run.
   *
   * @throws CollisionResolutionExhaustedError when no suffix is free
   */
  claim(name: CanonicalName, ownName?: string): CanonicalName {
    const requested = fileName(name);
    const key = AssignedNames.key(requested);
    const keepsOwn =
      ownName !== undefined && AssignedNames.key(ownName) === key && this.seeded.has(key) && !this.claimed.has(key);

    if (!this.has(requested) || keepsOwn) {
      this.claimed.add(key);
      return name;
    }

    const { strategy, maxAttempts, maxNameLength } = this.options;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const suffix = collisionSuffix(strategy, attempt);
      const base = `${truncateBase(name.base_name, maxNameLength - suffix.length)}${suffix}`;
      const candidate = `${base}${name.extension}`;

      if (!this.has(candidate)) {
        this.claimed.add(AssignedNames.key(candidate));
        logger.debug('Name collision resolved', { requested, assigned: candidate, attempt });
        return Object.freeze({ base_name: base, extension: name.extension, is_disambiguated: true });
      }
    }

    throw new CollisionResolutionExhaustedError(requested, maxAttempts);
  }
}
