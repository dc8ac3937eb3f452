/**
 * Document Lifecycle
 *
 * RECEIVED → NORMALIZED → EXTRACTED → RESOLVED → NAMED → terminal.
 * Any non-terminal state may fail.
 */

import type { Decision, DocumentState } from './types';

const TRANSITIONS: Record<DocumentState, readonly DocumentState[]> = {
  RECEIVED: ['NORMALIZED', 'FAILED'],
  NORMALIZED: ['EXTRACTED', 'FAILED'],
  EXTRACTED: ['RESOLVED', 'FAILED'],
  RESOLVED: ['NAMED', 'FAILED'],
  NAMED: ['AUTO_RENAMED', 'FLAGGED', 'FAILED'],
  AUTO_RENAMED: [],
  FLAGGED: [],
  FAILED: [],
};

export function canTransition(from: DocumentState, to: DocumentState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: DocumentState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function terminalStateFor(decision: Decision): DocumentState {
  switch (decision) {
    case 'AUTO_RENAMED':
      return 'AUTO_RENAMED';
    case 'FLAGGED_FOR_REVIEW':
      return 'FLAGGED';
    case 'FAILED':
      return 'FAILED';
  }
}

export class DocumentLifecycle {
  private readonly visited: DocumentState[] = ['RECEIVED'];

  get current(): DocumentState {
    return this.visited[this.visited.length - 1];
  }

  get states(): readonly DocumentState[] {
    return [...this.visited];
  }

  get isTerminal(): boolean {
    return isTerminalState(this.current);
  }

  advance(next: DocumentState): this {
    if (!canTransition(this.current, next)) {
      throw new Error(`Invalid document state transition: ${this.current} -> ${next}`);
    }
    this.visited.push(next);
    return this;
  }
}
