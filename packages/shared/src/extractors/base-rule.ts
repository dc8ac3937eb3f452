/**
 * Base Extraction Rules
 *
 * Abstract base class plus the three reusable rule shapes: keyword
 * dictionaries, regular patterns and label-anchored entities.
 */

import type { FieldName, NormalizedText, RuleKind } from '../types';
import type { ExtractionRule, RuleId, RuleMatch } from './types';
import { getRuleWeight } from '../rule-weights';
import { captureEntity, scanAll, type ScanMatch } from './scan';
import { KEYWORDS, wordPattern } from './keywords';
import { logger } from '../logger';

/**
 * Abstract base class for extraction rules.
 * Guarantees that a misbehaving matcher yields no candidates instead of
 * failing the document.
 */
export abstract class BaseRule implements ExtractionRule {
  abstract readonly id: RuleId;
  abstract readonly kind: RuleKind;
  abstract readonly field: FieldName;
  abstract readonly priority: number;
  abstract readonly description: string;

  get weight(): number {
    return getRuleWeight(this.id);
  }

  match(text: NormalizedText): RuleMatch[] {
    if (!text.matching) return [];

    try {
      return this.findMatches(text);
    } catch (error) {
      logger.warn('Extraction rule failed, yielding no candidates', {
        rule_id: this.id,
        field: this.field,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  protected abstract findMatches(text: NormalizedText): RuleMatch[];
}

interface RuleIdentity {
  id: RuleId;
  field: FieldName;
  priority: number;
  description: string;
}

// ============================================================================
// Keyword rules
// ============================================================================

export interface KeywordRuleDefinition extends RuleIdentity {
  keywords: readonly string[];
  /** Maps the upper-cased hit to its canonical form */
  canonicalize?: (hit: string) => string;
  /** Acronyms only count when written in capitals */
  requireUppercase?: boolean;
  /** Only hits starting before this offset */
  withinFirst?: number;
  firstOnly?: boolean;
}

export class KeywordRule extends BaseRule {
  readonly id: RuleId;
  readonly kind: RuleKind = 'keyword';
  readonly field: FieldName;
  readonly priority: number;
  readonly description: string;

  private readonly pattern: RegExp;
  private readonly definition: KeywordRuleDefinition;

  constructor(definition: KeywordRuleDefinition) {
    super();
    this.id = definition.id;
    this.field = definition.field;
    this.priority = definition.priority;
    this.description = definition.description;
    this.pattern = wordPattern(definition.keywords);
    this.definition = definition;
  }

  protected findMatches(text: NormalizedText): RuleMatch[] {
    const { canonicalize, requireUppercase, withinFirst, firstOnly } = this.definition;
    const matches: RuleMatch[] = [];

    for (const hit of scanAll(this.pattern, text.matching)) {
      if (withinFirst !== undefined && hit.start >= withinFirst) break;

      const value = text.display.slice(hit.start, hit.end);
      if (requireUppercase && value !== value.toUpperCase()) continue;

      const upper = value.toUpperCase();
      matches.push({
        value,
        canonical: canonicalize ? canonicalize(upper) : upper,
        span: { start: hit.start, end: hit.end },
      });
      if (firstOnly) break;
    }

    return matches;
  }
}

// ============================================================================
// Pattern rules
// ============================================================================

export interface PatternRuleDefinition extends RuleIdentity {
  kind?: Extract<RuleKind, 'pattern' | 'date'>;
  /** Applied to the lower-cased matching copy; must carry the g flag */
  pattern: RegExp;
  /** Turn a raw match into a rule match, or null to reject it */
  build: (match: ScanMatch, text: NormalizedText) => RuleMatch | null;
}

export class PatternRule extends BaseRule {
  readonly id: RuleId;
  readonly kind: RuleKind;
  readonly field: FieldName;
  readonly priority: number;
  readonly description: string;

  private readonly definition: PatternRuleDefinition;

  constructor(definition: PatternRuleDefinition) {
    super();
    this.id = definition.id;
    this.kind = definition.kind ?? 'pattern';
    this.field = definition.field;
    this.priority = definition.priority;
    this.description = definition.description;
    this.definition = definition;
  }

  protected findMatches(text: NormalizedText): RuleMatch[] {
    const matches: RuleMatch[] = [];
    for (const hit of scanAll(this.definition.pattern, text.matching)) {
      const built = this.definition.build(hit, text);
      if (built) matches.push(built);
    }
    return matches;
  }
}

// ============================================================================
// Entity rules
// ============================================================================

export interface EntityRuleDefinition extends RuleIdentity {
  labels: readonly string[];
  maxTokens?: number;
  stopWords?: ReadonlySet<string>;
}

/**
 * Captures the words right after a label, e.g. "Fazenda Contendas" → "Contendas".
 */
export class EntityRule extends BaseRule {
  readonly id: RuleId;
  readonly kind: RuleKind = 'entity';
  readonly field: FieldName;
  readonly priority: number;
  readonly description: string;

  private readonly pattern: RegExp;
  private readonly maxTokens: number;
  private readonly stopWords: ReadonlySet<string>;

  constructor(definition: EntityRuleDefinition) {
    super();
    this.id = definition.id;
    this.field = definition.field;
    this.priority = definition.priority;
    this.description = definition.description;
    this.pattern = wordPattern(definition.labels);
    this.maxTokens = definition.maxTokens ?? 3;
    this.stopWords = definition.stopWords ?? KEYWORDS.entityStopWords;
  }

  protected findMatches(text: NormalizedText): RuleMatch[] {
    const matches: RuleMatch[] = [];
    for (const label of scanAll(this.pattern, text.matching)) {
      const entity = captureEntity(text, label.end, {
        maxTokens: this.maxTokens,
        stopWords: this.stopWords,
      });
      if (entity) {
        matches.push({ value: entity.value, canonical: entity.value, span: entity.span });
      }
    }
    return matches;
  }
}
