/**
 * Extraction Rule Types
 *
 * Every rule is a tagged variant {kind, field, priority, weight} with a
 * matcher over NormalizedText. Rules run independently; merging competing
 * candidates is the resolver's job.
 */

import type { FieldName, NormalizedText, RuleKind, TextSpan } from '../types';

export type RuleId =
  | 'document-type.heading'
  | 'document-type.keyword'
  | 'environmental-document.acronym'
  | 'reference-number.labeled'
  | 'reference-number.bare'
  | 'date.numeric'
  | 'date.written'
  | 'date.iso'
  | 'issue-year.from-date'
  | 'issue-year.standalone'
  | 'party.labeled'
  | 'party.company'
  | 'contract-type.code'
  | 'document-title.code'
  | 'identity-document.keyword'
  | 'farm.labeled'
  | 'partner.labeled'
  | 'fund.labeled'
  | 'spe.labeled'
  | 'owner.labeled'
  | 'business-context.funds'
  | 'business-context.market';

/** Candidate id used for the business context forced by the policy. */
export const CONTEXT_HINT_RULE_ID = 'business-context.hint';

/**
 * One hit of a rule, before it is weighted into a FieldCandidate.
 */
export interface RuleMatch {
  /** Text as found in the display copy */
  value: string;
  /** Naming form of the value */
  canonical: string;
  span: TextSpan;
}

/**
 * Interface for field extraction rules.
 */
export interface ExtractionRule {
  readonly id: RuleId;
  readonly kind: RuleKind;
  readonly field: FieldName;
  /** Lower runs (and wins ties) first */
  readonly priority: number;
  /** Default confidence weight, 0.0–1.0, reflecting rule specificity */
  readonly weight: number;
  readonly description: string;

  /**
   * Find every match in the text. Never throws.
   */
  match(text: NormalizedText): RuleMatch[];
}

/**
 * A rule as configured for one batch: policy may override its weight.
 */
export interface ConfiguredRule {
  readonly rule: ExtractionRule;
  readonly weight: number;
}

export type RuleSet = readonly ConfiguredRule[];

export interface RuleSetOptions {
  disabled?: readonly string[];
  weights?: Readonly<Record<string, number>>;
}
