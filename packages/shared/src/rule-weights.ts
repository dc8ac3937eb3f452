/**
 * Default confidence weight per extraction rule.
 * A labeled match ("Contrato Nº: 123") outranks a bare number anywhere in
 * the text. Policies may override any of these per batch.
 */

import type { RuleId } from './extractors/types';

/** Weight per rule id (0.0–1.0). */
export const RULE_WEIGHTS: Record<RuleId, number> = {
  // Document type
  'document-type.heading': 0.95,
  'document-type.keyword': 0.6,
  'environmental-document.acronym': 0.85,
  // Reference number
  'reference-number.labeled': 0.95,
  'reference-number.bare': 0.7,
  // Dates
  'date.numeric': 0.95,
  'date.written': 0.9,
  'date.iso': 0.9,
  'issue-year.from-date': 0.9,
  'issue-year.standalone': 0.7,
  // Parties
  'party.labeled': 0.85,
  'party.company': 0.8,
  'owner.labeled': 0.8,
  'farm.labeled': 0.75,
  'partner.labeled': 0.75,
  'fund.labeled': 0.8,
  'spe.labeled': 0.8,
  // Codes
  'contract-type.code': 0.85,
  'document-title.code': 0.8,
  'identity-document.keyword': 0.7,
  // Business context
  'business-context.funds': 0.65,
  'business-context.market': 0.6,
};

export function isRuleId(value: string): value is RuleId {
  return Object.prototype.hasOwnProperty.call(RULE_WEIGHTS, value);
}

export function getRuleWeight(ruleId: RuleId): number {
  return RULE_WEIGHTS[ruleId];
}
