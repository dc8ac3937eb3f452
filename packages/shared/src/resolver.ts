/**
 * Context Resolver
 *
 * Merges competing candidates into one value per field. Pure: the same
 * candidates always resolve to the same context.
 */

import type { DocumentContext, FieldCandidate, FieldName, ResolvedField } from './types';
import { deepFreeze, roundConfidence } from './utils';

export interface ResolveOptions {
  requiredFields: readonly FieldName[];
  /** Position of each rule id in the rule set; lower wins ties */
  ruleOrder: ReadonlyMap<string, number>;
  unknownValue: string;
  template: string;
}

function spanLength(candidate: FieldCandidate): number {
  return candidate.span.end - candidate.span.start;
}

/**
 * Total order over candidates of one field: higher confidence, then longer
 * span, then earlier rule, then earlier position in the text.
 */
export function compareCandidates(
  a: FieldCandidate,
  b: FieldCandidate,
  ruleOrder: ReadonlyMap<string, number>
): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;

  const length = spanLength(b) - spanLength(a);
  if (length !== 0) return length;

  const rank = (ruleOrder.get(a.rule_id) ?? -1) - (ruleOrder.get(b.rule_id) ?? -1);
  if (rank !== 0) return rank;

  return a.span.start - b.span.start;
}

/**
 * Pick the winning candidate per field.
 */
export function selectWinners(
  candidates: readonly FieldCandidate[],
  ruleOrder: ReadonlyMap<string, number>
): Map<FieldName, FieldCandidate> {
  const winners = new Map<FieldName, FieldCandidate>();
  for (const candidate of candidates) {
    const current = winners.get(candidate.field);
    if (!current || compareCandidates(candidate, current, ruleOrder) < 0) {
      winners.set(candidate.field, candidate);
    }
  }
  return winners;
}

/**
 * Build the DocumentContext for one document.
 * Missing required fields get the unknown value at zero confidence; the
 * overall confidence is the weakest required field.
 */
export function resolveContext(
  documentId: string,
  candidates: readonly FieldCandidate[],
  options: ResolveOptions
): DocumentContext {
  const winners = selectWinners(candidates, options.ruleOrder);
  const fields: Partial<Record<FieldName, ResolvedField>> = {};
  const fieldConfidences: Partial<Record<FieldName, number>> = {};

  for (const [field, winner] of winners) {
    fields[field] = {
      value: winner.value,
      canonical: winner.canonical,
      confidence: winner.confidence,
      rule_id: winner.rule_id,
      span: { ...winner.span },
    };
    fieldConfidences[field] = winner.confidence;
  }

  for (const field of options.requiredFields) {
    if (fields[field]) continue;
    fields[field] = {
      value: options.unknownValue,
      canonical: options.unknownValue,
      confidence: 0,
      rule_id: null,
      span: null,
    };
    fieldConfidences[field] = 0;
  }

  const required = options.requiredFields.map((field) => fieldConfidences[field] ?? 0);
  const overall = required.length > 0 ? Math.min(...required) : 0;

  return deepFreeze<DocumentContext>({
    document_id: documentId,
    fields,
    field_confidences: fieldConfidences,
    required_fields: [...options.requiredFields],
    overall_confidence: roundConfidence(overall),
    template: options.template,
  });
}
