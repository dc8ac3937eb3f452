/**
 * Field Extraction
 *
 * Runs every rule of a RuleSet independently over the normalized text and
 * turns matches into weighted candidates. Competing candidates for the same
 * field are all kept; choosing between them is the resolver's job.
 */

import type { FieldCandidate, NormalizedText } from '../types';
import type { ConfiguredRule, RuleSet } from './types';
import { CONTEXT_HINT_RULE_ID } from './types';
import type { BusinessContext } from './business-context';
import { ocrConfidenceAt } from '../normalizer';
import { clampConfidence, roundConfidence } from '../utils';
import { logger } from '../logger';

export interface ExtractOptions {
  /** Business context forced by the policy; always wins over keywords */
  contextHint?: BusinessContext | null;
}

function runRule(text: NormalizedText, entry: ConfiguredRule): FieldCandidate[] {
  const { rule, weight } = entry;

  try {
    return rule.match(text).map((match) => ({
      field: rule.field,
      value: match.value,
      canonical: match.canonical,
      confidence: roundConfidence(clampConfidence(weight * ocrConfidenceAt(text, match.span))),
      span: match.span,
      rule_id: rule.id,
    }));
  } catch (error) {
    logger.warn('Extraction rule failed, yielding no candidates', {
      rule_id: rule.id,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}

/**
 * Extract every field candidate from the text.
 */
export function extractFields(
  text: NormalizedText,
  ruleSet: RuleSet,
  options: ExtractOptions = {}
): FieldCandidate[] {
  const candidates: FieldCandidate[] = [];

  for (const entry of ruleSet) {
    candidates.push(...runRule(text, entry));
  }

  if (options.contextHint) {
    candidates.push({
      field: 'business_context',
      value: options.contextHint,
      canonical: options.contextHint,
      confidence: 1,
      span: { start: 0, end: 0 },
      rule_id: CONTEXT_HINT_RULE_ID,
    });
  }

  logger.debug('Fields extracted', {
    candidates: candidates.length,
    fields: Array.from(new Set(candidates.map((c) => c.field))),
  });

  return candidates;
}
