/**
 * Reference Number Rules
 */

import { PatternRule } from '../base-rule';
import type { ScanMatch } from '../scan';
import type { NormalizedText } from '../../types';
import type { RuleMatch } from '../types';

// "Nº 123", "n. 45/2023", "número: 7". Not "no 10 de março" (a date) and not
// a number that continues into a longer token.
const LABELED_NUMBER =
  /(?<![\w])(?:n[o°]?\.?|num\.?|numero)\s*[:.]?\s*(\d+(?:[/-]\d+)?)(?!\d|[/.-]\d|\s+de\s)/g;

// Standalone 5 to 8 digit number (protocols, registrations)
const BARE_NUMBER = /(?<![\w/.,-])\d{5,8}(?!\w|[/.,-]\d)/g;

function trailingGroup(match: ScanMatch, text: NormalizedText, group: string): RuleMatch {
  const end = match.end;
  const start = end - group.length;
  return { value: text.display.slice(start, end), canonical: group, span: { start, end } };
}

export const referenceNumberLabeledRule = new PatternRule({
  id: 'reference-number.labeled',
  field: 'reference_number',
  priority: 10,
  description: 'Number after a "Nº" or "número" label',
  pattern: LABELED_NUMBER,
  build: (match, text) => {
    const number = match.groups[1];
    return number ? trailingGroup(match, text, number) : null;
  },
});

export const referenceNumberBareRule = new PatternRule({
  id: 'reference-number.bare',
  field: 'reference_number',
  priority: 20,
  description: 'Unlabeled 5 to 8 digit number',
  pattern: BARE_NUMBER,
  build: (match, text) => trailingGroup(match, text, match.text),
});

export const referenceNumberRules = [referenceNumberLabeledRule, referenceNumberBareRule];
