/**
 * Date and Issue Year Rules
 *
 * Dates are canonicalized to ISO (yyyy-mm-dd); the synthesizer applies the
 * policy's date format. Impossible calendar dates are rejected.
 */

import { BaseRule, PatternRule } from '../base-rule';
import { KEYWORDS, escapeRegExp } from '../keywords';
import { scanAll, type ScanMatch } from '../scan';
import type { FieldName, NormalizedText, RuleKind } from '../../types';
import type { RuleId, RuleMatch } from '../types';

const NUMERIC_DATE = /(?<![\d/.-])(\d{1,2})([/.-])(\d{1,2})\2(\d{4})(?![\d/]|[.-]\d)/g;

const WRITTEN_DATE = new RegExp(
  `(?<!\\d)(\\d{1,2})o?\\s+de\\s+(${KEYWORDS.months.map(escapeRegExp).join('|')})\\s+de\\s+(\\d{4})(?!\\d)`,
  'g'
);

const ISO_DATE = /(?<![\d/.-])(\d{4})-(\d{2})-(\d{2})(?![\d/]|[.-]\d)/g;

const STANDALONE_YEAR = /(?<![\w/.-])(?:19|20)\d{2}(?![\w/]|[.-]\d)/g;

export function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function toIso(year: string, month: string, day: string): string | null {
  const y = parseInt(year, 10);
  const m = parseInt(month, 10);
  const d = parseInt(day, 10);
  if (!isCalendarDate(y, m, d)) return null;
  return `${year}-${String(m).padStart(2, '0')}-${String(d).padStart(2, '0')}`;
}

function dateMatch(match: ScanMatch, text: NormalizedText, iso: string | null): RuleMatch | null {
  if (!iso) return null;
  return {
    value: text.display.slice(match.start, match.end),
    canonical: iso,
    span: { start: match.start, end: match.end },
  };
}

function parseNumeric(match: ScanMatch): string | null {
  const [, day, , month, year] = match.groups;
  return day && month && year ? toIso(year, month, day) : null;
}

function parseWritten(match: ScanMatch): string | null {
  const [, day, monthName, year] = match.groups;
  if (!day || !monthName || !year) return null;
  const month = KEYWORDS.months.indexOf(monthName) + 1;
  return month > 0 ? toIso(year, String(month), day) : null;
}

function parseIso(match: ScanMatch): string | null {
  const [, year, month, day] = match.groups;
  return year && month && day ? toIso(year, month, day) : null;
}

export const numericDateRule = new PatternRule({
  id: 'date.numeric',
  kind: 'date',
  field: 'date',
  priority: 10,
  description: 'Numeric date dd/mm/yyyy (also - and . separators)',
  pattern: NUMERIC_DATE,
  build: (match, text) => dateMatch(match, text, parseNumeric(match)),
});

export const writtenDateRule = new PatternRule({
  id: 'date.written',
  kind: 'date',
  field: 'date',
  priority: 20,
  description: 'Written date "10 de março de 2024"',
  pattern: WRITTEN_DATE,
  build: (match, text) => dateMatch(match, text, parseWritten(match)),
});

export const isoDateRule = new PatternRule({
  id: 'date.iso',
  kind: 'date',
  field: 'date',
  priority: 30,
  description: 'ISO date yyyy-mm-dd',
  pattern: ISO_DATE,
  build: (match, text) => dateMatch(match, text, parseIso(match)),
});

/**
 * Year of every valid date in the text, located at the date's span.
 */
export class IssueYearFromDateRule extends BaseRule {
  readonly id: RuleId = 'issue-year.from-date';
  readonly kind: RuleKind = 'date';
  readonly field: FieldName = 'issue_year';
  readonly priority = 10;
  readonly description = 'Year taken from a recognized date';

  protected findMatches(text: NormalizedText): RuleMatch[] {
    const parsers: Array<[RegExp, (m: ScanMatch) => string | null]> = [
      [NUMERIC_DATE, parseNumeric],
      [WRITTEN_DATE, parseWritten],
      [ISO_DATE, parseIso],
    ];

    const matches: RuleMatch[] = [];
    for (const [pattern, parse] of parsers) {
      for (const hit of scanAll(pattern, text.matching)) {
        const iso = parse(hit);
        if (!iso) continue;
        matches.push({
          value: text.display.slice(hit.start, hit.end),
          canonical: iso.slice(0, 4),
          span: { start: hit.start, end: hit.end },
        });
      }
    }
    return matches;
  }
}

export const issueYearFromDateRule = new IssueYearFromDateRule();

export const issueYearStandaloneRule = new PatternRule({
  id: 'issue-year.standalone',
  field: 'issue_year',
  priority: 20,
  description: 'Four digit year outside any date',
  pattern: STANDALONE_YEAR,
  build: (match, text) => ({
    value: text.display.slice(match.start, match.end),
    canonical: match.text,
    span: { start: match.start, end: match.end },
  }),
});

export const dateRules = [numericDateRule, writtenDateRule, isoDateRule, issueYearFromDateRule, issueYearStandaloneRule];
