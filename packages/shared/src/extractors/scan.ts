/**
 * Text scanning helpers shared by the rules: global regex iteration,
 * entity capture after a label, and segment splitting.
 */

import type { NormalizedText, TextSpan } from '../types';

export interface ScanMatch {
  text: string;
  groups: ReadonlyArray<string | undefined>;
  start: number;
  end: number;
}

/**
 * All matches of `pattern` in `source`; the pattern must carry the g flag.
 */
export function scanAll(pattern: RegExp, source: string): ScanMatch[] {
  const regex = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
  const matches: ScanMatch[] = [];
  let m: RegExpExecArray | null;
  while ((m = regex.exec(source)) !== null) {
    if (m[0].length === 0) {
      regex.lastIndex++;
      continue;
    }
    matches.push({ text: m[0], groups: Array.from(m), start: m.index, end: m.index + m[0].length });
  }
  return matches;
}

export interface CaptureOptions {
  maxTokens: number;
  stopWords: ReadonlySet<string>;
}

export interface CapturedEntity {
  value: string;
  span: TextSpan;
}

const LEADING_PUNCTUATION = /^[:\-–—(\["']+/;
const TRAILING_PUNCTUATION = /[.,;:)\]"']+$/;

/**
 * Collect up to `maxTokens` words starting at `from`, stopping at a stop
 * word, a token with digits, or after a token that ends in punctuation.
 */
export function captureEntity(
  text: NormalizedText,
  from: number,
  options: CaptureOptions
): CapturedEntity | null {
  const tokens = /\S+/g;
  tokens.lastIndex = from;

  const collected: TextSpan[] = [];
  let m: RegExpExecArray | null;

  while ((m = tokens.exec(text.matching)) !== null) {
    let start = m.index;
    let token = m[0];

    const leading = token.match(LEADING_PUNCTUATION);
    if (leading) {
      if (collected.length > 0) break;
      start += leading[0].length;
      token = token.slice(leading[0].length);
    }

    const core = token.replace(TRAILING_PUNCTUATION, '');
    const endsClause = core.length < token.length;

    if (!core) {
      if (collected.length > 0) break;
      continue;
    }
    if (options.stopWords.has(core) || /\d/.test(core)) break;

    collected.push({ start, end: start + core.length });
    if (endsClause || collected.length >= options.maxTokens) break;
  }

  if (collected.length === 0) return null;

  const span = { start: collected[0].start, end: collected[collected.length - 1].end };
  return { value: text.display.slice(span.start, span.end), span };
}

const SEGMENT_SEPARATOR = /\s+[-–—|]\s+|[;|,]\s*|\.\s+/g;

/**
 * Split the text on list separators (" - ", ",", ";", "|", sentence ends).
 */
export function splitSegments(text: NormalizedText): TextSpan[] {
  const segments: TextSpan[] = [];
  let cursor = 0;
  for (const sep of scanAll(SEGMENT_SEPARATOR, text.matching)) {
    if (sep.start > cursor) segments.push({ start: cursor, end: sep.start });
    cursor = sep.end;
  }
  if (cursor < text.matching.length) segments.push({ start: cursor, end: text.matching.length });
  return segments;
}

/**
 * Whitespace tokens inside a span, with offsets.
 */
export function tokensIn(text: NormalizedText, span: TextSpan): TextSpan[] {
  const slice = text.matching.slice(span.start, span.end);
  return scanAll(/\S+/g, slice).map((t) => ({ start: span.start + t.start, end: span.start + t.end }));
}
