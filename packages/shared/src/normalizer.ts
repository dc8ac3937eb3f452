/**
 * Text Normalizer
 *
 * Turns raw OCR blocks into the canonical text every extraction rule reads.
 * `display` keeps the original case, `matching` is a lower-cased copy of the
 * same length so spans found in one index the other.
 */

import { InvalidInputError } from './errors';
import type { NormalizedBlock, NormalizedText, RawOcrResult, TextSpan } from './types';
import { clampConfidence } from './utils';

/** UTF-8 text decoded as Latin-1 by the OCR engine or a PDF text layer. */
const MOJIBAKE_FIXES: ReadonlyArray<readonly [string, string]> = [
  ['\u00C3\u00A1', '\u00E1'], // á
  ['\u00C3\u00A2', '\u00E2'], // â
  ['\u00C3\u00A3', '\u00E3'], // ã
  ['\u00C3\u00A7', '\u00E7'], // ç
  ['\u00C3\u00A9', '\u00E9'], // é
  ['\u00C3\u00AA', '\u00EA'], // ê
  ['\u00C3\u00AD', '\u00ED'], // í
  ['\u00C3\u00B3', '\u00F3'], // ó
  ['\u00C3\u00B4', '\u00F4'], // ô
  ['\u00C3\u00B5', '\u00F5'], // õ
  ['\u00C3\u00BA', '\u00FA'], // ú
  ['\u00C3\u0087', '\u00C7'], // Ç
  ['\u00C3\u0089', '\u00C9'], // É
  ['\u00C2\u00BA', '\u00BA'], // º
  ['\u00C2\u00AA', '\u00AA'], // ª
  ['\u00C2\u00B0', '\u00B0'], // °
];

const COMBINING_MARKS = /\p{M}/gu;
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\u200B-\u200D\uFEFF\uFFFD]/g;
const WHITESPACE_RUN = /\s+/g;

function fixMojibake(value: string): string {
  let fixed = value;
  for (const [broken, repaired] of MOJIBAKE_FIXES) {
    if (fixed.includes(broken)) {
      fixed = fixed.split(broken).join(repaired);
    }
  }
  return fixed;
}

/**
 * Canonical display form: mojibake repaired, accents stripped, control
 * characters removed, whitespace collapsed. Idempotent.
 */
export function normalizeText(value: string): string {
  return fixMojibake(value)
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .replace(CONTROL_CHARS, '')
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * Lower-case `display` code point by code point, keeping any character whose
 * lower-case form has a different length so offsets stay aligned.
 */
export function toMatchingCase(display: string): string {
  let matching = '';
  for (const ch of display) {
    const lower = ch.toLowerCase();
    matching += lower.length === ch.length ? lower : ch;
  }
  return matching;
}

/**
 * Engines report either 0–1 or 0–100; anything above 1 is read as a percentage.
 */
function blockConfidence(confidence: number | undefined, neutral: number): number {
  if (confidence === undefined || Number.isNaN(confidence)) return neutral;
  return clampConfidence(confidence > 1 ? confidence / 100 : confidence);
}

/**
 * Normalize a RawOcrResult into NormalizedText.
 *
 * @throws InvalidInputError when no block holds any text, including a
 * result without a blocks array
 */
export function normalizeOcrResult(raw: RawOcrResult, neutralConfidence: number): NormalizedText {
  const parts: string[] = [];
  const blocks: NormalizedBlock[] = [];
  let offset = 0;

  const rawBlocks = Array.isArray(raw.blocks) ? raw.blocks : [];
  for (const block of rawBlocks) {
    if (typeof block !== 'object' || block === null || typeof block.text !== 'string') continue;
    const text = normalizeText(block.text);
    if (!text) continue;

    if (parts.length > 0) offset += 1; // joining space
    blocks.push({
      start: offset,
      end: offset + text.length,
      confidence: blockConfidence(typeof block.confidence === 'number' ? block.confidence : undefined, neutralConfidence),
    });
    parts.push(text);
    offset += text.length;
  }

  if (parts.length === 0) {
    throw new InvalidInputError('OCR result holds no text', {
      source_path: raw.source_path,
      engine: raw.engine,
    });
  }

  const display = parts.join(' ');
  return Object.freeze({
    display,
    matching: toMatchingCase(display),
    blocks: Object.freeze(blocks.map((b) => Object.freeze(b))),
  });
}

/** The degraded value used when OCR produced no text. */
export function emptyNormalizedText(): NormalizedText {
  return Object.freeze({ display: '', matching: '', blocks: Object.freeze([]) });
}

/**
 * Lowest OCR block confidence under a span; 1.0 when the span touches no
 * block (e.g. candidates injected from configuration).
 */
export function ocrConfidenceAt(text: NormalizedText, span: TextSpan): number {
  let lowest: number | null = null;
  for (const block of text.blocks) {
    if (block.start < span.end && span.start < block.end) {
      lowest = lowest === null ? block.confidence : Math.min(lowest, block.confidence);
    }
  }
  return lowest ?? 1;
}
