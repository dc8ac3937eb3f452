/**
 * Name Synthesizer
 *
 * Renders a DocumentContext into a filesystem-safe CanonicalName through the
 * policy's template. Pure and deterministic; uniqueness is the collision
 * resolver's concern.
 */

import path from 'path';
import type { CanonicalName, DocumentContext, FieldName, ResolvedField } from './types';
import { isFieldName } from './types';
import type { NamingPolicy, TemplateVariant } from './policy';
import { normalizeText } from './normalizer';
import { escapeRegExp } from './extractors/keywords';
import { PolicyMisconfigurationError } from './errors';

export type TemplateSegment = { kind: 'literal'; text: string } | { kind: 'field'; name: string };

export interface ParsedTemplate {
  template: string;
  segments: TemplateSegment[];
  /** Placeholder names in order of first appearance */
  placeholders: string[];
}

const PLACEHOLDER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const UNSAFE_CHARS = /[<>:"/\\|?*\u0000-\u001F]/g;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Split a template like "{document_type}_{date}" into literal and field
 * segments.
 *
 * @throws PolicyMisconfigurationError on malformed braces
 */
export function parseTemplate(template: string): ParsedTemplate {
  const segments: TemplateSegment[] = [];
  const placeholders: string[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf('{', cursor);
    const stray = template.indexOf('}', cursor);
    if (stray !== -1 && (open === -1 || stray < open)) {
      throw new PolicyMisconfigurationError([`template "${template}" has an unmatched "}"`]);
    }
    if (open === -1) {
      segments.push({ kind: 'literal', text: template.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ kind: 'literal', text: template.slice(cursor, open) });
    }

    const close = template.indexOf('}', open + 1);
    if (close === -1) {
      throw new PolicyMisconfigurationError([`template "${template}" has an unclosed placeholder`]);
    }

    const name = template.slice(open + 1, close).trim();
    if (!PLACEHOLDER_NAME.test(name)) {
      throw new PolicyMisconfigurationError([`template "${template}" has an invalid placeholder "{${name}}"`]);
    }

    segments.push({ kind: 'field', name });
    if (!placeholders.includes(name)) placeholders.push(name);
    cursor = close + 1;
  }

  return { template, segments, placeholders };
}

export interface SelectedTemplate {
  /** Variant name, or "default" */
  name: string;
  template: string;
}

function variantApplies(variant: TemplateVariant, found: ReadonlyMap<FieldName, string>): boolean {
  if (!variant.when_fields.every((field) => found.has(field))) return false;
  return Object.entries(variant.when_values).every(
    ([field, expected]) => isFieldName(field) && found.get(field) === expected
  );
}

/**
 * First variant whose when_fields were all found and whose when_values match
 * the winning value of their field; otherwise the default template.
 *
 * @param found winning canonical value per field found in the document
 */
export function selectTemplate(policy: NamingPolicy, found: ReadonlyMap<FieldName, string>): SelectedTemplate {
  const variant = policy.variants.find((v) => variantApplies(v, found));
  return variant ? { name: variant.name, template: variant.template } : { name: 'default', template: policy.template };
}

/**
 * Fields whose confidence gates the decision for a template.
 */
export function requiredFieldsFor(policy: NamingPolicy, template: string): FieldName[] {
  if (policy.required_fields) return [...policy.required_fields];
  return parseTemplate(template).placeholders.filter(isFieldName);
}

export interface SlugOptions {
  case: NamingPolicy['case'];
  word_separator: string;
}

/**
 * Accents stripped, case applied, every run of other characters replaced by
 * the word separator. "Empresa XYZ" → "empresa-xyz".
 */
export function slugify(value: string, options: SlugOptions): string {
  let slug = normalizeText(value);
  if (options.case === 'lower') slug = slug.toLowerCase();
  if (options.case === 'upper') slug = slug.toUpperCase();

  const separator = options.word_separator;
  slug = slug.replace(/[^A-Za-z0-9]+/g, separator);
  if (separator) {
    const edges = new RegExp(`^(?:${escapeRegExp(separator)})+|(?:${escapeRegExp(separator)})+$`, 'g');
    slug = slug.replace(edges, '');
  }
  return slug;
}

export function formatDate(iso: string, format: NamingPolicy['date_format']): string | null {
  const m = ISO_DATE.exec(iso);
  if (!m) return null;
  return format === 'compact' ? `${m[1]}${m[2]}${m[3]}` : `${m[1]}-${m[2]}-${m[3]}`;
}

function unknownSlug(policy: NamingPolicy): string {
  return slugify(policy.unknown_value, { case: 'preserve', word_separator: policy.word_separator });
}

function renderField(field: FieldName, resolved: ResolvedField | undefined, policy: NamingPolicy): string {
  if (!resolved || resolved.rule_id === null) return unknownSlug(policy);

  if (field === 'date') {
    const date = formatDate(resolved.canonical, policy.date_format);
    if (date) return date;
  }

  return slugify(resolved.canonical, policy) || unknownSlug(policy);
}

function cleanLiteral(text: string): string {
  return text.replace(UNSAFE_CHARS, '').replace(/\s+/g, '_');
}

/**
 * Cut the base name to `maxLength`, never leaving a trailing separator.
 */
export function truncateBase(base: string, maxLength: number): string {
  const cut = base.length > maxLength ? base.slice(0, maxLength) : base;
  return cut.replace(/[-_.\s]+$/, '');
}

/**
 * Lower-cased extension of a path, including the dot.
 */
export function extensionOf(sourcePath: string): string {
  return path.extname(sourcePath).toLowerCase();
}

/**
 * Render the canonical name of a resolved document.
 */
export function synthesizeName(context: DocumentContext, policy: NamingPolicy, extension: string): CanonicalName {
  const parsed = parseTemplate(context.template);

  const rendered = parsed.segments
    .map((segment) => {
      if (segment.kind === 'literal') return cleanLiteral(segment.text);
      if (!isFieldName(segment.name)) return unknownSlug(policy);
      return renderField(segment.name, context.fields[segment.name], policy);
    })
    .join('');

  const base = truncateBase(rendered.replace(/^[.\s]+/, ''), policy.max_name_length) || unknownSlug(policy);
  const ext = extension && !extension.startsWith('.') ? `.${extension}` : extension;

  return Object.freeze({
    base_name: base,
    extension: ext.toLowerCase(),
    is_disambiguated: false,
  });
}
