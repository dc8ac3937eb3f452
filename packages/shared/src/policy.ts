/**
 * Naming Policy
 *
 * The explicit, validated configuration object supplied once per batch:
 * template and variants, thresholds, collision scheme, slug options and
 * rule overrides. Built once, frozen, and passed to every stage.
 */

import fs from 'fs';
import type { FieldName } from './types';
import { isFieldName } from './types';
import type { RuleSetOptions } from './extractors/types';
import { hasRule } from './extractors';
import { parseTemplate } from './naming';
import { validateNamingPolicy } from './schemas';
import { MissingTemplateFieldError, PolicyMisconfigurationError } from './errors';
import { deepFreeze } from './utils';

export type CollisionStrategy = 'numeric' | 'version';
export type NameCase = 'lower' | 'upper' | 'preserve';
export type DateFormat = 'iso' | 'compact';
export type ContextHint = 'auto' | 'funds' | 'market';

export interface TemplateVariant {
  readonly name: string;
  /** Variant applies when every one of these fields has a candidate */
  readonly when_fields: readonly FieldName[];
  /** ...and these fields resolved to these canonical values, e.g. business_context "funds" */
  readonly when_values: Readonly<Partial<Record<FieldName, string>>>;
  readonly template: string;
}

export interface NamingPolicy {
  readonly template: string;
  readonly variants: readonly TemplateVariant[];
  /** null: the placeholders of the selected template are required */
  readonly required_fields: readonly FieldName[] | null;
  readonly auto_threshold: number;
  readonly review_floor: number;
  readonly collision_strategy: CollisionStrategy;
  readonly max_collision_attempts: number;
  readonly max_name_length: number;
  readonly case: NameCase;
  readonly word_separator: string;
  readonly date_format: DateFormat;
  readonly unknown_value: string;
  readonly neutral_ocr_confidence: number;
  readonly context_hint: ContextHint;
  /** Overrides the process-wide OCR timeout when set */
  readonly ocr_timeout_ms: number | null;
  readonly rules: {
    readonly disabled: readonly string[];
    readonly weights: Readonly<Record<string, number>>;
  };
}

export const DEFAULT_TEMPLATE = '{document_type}_{reference_number}_{party}_{date}';

export const NAMING_POLICY_DEFAULTS = deepFreeze<NamingPolicy>({
  template: DEFAULT_TEMPLATE,
  variants: [],
  required_fields: null,
  auto_threshold: 0.7,
  review_floor: 0.0,
  collision_strategy: 'numeric',
  max_collision_attempts: 1000,
  max_name_length: 120,
  case: 'lower',
  word_separator: '-',
  date_format: 'iso',
  unknown_value: 'UNKNOWN',
  neutral_ocr_confidence: 1.0,
  context_hint: 'auto',
  ocr_timeout_ms: null,
  rules: { disabled: [], weights: {} },
});

// ============================================================================
// Narrowing helpers (input has passed schema validation)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickNumber(raw: Record<string, unknown>, key: string, fallback: number): number {
  const value = raw[key];
  return typeof value === 'number' ? value : fallback;
}

function pickString(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  return typeof value === 'string' ? value : fallback;
}

function pickEnum<T extends string>(
  raw: Record<string, unknown>,
  key: string,
  allowed: readonly T[],
  fallback: T
): T {
  const value = raw[key];
  return allowed.find((option) => option === value) ?? fallback;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function fieldValues(value: unknown, where: string, issues: string[]): Partial<Record<FieldName, string>> {
  const values: Partial<Record<FieldName, string>> = {};
  if (!isRecord(value)) return values;
  for (const [field, expected] of Object.entries(value)) {
    if (typeof expected !== 'string') continue;
    if (isFieldName(field)) {
      values[field] = expected;
    } else {
      issues.push(`${where}: unknown field "${field}"`);
    }
  }
  return values;
}

function fieldList(values: string[], where: string, issues: string[]): FieldName[] {
  const fields: FieldName[] = [];
  for (const value of values) {
    if (isFieldName(value)) {
      fields.push(value);
    } else {
      issues.push(`${where}: unknown field "${value}"`);
    }
  }
  return fields;
}

/**
 * Every placeholder must name a declared field.
 *
 * @throws MissingTemplateFieldError for the first undeclared placeholder
 */
function checkTemplate(template: string): void {
  for (const placeholder of parseTemplate(template).placeholders) {
    if (!isFieldName(placeholder)) {
      throw new MissingTemplateFieldError(placeholder, template);
    }
  }
}

/**
 * Build a validated, frozen NamingPolicy from raw (JSON) input, filling in
 * the documented defaults.
 *
 * @throws PolicyMisconfigurationError (or MissingTemplateFieldError)
 */
export function buildNamingPolicy(input: unknown = {}): NamingPolicy {
  if (!isRecord(input)) {
    throw new PolicyMisconfigurationError(['policy must be a JSON object']);
  }

  const validation = validateNamingPolicy(input);
  if (!validation.valid) {
    throw new PolicyMisconfigurationError(validation.errors ?? ['schema validation failed']);
  }

  const defaults = NAMING_POLICY_DEFAULTS;
  const issues: string[] = [];

  const template = pickString(input, 'template', defaults.template);
  checkTemplate(template);

  const variants: TemplateVariant[] = [];
  const rawVariants = Array.isArray(input.variants) ? input.variants : [];
  for (const entry of rawVariants) {
    if (!isRecord(entry)) continue;
    const name = pickString(entry, 'name', '');
    const variantTemplate = pickString(entry, 'template', '');
    checkTemplate(variantTemplate);
    variants.push({
      name,
      when_fields: fieldList(stringList(entry.when_fields), `variant "${name}"`, issues),
      when_values: fieldValues(entry.when_values, `variant "${name}"`, issues),
      template: variantTemplate,
    });
  }

  const requiredFields =
    input.required_fields === undefined || input.required_fields === null
      ? null
      : fieldList(stringList(input.required_fields), 'required_fields', issues);

  const autoThreshold = pickNumber(input, 'auto_threshold', defaults.auto_threshold);
  const reviewFloor = pickNumber(input, 'review_floor', defaults.review_floor);
  if (reviewFloor > autoThreshold) {
    issues.push(`review_floor (${reviewFloor}) exceeds auto_threshold (${autoThreshold})`);
  }

  const rawRules = isRecord(input.rules) ? input.rules : {};
  const disabled = stringList(rawRules.disabled);
  const weights: Record<string, number> = {};
  if (isRecord(rawRules.weights)) {
    for (const [ruleId, weight] of Object.entries(rawRules.weights)) {
      if (typeof weight === 'number') weights[ruleId] = weight;
    }
  }
  for (const ruleId of [...disabled, ...Object.keys(weights)]) {
    if (!hasRule(ruleId)) issues.push(`rules: unknown rule id "${ruleId}"`);
  }

  const unknownValue = pickString(input, 'unknown_value', defaults.unknown_value);
  if (!/[A-Za-z0-9]/.test(unknownValue)) {
    issues.push('unknown_value must contain a letter or digit');
  }

  if (issues.length > 0) {
    throw new PolicyMisconfigurationError(issues);
  }

  const timeout = input.ocr_timeout_ms;

  return deepFreeze<NamingPolicy>({
    template,
    variants,
    required_fields: requiredFields,
    auto_threshold: autoThreshold,
    review_floor: reviewFloor,
    collision_strategy: pickEnum(input, 'collision_strategy', ['numeric', 'version'], defaults.collision_strategy),
    max_collision_attempts: pickNumber(input, 'max_collision_attempts', defaults.max_collision_attempts),
    max_name_length: pickNumber(input, 'max_name_length', defaults.max_name_length),
    case: pickEnum(input, 'case', ['lower', 'upper', 'preserve'], defaults.case),
    word_separator: pickString(input, 'word_separator', defaults.word_separator),
    date_format: pickEnum(input, 'date_format', ['iso', 'compact'], defaults.date_format),
    unknown_value: unknownValue,
    neutral_ocr_confidence: pickNumber(input, 'neutral_ocr_confidence', defaults.neutral_ocr_confidence),
    context_hint: pickEnum(input, 'context_hint', ['auto', 'funds', 'market'], defaults.context_hint),
    ocr_timeout_ms: typeof timeout === 'number' ? timeout : null,
    rules: { disabled, weights },
  });
}

/**
 * Read and build a NamingPolicy from a JSON file.
 */
export function loadNamingPolicyFile(filePath: string): NamingPolicy {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new PolicyMisconfigurationError([
      `cannot read policy file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new PolicyMisconfigurationError([
      `policy file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  return buildNamingPolicy(parsed);
}

export function ruleSetOptions(policy: NamingPolicy): RuleSetOptions {
  return { disabled: policy.rules.disabled, weights: policy.rules.weights };
}
