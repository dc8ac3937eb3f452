/**
 * Shared TypeScript Types
 *
 * Data model of the renaming pipeline. Snake_case properties are the ones
 * that end up in the batch report (see schemas/batch_report.schema.json).
 */

// ============================================================================
// Field Names
// ============================================================================

export const FIELD_NAMES = [
  'document_type',
  'reference_number',
  'party',
  'date',
  'issue_year',
  'contract_type',
  'document_title',
  'environmental_document',
  'farm',
  'partner',
  'fund',
  'spe',
  'owner',
  'identity_document',
  'business_context',
] as const;

/** The DocumentContext schema: every field a template may reference. */
export type FieldName = (typeof FIELD_NAMES)[number];

const FIELD_NAME_SET: ReadonlySet<string> = new Set(FIELD_NAMES);

export function isFieldName(value: string): value is FieldName {
  return FIELD_NAME_SET.has(value);
}

// ============================================================================
// OCR
// ============================================================================

export interface OcrBlock {
  text: string;
  /** 0.0–1.0; absent when the engine gives no confidence */
  confidence?: number;
  page?: number;
}

export interface RawOcrResult {
  readonly source_path: string;
  readonly blocks: readonly OcrBlock[];
  readonly engine: string;
}

export interface RecognizeOptions {
  signal?: AbortSignal;
}

/**
 * Pluggable OCR backend. The pipeline depends only on this interface.
 * Implementations fail with OcrUnavailableError or OcrTimeoutError.
 */
export interface OcrProvider {
  readonly engine: string;
  recognize(sourcePath: string, options?: RecognizeOptions): Promise<RawOcrResult>;
}

// ============================================================================
// Normalized Text
// ============================================================================

export interface TextSpan {
  start: number;
  end: number;
}

export interface NormalizedBlock extends TextSpan {
  confidence: number;
}

export interface NormalizedText {
  /** Cleaned text in original case, for display and values */
  readonly display: string;
  /** Lower-cased copy of `display`, same length, for matching */
  readonly matching: string;
  readonly blocks: readonly NormalizedBlock[];
}

// ============================================================================
// Extraction
// ============================================================================

export type RuleKind = 'pattern' | 'keyword' | 'date' | 'entity';

export interface FieldCandidate {
  field: FieldName;
  /** Text as found, display case */
  value: string;
  /** Form used for naming (ISO dates, upper-case codes, aliases applied) */
  canonical: string;
  confidence: number;
  span: TextSpan;
  rule_id: string;
}

// ============================================================================
// Document Context
// ============================================================================

export interface ResolvedField {
  value: string;
  canonical: string;
  confidence: number;
  /** null when the field was missing and filled with the unknown value */
  rule_id: string | null;
  span: TextSpan | null;
}

export interface DocumentContext {
  readonly document_id: string;
  readonly fields: Readonly<Partial<Record<FieldName, ResolvedField>>>;
  readonly field_confidences: Readonly<Partial<Record<FieldName, number>>>;
  readonly required_fields: readonly FieldName[];
  readonly overall_confidence: number;
  readonly template: string;
}

// ============================================================================
// Naming
// ============================================================================

export interface CanonicalName {
  readonly base_name: string;
  /** Including the dot, e.g. ".pdf"; empty when the source had none */
  readonly extension: string;
  readonly is_disambiguated: boolean;
}

export function fileName(name: CanonicalName): string {
  return `${name.base_name}${name.extension}`;
}

// ============================================================================
// Decisions & Audit
// ============================================================================

export type DocumentState =
  | 'RECEIVED'
  | 'NORMALIZED'
  | 'EXTRACTED'
  | 'RESOLVED'
  | 'NAMED'
  | 'AUTO_RENAMED'
  | 'FLAGGED'
  | 'FAILED';

export type Decision = 'AUTO_RENAMED' | 'FLAGGED_FOR_REVIEW' | 'FAILED';

export const DECISIONS: readonly Decision[] = ['AUTO_RENAMED', 'FLAGGED_FOR_REVIEW', 'FAILED'];

export type ReasonCode =
  | 'auto_threshold_met'
  | 'below_auto_threshold'
  | 'below_review_floor'
  | 'ocr_unavailable'
  | 'ocr_timeout'
  | 'ocr_error'
  | 'pipeline_error'
  | 'batch_aborted'
  | 'manual_correction';

export interface AuditRecord {
  readonly record_id: string;
  readonly document_id: string;
  readonly source_path: string;
  readonly ocr: RawOcrResult | null;
  readonly candidates: readonly FieldCandidate[];
  readonly context: DocumentContext | null;
  /** Name synthesized before collision resolution */
  readonly proposed_name: CanonicalName | null;
  /** Final name (disambiguated) for auto-renamed documents */
  readonly name: CanonicalName | null;
  readonly decision: Decision;
  readonly reason_code: ReasonCode;
  readonly reason: string;
  readonly states: readonly DocumentState[];
  /** record_id of the record this one corrects */
  readonly supersedes?: string;
  readonly recorded_at: string;
}

export type DecisionSummary = Record<Decision, number> & { total: number };

export interface BatchReport {
  readonly batch_id: string;
  readonly generated_at: string;
  readonly aborted: boolean;
  readonly abort_reason: string | null;
  readonly summary: DecisionSummary;
  readonly records: readonly AuditRecord[];
}

// ============================================================================
// Rename Plan
// ============================================================================

export type PlanAction = 'rename' | 'copy' | 'none';

export interface RenamePlanEntry {
  document_id: string;
  source_path: string;
  /** null for documents that are left in place */
  target_path: string | null;
  file_name: string | null;
  decision: Decision;
  action: PlanAction;
}
