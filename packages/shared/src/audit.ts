/**
 * Audit Recorder
 *
 * Append-only log of per-document decisions. Records are frozen once
 * written; a correction is a new record that supersedes the latest one.
 */

import { ulid } from 'ulid';
import type {
  AuditRecord,
  BatchReport,
  Decision,
  DecisionSummary,
  FieldName,
} from './types';
import { FIELD_NAMES, fileName } from './types';
import { deepFreeze } from './utils';
import { logger } from './logger';

export type AuditRecordInput = Omit<AuditRecord, 'record_id' | 'recorded_at'>;

/** Changes a reviewer may apply to a document's latest record */
export type AuditCorrection = Partial<
  Pick<AuditRecord, 'name' | 'proposed_name' | 'decision' | 'reason_code' | 'reason'>
>;

export interface FinalizeOptions {
  aborted?: boolean;
  abortReason?: string | null;
}

export class AuditRecorder {
  readonly batchId: string;
  private readonly records: AuditRecord[] = [];
  private readonly latestByDocument = new Map<string, AuditRecord>();
  private finalized = false;

  constructor(batchId: string = ulid()) {
    this.batchId = batchId;
  }

  get size(): number {
    return this.records.length;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  /**
   * Append a record. A document that already has one may only get another
   * that supersedes its latest record.
   */
  append(input: AuditRecordInput): AuditRecord {
    if (this.finalized) {
      throw new Error(`Audit log for batch ${this.batchId} is finalized`);
    }

    const latest = this.latestByDocument.get(input.document_id);
    if (latest && input.supersedes !== latest.record_id) {
      throw new Error(
        `Document ${input.document_id} already has record ${latest.record_id}; corrections must supersede it`
      );
    }
    if (!latest && input.supersedes !== undefined) {
      throw new Error(`Record ${input.supersedes} to supersede not found for document ${input.document_id}`);
    }

    const record = deepFreeze<AuditRecord>({
      ...input,
      record_id: ulid(),
      recorded_at: new Date().toISOString(),
    });

    this.records.push(record);
    this.latestByDocument.set(record.document_id, record);

    logger.debug('Audit record appended', {
      record_id: record.record_id,
      document_id: record.document_id,
      decision: record.decision,
      reason_code: record.reason_code,
    });

    return record;
  }

  /**
   * Record a manual correction of a document's latest decision.
   */
  correct(documentId: string, patch: AuditCorrection): AuditRecord {
    const latest = this.latestByDocument.get(documentId);
    if (!latest) {
      throw new Error(`No audit record for document ${documentId}`);
    }

    const { record_id: _recordId, recorded_at: _recordedAt, ...rest } = latest;
    return this.append({
      ...rest,
      ...patch,
      reason_code: patch.reason_code ?? 'manual_correction',
      supersedes: latest.record_id,
    });
  }

  latest(documentId: string): AuditRecord | undefined {
    return this.latestByDocument.get(documentId);
  }

  history(documentId: string): AuditRecord[] {
    return this.records.filter((r) => r.document_id === documentId);
  }

  /** Latest record per document, in the order documents were first recorded. */
  current(): AuditRecord[] {
    return Array.from(this.latestByDocument.values());
  }

  /**
   * Close the log and produce the batch report.
   */
  finalize(options: FinalizeOptions = {}): BatchReport {
    if (this.finalized) {
      throw new Error(`Audit log for batch ${this.batchId} is already finalized`);
    }
    this.finalized = true;

    const summary = summarize(this.current().map((r) => r.decision));
    const report = deepFreeze<BatchReport>({
      batch_id: this.batchId,
      generated_at: new Date().toISOString(),
      aborted: options.aborted ?? false,
      abort_reason: options.abortReason ?? null,
      summary,
      records: [...this.records],
    });

    logger.info('Batch report finalized', { batch_id: this.batchId, ...summary, aborted: report.aborted });
    return report;
  }
}

export function summarize(decisions: readonly Decision[]): DecisionSummary {
  const summary: DecisionSummary = { total: decisions.length, AUTO_RENAMED: 0, FLAGGED_FOR_REVIEW: 0, FAILED: 0 };
  for (const decision of decisions) {
    summary[decision] += 1;
  }
  return summary;
}

/** Latest record per document, superseded ones dropped. */
export function currentRecords(report: BatchReport): AuditRecord[] {
  const latest = new Map<string, AuditRecord>();
  for (const record of report.records) {
    latest.set(record.document_id, record);
  }
  return Array.from(latest.values());
}

// ============================================================================
// Renderers
// ============================================================================

export function renderReportJson(report: BatchReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

function csvCell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

const STATUS_LABELS: Record<Decision, string> = {
  AUTO_RENAMED: 'renamed',
  FLAGGED_FOR_REVIEW: 'review',
  FAILED: 'failed',
};

/**
 * One row per document: path, new name, status, message, then every field
 * with its confidence.
 */
export function renderReportCsv(report: BatchReport): string {
  const fieldColumns = FIELD_NAMES.flatMap((field) => [field, `${field}_confidence`]);
  const header = ['source_path', 'new_name', 'status', 'message', 'overall_confidence', ...fieldColumns];

  const rows = currentRecords(report).map((record) => {
    const name = record.name ?? record.proposed_name;
    const fields = record.context?.fields ?? {};
    const fieldCells = FIELD_NAMES.flatMap((field: FieldName) => {
      const resolved = fields[field];
      return resolved ? [resolved.value, resolved.confidence] : ['', ''];
    });
    return [
      record.source_path,
      name ? fileName(name) : '',
      STATUS_LABELS[record.decision],
      record.reason,
      record.context ? record.context.overall_confidence : '',
      ...fieldCells,
    ]
      .map(csvCell)
      .join(',');
  });

  return `${[header.join(','), ...rows].join('\n')}\n`;
}

/**
 * Markdown note placed next to a document copied for review.
 */
export function renderReviewNote(record: AuditRecord): string {
  const lines = [
    `# Review: ${record.source_path}`,
    '',
    `- Decision: ${record.decision}`,
    `- Reason: ${record.reason}`,
  ];

  if (record.proposed_name) {
    lines.push(`- Proposed name: \`${fileName(record.proposed_name)}\``);
  }
  if (record.context) {
    lines.push(`- Overall confidence: ${record.context.overall_confidence}`);
    lines.push('', '| Field | Value | Confidence | Rule |', '|---|---|---|---|');
    for (const field of FIELD_NAMES) {
      const resolved = record.context.fields[field];
      if (!resolved) continue;
      lines.push(`| ${field} | ${resolved.value.replace(/\|/g, '\\|')} | ${resolved.confidence} | ${resolved.rule_id ?? '-'} |`);
    }
  }

  return `${lines.join('\n')}\n`;
}

