/**
 * Batch Orchestrator
 *
 * Drives each document through OCR → normalize → extract → resolve → name,
 * then decides its fate. OCR and the pure stages run in a bounded pool;
 * decisions are committed strictly in input order by a single commit
 * cursor, which owns the assigned names and the audit log. Same inputs,
 * same policy and same existing names always give the same report.
 */

import path from 'path';
import { ulid } from 'ulid';
import type {
  BatchReport,
  CanonicalName,
  Decision,
  DocumentContext,
  FieldCandidate,
  FieldName,
  NormalizedText,
  OcrProvider,
  RawOcrResult,
  ReasonCode,
  RenamePlanEntry,
} from './types';
import { fileName } from './types';
import type { NamingPolicy } from './policy';
import { buildNamingPolicy, ruleSetOptions } from './policy';
import type { RuleSet } from './extractors';
import { buildRuleSet, extractFields, ruleOrder } from './extractors';
import { emptyNormalizedText, normalizeOcrResult } from './normalizer';
import { resolveContext, selectWinners } from './resolver';
import { extensionOf, requiredFieldsFor, selectTemplate, synthesizeName } from './naming';
import { AssignedNames } from './collision';
import { AuditRecorder } from './audit';
import { freezeOcrResult, recognizeWithTimeout } from './ocr';
import { DocumentLifecycle, terminalStateFor } from './pipeline-state';
import {
  BatchAbortedError,
  InvalidInputError,
  OcrTimeoutError,
  OcrUnavailableError,
  isFatalError,
} from './errors';
import { runWithContextAsync, runWithDocumentContext, getContext } from './context';
import { config } from './config';
import { logger } from './logger';
import {
  batchDurationHistogram,
  documentsDecidedCounter,
  ocrDurationHistogram,
  ocrRequestsCounter,
} from './metrics';

export const REVIEW_DIR_NAME = '_pendentes';

/** Names in the review area keep the original file name; allow long ones. */
const REVIEW_MAX_NAME_LENGTH = 255;

export interface DocumentInput {
  source_path: string;
  document_id?: string;
}

export interface RunBatchOptions {
  /** Raw or already-built naming policy; validated before any OCR call */
  policy?: unknown;
  provider: OcrProvider;
  /** Directory auto-renamed documents are moved into */
  targetDir: string;
  /** Directory flagged documents are copied into; defaults to <targetDir>/_pendentes */
  reviewDir?: string;
  /** File names already present in the target directory */
  existingNames?: Iterable<string>;
  /** File names already present in the review directory */
  existingReviewNames?: Iterable<string>;
  concurrency?: number;
  ocrTimeoutMs?: number;
  signal?: AbortSignal;
  batchId?: string;
  correlationId?: string;
}

export interface BatchResult {
  report: BatchReport;
  plan: RenamePlanEntry[];
}

interface PreparedBatch {
  policy: NamingPolicy;
  ruleSet: RuleSet;
  order: ReadonlyMap<string, number>;
}

// ============================================================================
// Per-document analysis (runs in the pool)
// ============================================================================

interface NamedAnalysis {
  kind: 'named';
  ocr: RawOcrResult;
  text: NormalizedText;
  candidates: FieldCandidate[];
  context: DocumentContext;
  proposed: CanonicalName;
  lifecycle: DocumentLifecycle;
}

interface FailedAnalysis {
  kind: 'failed';
  reasonCode: ReasonCode;
  reason: string;
  lifecycle: DocumentLifecycle;
}

/** An unexpected error in a pure stage: fails this document only */
interface BrokenAnalysis {
  kind: 'broken';
  error: unknown;
  lifecycle: DocumentLifecycle;
}

type Analysis = NamedAnalysis | FailedAnalysis | BrokenAnalysis;

function ocrFailure(error: unknown): { reasonCode: ReasonCode; reason: string } {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof BatchAbortedError) return { reasonCode: 'batch_aborted', reason: message };
  if (error instanceof OcrTimeoutError) return { reasonCode: 'ocr_timeout', reason: message };
  if (error instanceof OcrUnavailableError) return { reasonCode: 'ocr_unavailable', reason: message };
  return { reasonCode: 'ocr_error', reason: `OCR failed: ${message}` };
}

async function callOcr(
  provider: OcrProvider,
  sourcePath: string,
  timeoutMs: number,
  signal: AbortSignal | undefined
): Promise<RawOcrResult> {
  const started = Date.now();
  try {
    const result = await recognizeWithTimeout(provider, sourcePath, { timeoutMs, signal });
    ocrRequestsCounter.inc({ engine: result.engine, status: 'success' });
    return result;
  } catch (error) {
    ocrRequestsCounter.inc({ engine: provider.engine, status: ocrFailure(error).reasonCode });
    throw error;
  } finally {
    ocrDurationHistogram.observe({ engine: provider.engine }, (Date.now() - started) / 1000);
  }
}

/**
 * The pure stages, from OCR output to the proposed name.
 */
function nameFromOcr(
  documentId: string,
  raw: RawOcrResult,
  prepared: PreparedBatch,
  lifecycle: DocumentLifecycle
): NamedAnalysis {
  const { policy, ruleSet, order } = prepared;
  const ocr = freezeOcrResult(raw);

  let text: NormalizedText;
  try {
    text = normalizeOcrResult(ocr, policy.neutral_ocr_confidence);
  } catch (error) {
    if (!(error instanceof InvalidInputError)) throw error;
    logger.warn('OCR returned no text, continuing with zero confidence', { source_path: ocr.source_path });
    text = emptyNormalizedText();
  }
  lifecycle.advance('NORMALIZED');

  const candidates = extractFields(text, ruleSet, {
    contextHint: policy.context_hint === 'auto' ? null : policy.context_hint,
  });
  lifecycle.advance('EXTRACTED');

  const winners = selectWinners(candidates, order);
  const selected = selectTemplate(
    policy,
    new Map(Array.from(winners, ([field, winner]): [FieldName, string] => [field, winner.canonical]))
  );
  const context = resolveContext(documentId, candidates, {
    requiredFields: requiredFieldsFor(policy, selected.template),
    ruleOrder: order,
    unknownValue: policy.unknown_value,
    template: selected.template,
  });
  lifecycle.advance('RESOLVED');

  const proposed = synthesizeName(context, policy, extensionOf(ocr.source_path));
  lifecycle.advance('NAMED');

  return { kind: 'named', ocr, text, candidates, context, proposed, lifecycle };
}

async function analyzeDocument(
  documentId: string,
  sourcePath: string,
  prepared: PreparedBatch,
  provider: OcrProvider,
  timeoutMs: number,
  signal: AbortSignal
): Promise<Analysis> {
  const lifecycle = new DocumentLifecycle();

  if (signal.aborted) {
    return { kind: 'failed', reasonCode: 'batch_aborted', reason: 'Batch aborted before processing', lifecycle };
  }

  let ocr: RawOcrResult;
  try {
    ocr = await callOcr(provider, sourcePath, timeoutMs, signal);
  } catch (error) {
    const failure = ocrFailure(error);
    logger.warn('OCR failed for document', { source_path: sourcePath, reason_code: failure.reasonCode, reason: failure.reason });
    return { kind: 'failed', ...failure, lifecycle };
  }

  try {
    return nameFromOcr(documentId, ocr, prepared, lifecycle);
  } catch (error) {
    return { kind: 'broken', error, lifecycle };
  }
}

/**
 * Bounded concurrency: at most `concurrency` tasks run at once, started in
 * submission order.
 */
function createLimiter(concurrency: number): <T>(task: () => Promise<T>) => Promise<T> {
  let active = 0;
  const waiting: Array<() => void> = [];

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (active >= concurrency) {
      await new Promise<void>((resolve) => waiting.push(resolve));
    }
    active++;
    try {
      return await task();
    } finally {
      active--;
      waiting.shift()?.();
    }
  };
}

// ============================================================================
// Batch
// ============================================================================

function prepareBatch(policyInput: unknown): PreparedBatch {
  const policy = buildNamingPolicy(policyInput ?? {});
  const ruleSet = buildRuleSet(ruleSetOptions(policy));
  return { policy, ruleSet, order: ruleOrder(ruleSet) };
}

function describeConfidence(context: DocumentContext, policy: NamingPolicy, decision: Decision): string {
  const overall = context.overall_confidence;
  const missing = context.required_fields.filter((f) => context.fields[f]?.rule_id === null);
  const suffix = missing.length > 0 ? `; missing: ${missing.join(', ')}` : '';

  if (decision === 'AUTO_RENAMED') {
    return `overall confidence ${overall} >= auto threshold ${policy.auto_threshold}`;
  }
  if (decision === 'FLAGGED_FOR_REVIEW') {
    return `overall confidence ${overall} < auto threshold ${policy.auto_threshold}${suffix}`;
  }
  return `overall confidence ${overall} < review floor ${policy.review_floor}${suffix}`;
}

export function decide(overall: number, policy: NamingPolicy): { decision: Decision; reasonCode: ReasonCode } {
  if (overall >= policy.auto_threshold) return { decision: 'AUTO_RENAMED', reasonCode: 'auto_threshold_met' };
  if (overall >= policy.review_floor) return { decision: 'FLAGGED_FOR_REVIEW', reasonCode: 'below_auto_threshold' };
  return { decision: 'FAILED', reasonCode: 'below_review_floor' };
}

function originalName(sourcePath: string): CanonicalName {
  const parsed = path.parse(sourcePath);
  return { base_name: parsed.name, extension: parsed.ext, is_disambiguated: false };
}

function sameDirectory(a: string, b: string): boolean {
  return path.resolve(a) === path.resolve(b);
}

/**
 * Run one batch. Policy problems throw before any document is touched;
 * everything after that ends up in the report.
 *
 * @throws PolicyMisconfigurationError
 */
export async function runBatch(documents: readonly DocumentInput[], options: RunBatchOptions): Promise<BatchResult> {
  const prepared = prepareBatch(options.policy);
  const { policy } = prepared;

  const batchId = options.batchId ?? ulid();
  const correlationId = options.correlationId ?? getContext()?.correlationId ?? ulid();

  return runWithContextAsync({ correlationId, batchId }, async () => {
    const started = Date.now();
    const targetDir = options.targetDir;
    const reviewDir = options.reviewDir ?? path.join(targetDir, REVIEW_DIR_NAME);
    const timeoutMs = options.ocrTimeoutMs ?? policy.ocr_timeout_ms ?? config.ocrTimeoutMs;
    const concurrency = Math.max(1, options.concurrency ?? config.ocrConcurrency);

    // Input documents already in the target area hold their names too
    const inTarget = documents
      .filter((doc) => sameDirectory(path.dirname(doc.source_path), targetDir))
      .map((doc) => path.basename(doc.source_path));
    const assigned = new AssignedNames(
      {
        strategy: policy.collision_strategy,
        maxAttempts: policy.max_collision_attempts,
        maxNameLength: policy.max_name_length,
      },
      [...(options.existingNames ?? []), ...inTarget]
    );
    const reviewNames = new AssignedNames(
      {
        strategy: policy.collision_strategy,
        maxAttempts: policy.max_collision_attempts,
        maxNameLength: REVIEW_MAX_NAME_LENGTH,
      },
      options.existingReviewNames
    );
    const audit = new AuditRecorder(batchId);
    const plan: RenamePlanEntry[] = [];

    // Internal controller: fires on external cancellation or a fatal error
    const controller = new AbortController();
    let abortReason: string | null = null;
    const abort = (reason: string): void => {
      if (controller.signal.aborted) return;
      abortReason = reason;
      controller.abort(new BatchAbortedError(reason));
      logger.warn('Batch aborting', { reason });
    };
    const onExternalAbort = (): void => {
      const reason = options.signal?.reason;
      abort(reason instanceof Error ? reason.message : String(reason ?? 'cancelled'));
    };
    if (options.signal?.aborted) onExternalAbort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    logger.info('Batch started', {
      documents: documents.length,
      concurrency,
      auto_threshold: policy.auto_threshold,
      review_floor: policy.review_floor,
    });

    const limit = createLimiter(concurrency);
    const inputs = documents.map((doc) => ({
      documentId: doc.document_id ?? ulid(),
      sourcePath: doc.source_path,
    }));
    const analyses = inputs.map(({ documentId, sourcePath }) =>
      limit(() =>
        runWithDocumentContext(documentId, () =>
          analyzeDocument(documentId, sourcePath, prepared, options.provider, timeoutMs, controller.signal)
        )
      )
    );

    const recordFailure = (
      documentId: string,
      sourcePath: string,
      analysis: Analysis,
      reasonCode: ReasonCode,
      reason: string
    ): void => {
      analysis.lifecycle.advance('FAILED');
      audit.append({
        document_id: documentId,
        source_path: sourcePath,
        ocr: analysis.kind === 'named' ? analysis.ocr : null,
        candidates: analysis.kind === 'named' ? analysis.candidates : [],
        context: analysis.kind === 'named' ? analysis.context : null,
        proposed_name: analysis.kind === 'named' ? analysis.proposed : null,
        name: null,
        decision: 'FAILED',
        reason_code: reasonCode,
        reason,
        states: analysis.lifecycle.states,
      });
      plan.push({
        document_id: documentId,
        source_path: sourcePath,
        target_path: null,
        file_name: null,
        decision: 'FAILED',
        action: 'none',
      });
      documentsDecidedCounter.inc({ decision: 'FAILED' });
    };

    const commitNamed = (documentId: string, sourcePath: string, analysis: NamedAnalysis): void => {
      const { decision, reasonCode } = decide(analysis.context.overall_confidence, policy);
      const reason = describeConfidence(analysis.context, policy, decision);

      if (decision === 'FAILED') {
        recordFailure(documentId, sourcePath, analysis, reasonCode, reason);
        return;
      }

      let name: CanonicalName | null = null;
      let entry: RenamePlanEntry;

      if (decision === 'AUTO_RENAMED') {
        const ownName = sameDirectory(path.dirname(sourcePath), targetDir) ? path.basename(sourcePath) : undefined;
        name = assigned.claim(analysis.proposed, ownName);
        entry = {
          document_id: documentId,
          source_path: sourcePath,
          target_path: path.join(targetDir, fileName(name)),
          file_name: fileName(name),
          decision,
          action: 'rename',
        };
      } else {
        const reviewName = reviewNames.claim(originalName(sourcePath));
        entry = {
          document_id: documentId,
          source_path: sourcePath,
          target_path: path.join(reviewDir, fileName(reviewName)),
          file_name: fileName(reviewName),
          decision,
          action: 'copy',
        };
      }

      analysis.lifecycle.advance(terminalStateFor(decision));
      audit.append({
        document_id: documentId,
        source_path: sourcePath,
        ocr: analysis.ocr,
        candidates: analysis.candidates,
        context: analysis.context,
        proposed_name: analysis.proposed,
        name,
        decision,
        reason_code: reasonCode,
        reason,
        states: analysis.lifecycle.states,
      });
      plan.push(entry);
      documentsDecidedCounter.inc({ decision });

      logger.info('Document decided', {
        document_id: documentId,
        decision,
        overall_confidence: analysis.context.overall_confidence,
        file_name: entry.file_name,
      });
    };

    // Commit cursor: strictly input order, one document at a time
    for (let i = 0; i < inputs.length; i++) {
      const { documentId, sourcePath } = inputs[i];
      const analysis = await analyses[i];

      if (controller.signal.aborted) {
        recordFailure(documentId, sourcePath, analysis, 'batch_aborted', `Batch aborted: ${abortReason ?? 'cancelled'}`);
        continue;
      }

      if (analysis.kind === 'broken') {
        const message = analysis.error instanceof Error ? analysis.error.message : String(analysis.error);
        logger.error('Pipeline stage failed for document', analysis.error, { document_id: documentId });
        recordFailure(documentId, sourcePath, analysis, 'pipeline_error', `Pipeline error: ${message}`);
        continue;
      }

      if (analysis.kind === 'failed') {
        recordFailure(documentId, sourcePath, analysis, analysis.reasonCode, analysis.reason);
        continue;
      }

      try {
        commitNamed(documentId, sourcePath, analysis);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (!isFatalError(error)) {
          logger.error('Committing document failed', error, { document_id: documentId });
          recordFailure(documentId, sourcePath, analysis, 'pipeline_error', `Pipeline error: ${message}`);
          continue;
        }
        abort(message);
        logger.error('Fatal error, aborting batch', error, { document_id: documentId });
        recordFailure(documentId, sourcePath, analysis, 'batch_aborted', `Batch aborted: ${message}`);
      }
    }

    options.signal?.removeEventListener('abort', onExternalAbort);

    const report = audit.finalize({ aborted: controller.signal.aborted, abortReason });
    batchDurationHistogram.observe((Date.now() - started) / 1000);

    return { report, plan };
  });
}

// ============================================================================
// Validation (dry inspection of one document)
// ============================================================================

export interface ValidateDocumentOptions {
  policy?: unknown;
  provider: OcrProvider;
  ocrTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface DocumentPreview {
  ocr: RawOcrResult;
  text: NormalizedText;
  candidates: FieldCandidate[];
  context: DocumentContext;
  name: CanonicalName;
  template: string;
}

/**
 * Run one document through NAMED without claiming a name or deciding.
 * OCR failures are thrown to the caller.
 */
export async function validateDocument(sourcePath: string, options: ValidateDocumentOptions): Promise<DocumentPreview> {
  const prepared = prepareBatch(options.policy);
  const timeoutMs = options.ocrTimeoutMs ?? prepared.policy.ocr_timeout_ms ?? config.ocrTimeoutMs;

  const ocr = await callOcr(options.provider, sourcePath, timeoutMs, options.signal);
  const analysis = nameFromOcr(ulid(), ocr, prepared, new DocumentLifecycle());

  return {
    ocr: analysis.ocr,
    text: analysis.text,
    candidates: analysis.candidates,
    context: analysis.context,
    name: analysis.proposed,
    template: analysis.context.template,
  };
}
