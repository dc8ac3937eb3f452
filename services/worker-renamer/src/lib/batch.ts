/**
 * Rename Batch Job
 *
 * One job = one input directory: discover documents, run the pipeline,
 * validate the report, apply the plan and write the report files.
 */

import path from 'path';
import {
  logger,
  config,
  runBatch,
  loadNamingPolicyFile,
  validateBatchReport,
  REVIEW_DIR_NAME,
  type OcrProvider,
  type RenameBatchJob,
  type RenameBatchResult,
} from '@docnamer/shared';
import { listDocuments, listFileNames, DEFAULT_EXTENSIONS } from './files';
import { executePlan, type ExecutionResult } from './plan-executor';
import { writeReport, DEFAULT_REPORT_NAME } from './report';

export interface ProcessOptions {
  provider: OcrProvider;
  signal?: AbortSignal;
}

export interface ProcessOutcome {
  result: RenameBatchResult;
  execution: ExecutionResult[];
}

export async function processRenameBatch(job: RenameBatchJob, options: ProcessOptions): Promise<ProcessOutcome> {
  const outputDir = path.resolve(job.output_dir);
  const reviewDir = path.resolve(job.review_dir ?? path.join(outputDir, REVIEW_DIR_NAME));
  const policy = loadNamingPolicyFile(path.resolve(job.policy_path ?? config.namingPolicyPath));

  const sources = await listDocuments(job.input_dir, job.extensions ?? DEFAULT_EXTENSIONS, [reviewDir]);
  logger.info('Documents discovered', { input_dir: job.input_dir, count: sources.length });

  const { report, plan } = await runBatch(
    sources.map((source_path) => ({ source_path })),
    {
      policy,
      provider: options.provider,
      targetDir: outputDir,
      reviewDir,
      existingNames: await listFileNames(outputDir),
      existingReviewNames: await listFileNames(reviewDir),
      signal: options.signal,
      batchId: job.batch_id,
      correlationId: job.correlation_id,
    }
  );

  const validation = validateBatchReport(report);
  if (!validation.valid) {
    logger.error('Batch report failed schema validation', undefined, { errors: validation.errors });
  }

  const execution = await executePlan(plan, report, { dryRun: job.dry_run });

  let written: { json: string; csv: string } | null = null;
  if (!job.dry_run || job.report_path) {
    written = await writeReport(report, job.report_path ?? path.join(outputDir, DEFAULT_REPORT_NAME));
  }

  return {
    result: {
      batch_id: report.batch_id,
      aborted: report.aborted,
      total: report.summary.total,
      auto_renamed: report.summary.AUTO_RENAMED,
      flagged: report.summary.FLAGGED_FOR_REVIEW,
      failed: report.summary.FAILED,
      report_json: written?.json ?? null,
      report_csv: written?.csv ?? null,
    },
    execution,
  };
}
