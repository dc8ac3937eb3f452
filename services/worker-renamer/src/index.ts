/**
 * Renamer Worker
 *
 * Consumes rename_batch jobs: OCR, field extraction and canonical renaming
 * of every document in a directory.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  createQueue,
  serveMetrics,
  QUEUE_NAMES,
  jobsProcessedCounter,
  type RenameBatchJob,
  type RenameBatchResult,
} from '@docnamer/shared';
import { createOcrProvider } from './lib/ocr-provider';
import { processRenameBatch } from './lib/batch';

const provider = createOcrProvider(config.ocrProvider);

// Batches in progress, aborted on shutdown
const running = new Set<AbortController>();

/**
 * Process rename_batch job
 */
async function processJob(job: Job<RenameBatchJob, RenameBatchResult>): Promise<RenameBatchResult> {
  const { correlation_id, batch_id, input_dir, dry_run } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, batchId: batch_id }, async () => {
    logger.info('Processing rename_batch', {
      jobId: job.id,
      input_dir,
      dry_run,
      attempt: job.attemptsMade + 1,
    });

    const controller = new AbortController();
    running.add(controller);

    try {
      const { result } = await processRenameBatch(job.data, { provider, signal: controller.signal });
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.RENAME_BATCH, status: result.aborted ? 'aborted' : 'success' });
      return result;
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.RENAME_BATCH, status: 'failed' });
      throw error;
    } finally {
      running.delete(controller);
    }
  });
}

const renameQueue = createQueue<RenameBatchJob, RenameBatchResult>(QUEUE_NAMES.RENAME_BATCH);
const worker = createWorker<RenameBatchJob, RenameBatchResult>(QUEUE_NAMES.RENAME_BATCH, processJob);
const metricsServer = serveMetrics(config.metricsPort, [{ name: QUEUE_NAMES.RENAME_BATCH, queue: renameQueue }]);

logger.info('Renamer worker started', { ocr_provider: config.ocrProvider });

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  for (const controller of running) {
    controller.abort(new Error(`${signal} received`));
  }
  await worker.close();
  await renameQueue.close();
  metricsServer.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
