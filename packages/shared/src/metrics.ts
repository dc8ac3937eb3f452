/**
 * Prometheus Metrics
 *
 * Metrics for monitoring renaming batches, OCR calls and queue health.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'docnamer_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'docnamer_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsDecidedCounter = new promClient.Counter({
  name: 'docnamer_documents_decided_total',
  help: 'Documents that reached a terminal decision',
  labelNames: ['decision'],
  registers: [register],
});

export const batchDurationHistogram = new promClient.Histogram({
  name: 'docnamer_batch_duration_seconds',
  help: 'Duration of a renaming batch',
  buckets: [1, 5, 15, 30, 60, 120, 300, 600],
  registers: [register],
});

export const ocrRequestsCounter = new promClient.Counter({
  name: 'docnamer_ocr_requests_total',
  help: 'Total number of OCR collaborator calls',
  labelNames: ['engine', 'status'],
  registers: [register],
});

export const ocrDurationHistogram = new promClient.Histogram({
  name: 'docnamer_ocr_duration_seconds',
  help: 'Duration of OCR collaborator calls',
  labelNames: ['engine'],
  buckets: [0.05, 0.25, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

/**
 * Report queue depths to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(queues: Array<{ name: string; queue: Queue }>): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Also enables the default process metrics, which keep timers alive.
 */
export function serveMetrics(port: number, queues: Array<{ name: string; queue: Queue }> = []): http.Server {
  // Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }

  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      reportQueueMetrics(queues)
        .then(() => getMetrics())
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Metrics scrape failed', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
