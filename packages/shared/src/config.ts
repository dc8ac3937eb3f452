/**
 * Centralized Configuration
 *
 * Process-level settings, tunable via environment variables. Naming rules
 * and confidence thresholds are not here: they travel with the NamingPolicy
 * supplied to each batch (see policy.ts).
 */

export type OcrProviderName = 'text-layer' | 'openai';

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // OCR
  ocrProvider: OcrProviderName;
  ocrConcurrency: number;
  ocrTimeoutMs: number;

  // LLM (vision OCR backend)
  llmModelOcr: string;
  llmRequestTimeoutMs: number;
  openaiApiKey: string;

  // Naming policy file used by the worker
  namingPolicyPath: string;

  // Metrics
  metricsPort: number;
}

function parseOcrProvider(value: string | undefined): OcrProviderName {
  return value === 'openai' ? 'openai' : 'text-layer';
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '1', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // OCR
  ocrProvider: parseOcrProvider(process.env.OCR_PROVIDER),
  ocrConcurrency: parseInt(process.env.OCR_CONCURRENCY || '4', 10),
  ocrTimeoutMs: parseInt(process.env.OCR_TIMEOUT_MS || '120000', 10),

  // LLM
  llmModelOcr: process.env.LLM_MODEL_OCR || 'gpt-4o',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  openaiApiKey: process.env.OPENAI_API_KEY || '',

  namingPolicyPath: process.env.NAMING_POLICY_PATH || 'config/naming-policy.json',

  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),
};
