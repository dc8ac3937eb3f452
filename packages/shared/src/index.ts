/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  runWithDocumentContext,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config, type OcrProviderName } from './config';

// Errors
export {
  DocNamerError,
  InvalidInputError,
  OcrUnavailableError,
  OcrTimeoutError,
  PolicyMisconfigurationError,
  MissingTemplateFieldError,
  CollisionResolutionExhaustedError,
  BatchAbortedError,
  isDocNamerError,
  isFatalError,
  type ErrorCode,
} from './errors';

// Types
export * from './types';

// Rule weights
export { RULE_WEIGHTS, getRuleWeight, isRuleId } from './rule-weights';

// Text normalization
export {
  normalizeText,
  normalizeOcrResult,
  emptyNormalizedText,
  ocrConfidenceAt,
  toMatchingCase,
} from './normalizer';

// Field extraction
export * from './extractors';

// Resolution, naming, collisions
export { resolveContext, selectWinners, compareCandidates, type ResolveOptions } from './resolver';
export {
  parseTemplate,
  selectTemplate,
  requiredFieldsFor,
  synthesizeName,
  slugify,
  formatDate,
  truncateBase,
  extensionOf,
  type ParsedTemplate,
  type TemplateSegment,
  type SelectedTemplate,
} from './naming';
export { AssignedNames, collisionSuffix, type AssignedNamesOptions } from './collision';

// Naming policy
export {
  buildNamingPolicy,
  loadNamingPolicyFile,
  ruleSetOptions,
  DEFAULT_TEMPLATE,
  NAMING_POLICY_DEFAULTS,
  type NamingPolicy,
  type TemplateVariant,
  type CollisionStrategy,
  type NameCase,
  type DateFormat,
  type ContextHint,
} from './policy';

// Audit
export {
  AuditRecorder,
  summarize,
  currentRecords,
  renderReportJson,
  renderReportCsv,
  renderReviewNote,
  type AuditRecordInput,
  type AuditCorrection,
  type FinalizeOptions,
} from './audit';

// Lifecycle
export { DocumentLifecycle, canTransition, isTerminalState, terminalStateFor } from './pipeline-state';

// OCR providers
export {
  PlainTextOcrProvider,
  FallbackOcrProvider,
  RoutingOcrProvider,
  recognizeWithTimeout,
  freezeOcrResult,
  linesToBlocks,
  type TimeoutOptions,
} from './ocr';

// Orchestrator
export {
  runBatch,
  validateDocument,
  decide,
  REVIEW_DIR_NAME,
  type DocumentInput,
  type RunBatchOptions,
  type BatchResult,
  type ValidateDocumentOptions,
  type DocumentPreview,
} from './orchestrator';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type RenameBatchJob,
  type RenameBatchResult,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  jobsProcessedCounter,
  documentsDecidedCounter,
  batchDurationHistogram,
  ocrRequestsCounter,
  ocrDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateNamingPolicy, validateBatchReport, schemas, type ValidationResult } from './schemas';

// Utilities
export { deepFreeze, roundConfidence, clampConfidence } from './utils';
