/**
 * Error hierarchy for the renaming pipeline.
 *
 * Only OCR collaborator failures and configuration errors cross the
 * pipeline boundary; everything else degrades confidence instead.
 */

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'OCR_UNAVAILABLE'
  | 'OCR_TIMEOUT'
  | 'POLICY_MISCONFIGURATION'
  | 'MISSING_TEMPLATE_FIELD'
  | 'COLLISION_RESOLUTION_EXHAUSTED'
  | 'BATCH_ABORTED';

/**
 * Base error class for all pipeline errors
 */
export class DocNamerError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Empty or unusable OCR text. Absorbed as zero confidence. */
export class InvalidInputError extends DocNamerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_INPUT', context);
  }
}

export class OcrUnavailableError extends DocNamerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'OCR_UNAVAILABLE', context);
  }
}

export class OcrTimeoutError extends DocNamerError {
  constructor(timeoutMs: number, context?: Record<string, unknown>) {
    super(`OCR call exceeded ${timeoutMs}ms`, 'OCR_TIMEOUT', { timeoutMs, ...context });
  }
}

/** Fatal: aborts the batch before any document is touched. */
export class PolicyMisconfigurationError extends DocNamerError {
  public readonly issues: string[];

  constructor(issues: string[], code: ErrorCode = 'POLICY_MISCONFIGURATION') {
    super(`Naming policy is invalid: ${issues.join('; ')}`, code, { issues });
    this.issues = issues;
  }
}

export class MissingTemplateFieldError extends PolicyMisconfigurationError {
  public readonly field: string;
  public readonly template: string;

  constructor(field: string, template: string) {
    super([`template "${template}" references undeclared field "${field}"`], 'MISSING_TEMPLATE_FIELD');
    this.field = field;
    this.template = template;
  }
}

export class CollisionResolutionExhaustedError extends DocNamerError {
  constructor(fileName: string, attempts: number) {
    super(
      `No free name for "${fileName}" after ${attempts} attempts`,
      'COLLISION_RESOLUTION_EXHAUSTED',
      { fileName, attempts }
    );
  }
}

export class BatchAbortedError extends DocNamerError {
  constructor(reason: string) {
    super(`Batch aborted: ${reason}`, 'BATCH_ABORTED', { reason });
  }
}

export function isDocNamerError(error: unknown): error is DocNamerError {
  return error instanceof DocNamerError;
}

/** Fatal errors stop the whole batch instead of failing one document. */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof PolicyMisconfigurationError ||
    error instanceof CollisionResolutionExhaustedError
  );
}
