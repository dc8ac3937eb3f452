/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID, batch ID and document ID across the
 * asynchronous stages of a batch run (OCR calls, queue jobs).
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  batchId?: string;
  documentId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function in a child context that inherits the current one.
 * Used per document inside a batch so log lines carry both IDs.
 */
export async function runWithDocumentContext<T>(
  documentId: string,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  return asyncLocalStorage.run(
    {
      correlationId: parent?.correlationId || ulid(),
      batchId: parent?.batchId,
      documentId,
    },
    fn
  );
}

export { asyncLocalStorage };
