/**
 * Request and batch context
 *
 * Correlation ids travel through AsyncLocalStorage so that every log line of
 * one HTTP request, or of one CSV row in a batch run, can be grouped.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  /** Batch run the current work belongs to */
  batchId?: string;
  /** Source row identifier (CSV id column) */
  sourceId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Correlation id of the current context; a fresh ulid outside any context.
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run `fn` for one source row: the correlation and batch ids of the
 * enclosing context are kept and the row id is added.
 */
export async function runForSourceRow<T>(
  sourceId: string | null,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  return asyncLocalStorage.run(
    {
      correlationId: parent?.correlationId || ulid(),
      batchId: parent?.batchId,
      sourceId: sourceId ?? undefined,
    },
    fn
  );
}

export { asyncLocalStorage };
