/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and the document currently being processed
 * through an extraction request using Node.js AsyncLocalStorage.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export type PipelineName = 'bureau' | 'gst_sales' | 'parse';

export interface RequestContext {
  correlationId: string;
  documentName?: string;
  pipeline?: PipelineName;
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
 * Run an async function in a child context that inherits the current correlation ID
 * and overrides the document being processed.
 */
export async function withDocumentContext<T>(
  documentName: string,
  pipeline: PipelineName,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  return asyncLocalStorage.run(
    {
      correlationId: parent?.correlationId || ulid(),
      documentName,
      pipeline,
    },
    fn
  );
}

export { asyncLocalStorage };
