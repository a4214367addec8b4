/**
 * @fileoverview Request context propagation using AsyncLocalStorage.
 * Every log line written while serving one relay client carries the same request_id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** Unique request identifier (UUID v4) */
  request_id: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Generate a new request ID (UUID v4).
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Current request context, or undefined outside of one.
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Current request ID, or undefined outside of a request context.
 */
export function getRequestId(): string | undefined {
  return getRequestContext()?.request_id;
}

/**
 * Run `fn` inside a new request context. The ID follows all async work started from `fn`.
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   logger.info('Client connected'); // includes request_id
 *   await serveClient(socket);
 * }, undefined, { remote: '127.0.0.1:50123' });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    request_id: requestId || generateRequestId(),
    ...additionalContext,
  };

  return requestContextStorage.run(context, fn);
}
