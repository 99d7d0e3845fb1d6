import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Request context stored in AsyncLocalStorage
 */
export interface RequestContext {
  requestId: string;
  traceId?: string;
  startTime: number;
  method: string;
  url: string;
  metadata: Record<string, unknown>;
}

/**
 * AsyncLocalStorage for request context propagation
 */
export const requestContextStore = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStore.getStore();
}

/**
 * Create a new request context
 */
export function createRequestContext(
  requestId: string,
  method: string,
  url: string,
  traceId?: string
): RequestContext {
  return {
    requestId,
    traceId,
    startTime: Date.now(),
    method,
    url,
    metadata: {},
  };
}

/**
 * Trace ID extractor for loggers whose call sites pass a RequestContext.
 * Returns an empty string when the context carries no trace ID.
 */
export function traceIdFromRequestContext(ctx: RequestContext): string {
  return ctx.traceId ?? '';
}
