/**
 * Levels the logger emits, lowest first
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Key under which an extracted trace ID is written
 */
export const TRACE_ID_KEY = 'trace_id';

/**
 * Extracts a trace ID from a request-scoped context.
 * An empty string means no trace ID is available.
 */
export type TraceIdFn<Ctx> = (ctx: Ctx) => string;

/**
 * Alternating keys and values, e.g. `['userId', 42, 'ok', true]`
 */
export type KeyValues = readonly unknown[];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}
