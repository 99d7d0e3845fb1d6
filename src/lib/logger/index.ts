/**
 * Pino-based Structured Logging Facade
 *
 * Features:
 * - Functional options for level, output sinks and trace ID extraction
 * - `trace_id` injected from the request context on every call
 * - Child loggers carrying persistent fields
 * - Registered sink schemes alongside stdout, stderr and files
 *
 * Usage:
 * ```typescript
 * import { createLogger, withTraceId } from './lib/logger';
 *
 * const logger = createLogger('checkout', withTraceId((ctx: Ctx) => ctx.traceId ?? ''));
 * const child = logger.with('component', 'cart');
 * child.info(ctx, 'item added', 'sku', 'A-1');
 * await logger.flush();
 * ```
 *
 * @module logger
 */

export { Logger, createLogger } from './logger';

export {
  withTraceId,
  withLevel,
  withOutputPaths,
  applyOption,
  resolveSettings,
  validateSettings,
  defaultSettings,
  DEFAULT_LEVEL,
  DEFAULT_OUTPUT_PATHS,
  type LoggerOption,
  type LevelOption,
  type OutputPathsOption,
  type TraceIdOption,
  type LoggerSettings,
} from './options';

export { getLogLevel, getOutputPaths, loggerOptionsFromEnv } from './config';

export {
  PinoEngine,
  buildPinoOptions,
  sweetenFields,
  IGNORED_KEY_MESSAGE,
  INVALID_PAIRS_MESSAGE,
  type LogEngine,
  type EmitMeta,
  type SweetenedFields,
} from './engine';

export {
  registerSink,
  openSink,
  openSinks,
  flushSink,
  type Sink,
  type SinkFactory,
  type OpenedSink,
} from './sinks';

export { createComponentLogger, createRequestLogger } from './child-logger';

export {
  LOG_LEVELS,
  TRACE_ID_KEY,
  isLogLevel,
  type LogLevel,
  type TraceIdFn,
  type KeyValues,
} from './types';
