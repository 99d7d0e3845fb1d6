import { captureCaller } from './caller';
import { PinoEngine, type LogEngine } from './engine';
import {
  resolveSettings,
  validateSettings,
  type LoggerOption,
  type LoggerSettings,
} from './options';
import { openSinks } from './sinks';
import { TRACE_ID_KEY, type KeyValues, type LogLevel, type TraceIdFn } from './types';

/**
 * Leveled logger bound to one service name.
 *
 * Every call takes the request-scoped context first; when the logger has a
 * trace ID function, the extracted ID is written as `trace_id` after the
 * call-site fields. The function is never called with a null or undefined
 * context.
 */
export class Logger<Ctx = unknown> {
  /**
   * Prefer `createLogger`, which opens the sinks and builds the engine
   */
  constructor(
    private readonly engine: LogEngine,
    private readonly settings: Readonly<LoggerSettings<Ctx>>
  ) {}

  get level(): LogLevel {
    return this.settings.level;
  }

  get outputPaths(): readonly string[] {
    return this.settings.outputPaths;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.engine.isLevelEnabled(level);
  }

  debug(ctx: Ctx | undefined, msg: string, ...keyVals: unknown[]): void {
    this.log('debug', this.debug, ctx, msg, keyVals);
  }

  info(ctx: Ctx | undefined, msg: string, ...keyVals: unknown[]): void {
    this.log('info', this.info, ctx, msg, keyVals);
  }

  warn(ctx: Ctx | undefined, msg: string, ...keyVals: unknown[]): void {
    this.log('warn', this.warn, ctx, msg, keyVals);
  }

  error(ctx: Ctx | undefined, msg: string, ...keyVals: unknown[]): void {
    this.log('error', this.error, ctx, msg, keyVals);
  }

  /**
   * Child logger whose records carry these fields after the parent's.
   * The trace ID function and level are copied; the parent is unchanged.
   */
  with(...keyVals: unknown[]): Logger<Ctx> {
    return new Logger(this.engine.child(keyVals), { ...this.settings });
  }

  /**
   * Write out any buffered records. Loggers derived through `with` share
   * the sinks of their root, so flushing any of them flushes all.
   *
   * @throws FlushError
   */
  flush(): Promise<void> {
    return this.engine.flush();
  }

  private log(
    level: LogLevel,
    anchor: (...args: never[]) => unknown,
    ctx: Ctx | undefined,
    msg: string,
    keyVals: KeyValues
  ): void {
    if (!this.engine.isLevelEnabled(level)) {
      return;
    }

    const traceId = this.traceId(ctx);
    const fields = traceId ? [...keyVals, TRACE_ID_KEY, traceId] : keyVals;
    this.engine.emit(level, msg, fields, { caller: captureCaller(anchor) });
  }

  private traceId(ctx: Ctx | undefined): string {
    const { traceIdFn } = this.settings;
    if (!traceIdFn || ctx === null || ctx === undefined) {
      return '';
    }
    return traceIdFn(ctx);
  }
}

/**
 * Create a logger for `serviceName`.
 *
 * Defaults: level `info`, output `['stdout']`, no trace ID extraction.
 * Options are applied in order and the last one to set a value wins.
 *
 * ```typescript
 * const logger = createLogger(
 *   'billing',
 *   withTraceId(traceIdFromRequestContext),
 *   withLevel('debug'),
 *   withOutputPaths(['stdout', '/var/log/billing.log'])
 * );
 * logger.info(getRequestContext(), 'invoice created', 'invoiceId', id);
 * ```
 *
 * @throws ConfigurationError if the settings are invalid or a sink cannot be opened
 */
export function createLogger<Ctx = unknown>(
  serviceName: string,
  ...options: Array<LoggerOption<Ctx>>
): Logger<Ctx> {
  const settings = resolveSettings(options);
  validateSettings(serviceName, settings);

  const sinks = openSinks(settings.outputPaths);
  const engine = PinoEngine.create(serviceName, settings.level, sinks);
  return new Logger(engine, settings);
}
