import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { FlushError, toError } from '../../types/errors';
import { flushSink, type OpenedSink } from './sinks';
import type { KeyValues, LogLevel } from './types';

/**
 * Per-record metadata the facade adds alongside the caller's fields
 */
export interface EmitMeta {
  caller?: string;
}

/**
 * Minimal contract of the structured logging backend behind a Logger.
 * Implementations must be safe to call from any number of concurrent
 * call sites without extra locking.
 */
export interface LogEngine {
  emit(level: LogLevel, msg: string, keyVals: KeyValues, meta?: EmitMeta): void;
  child(keyVals: KeyValues): LogEngine;
  isLevelEnabled(level: LogLevel): boolean;
  flush(): Promise<void>;
}

/**
 * Result of turning alternating keys and values into a field object
 */
export interface SweetenedFields {
  fields: Record<string, unknown>;
  /** Trailing key that had no value */
  ignored?: unknown;
  /** Pairs whose key was not a string */
  invalid: Array<[unknown, unknown]>;
}

export const IGNORED_KEY_MESSAGE = 'Ignored key without a value.';
export const INVALID_PAIRS_MESSAGE = 'Ignored key-value pairs with non-string keys.';

/**
 * Turn `['a', 1, 'b', 2]` into `{ a: 1, b: 2 }`. Keys keep their first
 * position; a repeated key takes its last value.
 */
export function sweetenFields(keyVals: KeyValues): SweetenedFields {
  const entries = new Map<string, unknown>();
  const invalid: Array<[unknown, unknown]> = [];
  let ignored: unknown;
  let hasIgnored = false;

  for (let i = 0; i < keyVals.length; i += 2) {
    const key = keyVals[i];
    if (i === keyVals.length - 1) {
      ignored = key;
      hasIgnored = true;
      break;
    }

    const value = keyVals[i + 1];
    if (typeof key !== 'string') {
      invalid.push([key, value]);
      continue;
    }
    entries.set(key, value);
  }

  return {
    fields: Object.fromEntries(entries),
    invalid,
    ...(hasIgnored ? { ignored } : {}),
  };
}

/**
 * Pino options for the record format:
 * `{"level":"info","ts":"<ISO-8601>","service":"<name>",...fields,"msg":"..."}`
 */
export function buildPinoOptions(serviceName: string, level: LogLevel): LoggerOptions {
  return {
    level,
    base: { service: serviceName },
    messageKey: 'msg',
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Sinks and pending write failures, shared by a root engine and its children
 */
interface EngineState {
  readonly sinks: readonly OpenedSink[];
  emitError?: Error;
}

interface SinkFailure {
  sink?: string;
  error: Error;
}

/**
 * LogEngine backed by pino. All engines derived through `child` share the
 * sinks of the root engine.
 *
 * `emit` never throws: write failures are held until the next `flush`,
 * which reports them as a FlushError.
 */
export class PinoEngine implements LogEngine {
  private constructor(
    private readonly logger: PinoLogger,
    private readonly state: EngineState
  ) {}

  static create(serviceName: string, level: LogLevel, sinks: readonly OpenedSink[]): PinoEngine {
    const destination =
      sinks.length === 1
        ? sinks[0].stream
        : pino.multistream(sinks.map(({ stream }) => ({ stream, level })));

    return new PinoEngine(pino(buildPinoOptions(serviceName, level), destination), { sinks });
  }

  emit(level: LogLevel, msg: string, keyVals: KeyValues, meta: EmitMeta = {}): void {
    if (!this.logger.isLevelEnabled(level)) {
      return;
    }

    try {
      const { fields } = this.sweeten(keyVals);
      const record = meta.caller ? { caller: meta.caller, ...fields } : fields;
      this.logger[level](record, msg);
    } catch (error) {
      this.state.emitError = toError(error);
    }
  }

  child(keyVals: KeyValues): PinoEngine {
    const { fields } = this.sweeten(keyVals);
    return new PinoEngine(this.logger.child(fields), this.state);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.isLevelEnabled(level);
  }

  /**
   * Flush every sink, even after one fails. Rejects with a FlushError for
   * the first failure; all failures are listed in its `failures`.
   */
  async flush(): Promise<void> {
    const { sinks } = this.state;
    const results = await Promise.allSettled(sinks.map((sink) => flushOne(sink)));

    const failures: SinkFailure[] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        failures.push({ sink: sinks[index].path, error: toError(result.reason) });
      }
    });

    const { emitError } = this.state;
    if (emitError) {
      this.state.emitError = undefined;
      failures.push({ error: emitError });
    }

    const [first] = failures;
    if (!first) {
      return;
    }
    throw new FlushError(
      first.sink ? `Failed to flush sink "${first.sink}"` : 'Failed to write a log record',
      {
        sink: first.sink,
        cause: first.error,
        failures: failures.map(({ sink, error }) => ({ sink, message: error.message })),
      }
    );
  }

  /**
   * Malformed pairs are reported as separate error records, then dropped
   */
  private sweeten(keyVals: KeyValues): SweetenedFields {
    const sweetened = sweetenFields(keyVals);

    if (sweetened.invalid.length > 0) {
      this.logger.error({ invalid: sweetened.invalid }, INVALID_PAIRS_MESSAGE);
    }
    if ('ignored' in sweetened) {
      this.logger.error({ ignored: sweetened.ignored }, IGNORED_KEY_MESSAGE);
    }
    return sweetened;
  }
}

/**
 * Flush one sink, then surface a write failure it recorded since the last flush
 */
async function flushOne(sink: OpenedSink): Promise<void> {
  const { lastError } = sink;
  sink.lastError = undefined;

  await flushSink(sink.stream);
  if (lastError) {
    throw lastError;
  }
}
