/**
 * Error Types
 * Errors surfaced by logger construction, sink registration and flushing
 */

/**
 * Base error class for logger failures
 */
export abstract class LoggerError extends Error {
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;
  public readonly errorCause?: Error;

  constructor(
    message: string,
    options: {
      recoverable: boolean;
      context?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = this.constructor.name;
    this.recoverable = options.recoverable;
    this.context = options.context;
    this.errorCause = options.cause;
  }
}

/**
 * Configuration errors
 *
 * Raised when a logger cannot be built from its settings, or when a sink
 * scheme cannot be registered. No logger is produced.
 */
export class ConfigurationError extends LoggerError {
  public readonly configKey?: string;

  constructor(
    message: string,
    options: {
      configKey?: string;
      actualValue?: unknown;
      cause?: Error;
    } = {}
  ) {
    super(message, {
      recoverable: false,
      context: {
        configKey: options.configKey,
        actualValue: options.actualValue,
      },
      cause: options.cause,
    });
    this.configKey = options.configKey;
  }
}

/**
 * Flush errors
 *
 * Raised when a sink fails while buffered records are forced out, or when a
 * write failed since the last flush. Some records may not have reached the
 * sink.
 */
export class FlushError extends LoggerError {
  public readonly sink?: string;
  public readonly failures: ReadonlyArray<{ sink?: string; message: string }>;

  constructor(
    message: string,
    options: {
      sink?: string;
      cause?: Error;
      failures?: ReadonlyArray<{ sink?: string; message: string }>;
    } = {}
  ) {
    super(message, {
      recoverable: true,
      context: {
        sink: options.sink,
        failures: options.failures,
      },
      cause: options.cause,
    });
    this.sink = options.sink;
    this.failures = options.failures ?? [];
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
