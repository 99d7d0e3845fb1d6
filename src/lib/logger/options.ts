import { z } from 'zod';
import { ConfigurationError } from '../../types/errors';
import { LOG_LEVELS, type LogLevel, type TraceIdFn } from './types';

/**
 * Settings a logger is built from
 */
export interface LoggerSettings<Ctx> {
  level: LogLevel;
  outputPaths: string[];
  traceIdFn?: TraceIdFn<Ctx>;
}

export interface LevelOption {
  readonly kind: 'level';
  readonly level: LogLevel;
}

export interface OutputPathsOption {
  readonly kind: 'outputPaths';
  readonly outputPaths: readonly string[];
}

export interface TraceIdOption<Ctx> {
  readonly kind: 'traceId';
  readonly traceIdFn: TraceIdFn<Ctx>;
}

/**
 * A configuration step. Options are applied in order over the defaults, so
 * the last option to set a value wins.
 */
export type LoggerOption<Ctx> = LevelOption | OutputPathsOption | TraceIdOption<Ctx>;

export const DEFAULT_LEVEL: LogLevel = 'info';
export const DEFAULT_OUTPUT_PATHS: readonly string[] = ['stdout'];

/**
 * Default settings: info level, stdout, no trace ID extraction
 */
export function defaultSettings<Ctx>(): LoggerSettings<Ctx> {
  return {
    level: DEFAULT_LEVEL,
    outputPaths: [...DEFAULT_OUTPUT_PATHS],
  };
}

/**
 * Set the function used to pull a trace ID out of each call's context
 */
export function withTraceId<Ctx>(traceIdFn: TraceIdFn<Ctx>): TraceIdOption<Ctx> {
  return { kind: 'traceId', traceIdFn };
}

/**
 * Set the minimum level that is written
 */
export function withLevel(level: LogLevel): LevelOption {
  return { kind: 'level', level };
}

/**
 * Replace the output sinks (see `openSinks` for accepted identifiers)
 */
export function withOutputPaths(outputPaths: readonly string[]): OutputPathsOption {
  return { kind: 'outputPaths', outputPaths: [...outputPaths] };
}

/**
 * Return new settings with one option applied
 */
export function applyOption<Ctx>(
  settings: LoggerSettings<Ctx>,
  option: LoggerOption<Ctx>
): LoggerSettings<Ctx> {
  switch (option.kind) {
    case 'level':
      return { ...settings, level: option.level };
    case 'outputPaths':
      return { ...settings, outputPaths: [...option.outputPaths] };
    case 'traceId':
      return { ...settings, traceIdFn: option.traceIdFn };
  }
}

/**
 * Apply options over the defaults
 */
export function resolveSettings<Ctx>(
  options: ReadonlyArray<LoggerOption<Ctx>>
): LoggerSettings<Ctx> {
  return options.reduce<LoggerSettings<Ctx>>(
    (settings, option) => applyOption(settings, option),
    defaultSettings<Ctx>()
  );
}

// ============================================================================
// Validation
// ============================================================================

export const loggerSettingsSchema = z.object({
  serviceName: z.string().trim().min(1, 'Service name is required'),
  level: z.enum(LOG_LEVELS),
  outputPaths: z
    .array(z.string().min(1, 'Output path must not be empty'))
    .min(1, 'At least one output path is required'),
  traceIdFn: z.function().optional(),
});

/**
 * Check resolved settings before the engine is built
 *
 * @throws ConfigurationError naming the first offending setting
 */
export function validateSettings<Ctx>(
  serviceName: string,
  settings: LoggerSettings<Ctx>
): void {
  const result = loggerSettingsSchema.safeParse({ serviceName, ...settings });
  if (result.success) {
    return;
  }

  const issue = result.error.issues[0];
  const configKey = issue?.path[0] !== undefined ? String(issue.path[0]) : undefined;
  const received: Record<string, unknown> = { serviceName, ...settings };

  throw new ConfigurationError(
    `Invalid logger configuration: ${issue?.message ?? 'unknown error'}`,
    { configKey, actualValue: configKey ? received[configKey] : undefined }
  );
}
