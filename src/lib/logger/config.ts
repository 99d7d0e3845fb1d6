import {
  DEFAULT_LEVEL,
  DEFAULT_OUTPUT_PATHS,
  withLevel,
  withOutputPaths,
  type LevelOption,
  type OutputPathsOption,
} from './options';
import { isLogLevel, type LogLevel } from './types';

type Env = Record<string, string | undefined>;

/**
 * Get log level from environment (`LOG_LEVEL`, case-insensitive)
 */
export function getLogLevel(env: Env = process.env): LogLevel {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(level) ? level : DEFAULT_LEVEL;
}

/**
 * Get output sinks from environment (`LOG_OUTPUT_PATHS`, comma separated)
 */
export function getOutputPaths(env: Env = process.env): string[] {
  const paths = (env.LOG_OUTPUT_PATHS ?? '')
    .split(',')
    .map((path) => path.trim())
    .filter((path) => path.length > 0);

  return paths.length > 0 ? paths : [...DEFAULT_OUTPUT_PATHS];
}

/**
 * Options read from the environment. Put them before explicit options so
 * that explicit options win.
 */
export function loggerOptionsFromEnv(
  env: Env = process.env
): Array<LevelOption | OutputPathsOption> {
  return [withLevel(getLogLevel(env)), withOutputPaths(getOutputPaths(env))];
}
