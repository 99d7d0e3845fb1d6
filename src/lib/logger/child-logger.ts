import type { RequestContext } from '../context/context-store';
import type { Logger } from './logger';

/**
 * Create a child logger with component context
 *
 * Useful for identifying which part of the application emitted the log
 */
export function createComponentLogger<Ctx>(
  logger: Logger<Ctx>,
  component: string,
  ...keyVals: unknown[]
): Logger<Ctx> {
  return logger.with('component', component, ...keyVals);
}

/**
 * Create a child logger bound to one request
 */
export function createRequestLogger<Ctx>(
  logger: Logger<Ctx>,
  context: RequestContext
): Logger<Ctx> {
  return logger.with(
    'request_id',
    context.requestId,
    'method',
    context.method,
    'url',
    context.url
  );
}
