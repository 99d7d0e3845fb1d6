/**
 * Request-scoped context carrier
 *
 * The logger never reads this store on its own: call sites pass the
 * context explicitly, e.g. `logger.info(getRequestContext(), 'msg')`.
 *
 * @module context
 */

export {
  requestContextStore,
  getRequestContext,
  createRequestContext,
  traceIdFromRequestContext,
  type RequestContext,
} from './context-store';
