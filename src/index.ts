export * from './lib/logger';
export * from './lib/context';
export { LoggerError, ConfigurationError, FlushError } from './types/errors';
