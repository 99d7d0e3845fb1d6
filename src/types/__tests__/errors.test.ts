/**
 * Error Types Tests
 */

import { describe, it, expect } from 'vitest';
import { LoggerError, ConfigurationError, FlushError, toError } from '../errors';

describe('Error Types', () => {
  describe('ConfigurationError', () => {
    it('should be a non-recoverable LoggerError', () => {
      const error = new ConfigurationError('Bad sink', {
        configKey: 'outputPaths',
        actualValue: ['nowhere://x'],
      });

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(LoggerError);
      expect(error.name).toBe('ConfigurationError');
      expect(error.message).toBe('Bad sink');
      expect(error.recoverable).toBe(false);
      expect(error.configKey).toBe('outputPaths');
      expect(error.context).toEqual({
        configKey: 'outputPaths',
        actualValue: ['nowhere://x'],
      });
    });

    it('should keep the cause', () => {
      const cause = new Error('ENOENT');
      const error = new ConfigurationError('Cannot open', { cause });

      expect(error.errorCause).toBe(cause);
    });
  });

  describe('FlushError', () => {
    it('should be a recoverable LoggerError naming the sink', () => {
      const cause = new Error('EPIPE');
      const error = new FlushError('Flush failed', { sink: 'stdout', cause });

      expect(error).toBeInstanceOf(LoggerError);
      expect(error.name).toBe('FlushError');
      expect(error.recoverable).toBe(true);
      expect(error.sink).toBe('stdout');
      expect(error.context).toEqual({ sink: 'stdout' });
      expect(error.errorCause).toBe(cause);
      expect(error.failures).toEqual([]);
    });

    it('should list every failed sink', () => {
      const failures = [
        { sink: 'mem://a', message: 'a failed' },
        { sink: 'mem://b', message: 'b failed' },
      ];
      const error = new FlushError('Flush failed', { sink: 'mem://a', failures });

      expect(error.failures).toEqual(failures);
      expect(error.context).toEqual({ sink: 'mem://a', failures });
    });
  });

  describe('toError', () => {
    it('should return errors unchanged', () => {
      const error = new Error('x');
      expect(toError(error)).toBe(error);
    });

    it('should wrap other values', () => {
      expect(toError('boom').message).toBe('boom');
    });
  });
});
