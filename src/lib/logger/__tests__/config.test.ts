import { describe, it, expect } from 'vitest';
import { getLogLevel, getOutputPaths, loggerOptionsFromEnv } from '../config';
import { resolveSettings, withLevel } from '../options';

describe('Logger Configuration', () => {
  describe('getLogLevel', () => {
    it('should return default log level when LOG_LEVEL not set', () => {
      expect(getLogLevel({})).toBe('info');
    });

    it('should return log level from environment', () => {
      expect(getLogLevel({ LOG_LEVEL: 'debug' })).toBe('debug');
    });

    it('should handle uppercase log level', () => {
      expect(getLogLevel({ LOG_LEVEL: 'ERROR' })).toBe('error');
    });

    it('should return default for invalid log level', () => {
      expect(getLogLevel({ LOG_LEVEL: 'verbose' })).toBe('info');
    });
  });

  describe('getOutputPaths', () => {
    it('should default to stdout', () => {
      expect(getOutputPaths({})).toEqual(['stdout']);
    });

    it('should split comma separated paths', () => {
      expect(getOutputPaths({ LOG_OUTPUT_PATHS: 'stdout, /var/log/app.log' })).toEqual([
        'stdout',
        '/var/log/app.log',
      ]);
    });

    it('should drop blank entries', () => {
      expect(getOutputPaths({ LOG_OUTPUT_PATHS: ' , stderr,,' })).toEqual(['stderr']);
    });

    it('should default when only blanks are given', () => {
      expect(getOutputPaths({ LOG_OUTPUT_PATHS: ' , ' })).toEqual(['stdout']);
    });
  });

  describe('loggerOptionsFromEnv', () => {
    it('should produce options for level and output paths', () => {
      const settings = resolveSettings(
        loggerOptionsFromEnv({ LOG_LEVEL: 'warn', LOG_OUTPUT_PATHS: 'stderr' })
      );
      expect(settings).toEqual({ level: 'warn', outputPaths: ['stderr'] });
    });

    it('should be overridden by later explicit options', () => {
      const settings = resolveSettings([
        ...loggerOptionsFromEnv({ LOG_LEVEL: 'warn' }),
        withLevel('debug'),
      ]);
      expect(settings.level).toBe('debug');
    });
  });
});
