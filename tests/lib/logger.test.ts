import { describe, it, expect, vi } from 'vitest';
import { StructuredLogger, loggers, setLogLevel, isLogLevel, type LogEntry } from '../../src/lib/logger.js';
import { VtnRequestError } from '../../src/lib/errors.js';

function captureStderr() {
  return vi.spyOn(console, 'error').mockImplementation(() => {});
}

function lastEntry(calls: unknown[][]): LogEntry {
  return JSON.parse(String(calls[calls.length - 1]?.[0]));
}

describe('StructuredLogger', () => {
  describe('Basic Logging', () => {
    it('should write one JSON line to stderr', () => {
      const stderrSpy = captureStderr();
      const stdoutSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const logger = new StructuredLogger('TestComponent', { minLevel: 'debug' });

      logger.info('Test message');

      expect(stderrSpy).toHaveBeenCalledOnce();
      expect(stdoutSpy).not.toHaveBeenCalled();
      const entry = lastEntry(stderrSpy.mock.calls);
      expect(entry.level).toBe('info');
      expect(entry.message).toBe('Test message');
      expect(entry.component).toBe('TestComponent');
      expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it('should include context and metadata', () => {
      const stderrSpy = captureStderr();
      const logger = new StructuredLogger('TestComponent', { minLevel: 'debug' });

      logger.debug('VTN request started', { method: 'GET', url: 'https://vtn.example.com/events' }, { attempt: 1 });

      const entry = lastEntry(stderrSpy.mock.calls);
      expect(entry.context).toEqual({ method: 'GET', url: 'https://vtn.example.com/events' });
      expect(entry.metadata).toEqual({ attempt: 1 });
    });

    it('should serialize errors with their code', () => {
      const stderrSpy = captureStderr();
      const logger = new StructuredLogger('TestComponent', { includeStack: false });
      const error = new VtnRequestError('VTN request GET /events failed with status 500', {
        method: 'GET',
        url: 'https://vtn.example.com/events',
        status: 500,
      });

      logger.error('VTN request failed', error, { statusCode: 500 });

      expect(lastEntry(stderrSpy.mock.calls).error).toEqual({
        name: 'VtnRequestError',
        message: 'VTN request GET /events failed with status 500',
        code: 'VTN_REQUEST_ERROR',
      });
    });
  });

  describe('Levels', () => {
    it('should drop entries below the minimum level', () => {
      const stderrSpy = captureStderr();
      const logger = new StructuredLogger('TestComponent', { minLevel: 'warn' });

      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');

      expect(stderrSpy).toHaveBeenCalledOnce();
      expect(lastEntry(stderrSpy.mock.calls).message).toBe('shown');
    });

    it('should write nothing when silent', () => {
      const stderrSpy = captureStderr();
      const logger = new StructuredLogger('TestComponent', { silent: true });

      logger.error('hidden', new Error('boom'));

      expect(stderrSpy).not.toHaveBeenCalled();
    });

    it('should take the minimum level from OADR3_LOG_LEVEL', () => {
      vi.stubEnv('OADR3_LOG_LEVEL', 'DEBUG');
      expect(new StructuredLogger('TestComponent').getMinLevel()).toBe('debug');

      vi.stubEnv('OADR3_LOG_LEVEL', 'verbose');
      expect(new StructuredLogger('TestComponent').getMinLevel()).toBe('warn');
    });

    it('should set the level of every component logger', () => {
      const previous = loggers.auth.getMinLevel();

      setLogLevel('debug');
      expect(Object.values(loggers).map((logger) => logger.getMinLevel())).toEqual([
        'debug',
        'debug',
        'debug',
        'debug',
      ]);

      setLogLevel(previous);
    });
  });

  describe('Custom formatter', () => {
    it('should use the given formatter', () => {
      const stderrSpy = captureStderr();
      const logger = new StructuredLogger('TestComponent', {
        formatter: (entry) => `${entry.level.toUpperCase()} ${entry.message}`,
      });

      logger.warn('Retrying VTN request');

      expect(stderrSpy).toHaveBeenCalledWith('WARN Retrying VTN request');
    });
  });
});

describe('isLogLevel', () => {
  it('should recognise the four levels', () => {
    expect(['debug', 'info', 'warn', 'error'].every((level) => isLogLevel(level))).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
