import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, redactSensitive, createLogEntry, shouldLog } from './logger';

describe('logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.LOG_LEVEL;
  });

  describe('redactSensitive', () => {
    it('redacts sensitive keys regardless of case', () => {
      const result = redactSensitive({
        ticker: 'SPY',
        apiKey: 'test-key',
        Authorization: 'Bearer test-token',
      });
      expect(result).toEqual({
        ticker: 'SPY',
        apiKey: '[REDACTED]',
        Authorization: '[REDACTED]',
      });
    });

    it('redacts nested sensitive keys but leaves arrays alone', () => {
      const result = redactSensitive({
        request: { shares: 200, token: 'test-token' },
        strategies: ['collar'],
      });
      expect(result.request).toEqual({ shares: 200, token: '[REDACTED]' });
      expect(result.strategies).toEqual(['collar']);
    });
  });

  describe('createLogEntry', () => {
    it('creates a log entry with timestamp', () => {
      const entry = createLogEntry('info', 'Backtest submitted');
      expect(entry.level).toBe('info');
      expect(entry.message).toBe('Backtest submitted');
      expect(entry.data).toBeUndefined();
      expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
    });

    it('includes redacted data', () => {
      const entry = createLogEntry('warn', 'test', { strategy: 'collar', secret: 'hidden' });
      expect(entry.data).toEqual({ strategy: 'collar', secret: '[REDACTED]' });
    });
  });

  describe('shouldLog', () => {
    it('respects LOG_LEVEL environment variable', () => {
      process.env.LOG_LEVEL = 'warn';
      expect(shouldLog('debug')).toBe(false);
      expect(shouldLog('info')).toBe(false);
      expect(shouldLog('warn')).toBe(true);
      expect(shouldLog('error')).toBe(true);
    });

    it('defaults to info level', () => {
      expect(shouldLog('debug')).toBe(false);
      expect(shouldLog('info')).toBe(true);
    });

    it('falls back to info for an unknown level', () => {
      process.env.LOG_LEVEL = 'verbose';
      expect(shouldLog('debug')).toBe(false);
      expect(shouldLog('info')).toBe(true);
    });

    it('accepts upper-case level names', () => {
      process.env.LOG_LEVEL = 'ERROR';
      expect(shouldLog('warn')).toBe(false);
      expect(shouldLog('error')).toBe(true);
    });
  });

  describe('logger methods', () => {
    it('writes info entries as JSON lines', () => {
      logger.info('test info', { months: 12 });
      expect(console.log).toHaveBeenCalledTimes(1);
      const line = vi.mocked(console.log).mock.calls[0][0] as string;
      const parsed = JSON.parse(line) as { level: string; message: string; data: unknown };
      expect(parsed.level).toBe('info');
      expect(parsed.message).toBe('test info');
      expect(parsed.data).toEqual({ months: 12 });
    });

    it('logs warn messages', () => {
      logger.warn('test warn');
      expect(console.warn).toHaveBeenCalled();
    });

    it('logs error messages', () => {
      logger.error('test error');
      expect(console.error).toHaveBeenCalled();
    });

    it('does not log debug when level is info', () => {
      logger.debug('test debug');
      expect(console.log).not.toHaveBeenCalled();
    });
  });
});
