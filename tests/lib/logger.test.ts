import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { StructuredLogger, createComponentLogger, isLogLevel } from '../../src/lib/logger.js';

describe('StructuredLogger', () => {
  let logger: StructuredLogger;

  beforeEach(() => {
    logger = new StructuredLogger('TestComponent', { minLevel: 'debug' });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const lastEntry = (method: 'log' | 'error' | 'warn' | 'debug') => {
    const calls = vi.mocked(console[method]).mock.calls;
    return JSON.parse(String(calls[calls.length - 1][0]));
  };

  it('should log info messages as JSON', () => {
    logger.info('Test message', { url: '/api/v1/campaigns.json' });

    expect(console.log).toHaveBeenCalledOnce();
    const parsed = lastEntry('log');
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('Test message');
    expect(parsed.component).toBe('TestComponent');
    expect(parsed.context.url).toBe('/api/v1/campaigns.json');
    expect(parsed.timestamp).toBeDefined();
  });

  it('should filter entries below the minimum level', () => {
    const quiet = new StructuredLogger('Quiet');

    quiet.debug('hidden');
    quiet.info('hidden');
    quiet.warn('shown');

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledOnce();
    expect(quiet.getMinLevel()).toBe('warn');
  });

  it('should record error details', () => {
    const error = Object.assign(new Error('boom'), { code: 'ECONNREFUSED' });

    logger.error('Request failed', error);

    const parsed = lastEntry('error');
    expect(parsed.error.name).toBe('Error');
    expect(parsed.error.message).toBe('boom');
    expect(parsed.error.code).toBe('ECONNREFUSED');
    expect(parsed.error.stack).toBeDefined();
  });

  it('should not print when console output is disabled', () => {
    const silent = new StructuredLogger('Silent', { console: false });

    silent.error('nothing');

    expect(console.error).not.toHaveBeenCalled();
  });

  describe('trackAsync', () => {
    it('should log completion with duration and return the result', async () => {
      const result = await logger.trackAsync('Token request', async () => 'ok', { requestId: 'req-1' });

      expect(result).toBe('ok');
      const parsed = lastEntry('log');
      expect(parsed.message).toBe('Token request completed');
      expect(parsed.context.requestId).toBe('req-1');
      expect(typeof parsed.context.duration).toBe('number');
    });

    it('should log the failure and rethrow the original error', async () => {
      const error = new Error('refused');

      await expect(logger.trackAsync('Token request', async () => {
        throw error;
      })).rejects.toBe(error);

      const parsed = lastEntry('error');
      expect(parsed.message).toBe('Token request failed');
      expect(parsed.error.message).toBe('refused');
      expect(parsed.context.requestId).toMatch(/^[0-9a-f-]{36}$/);
    });
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

describe('createComponentLogger', () => {
  it('should disable console output when TARGET_LOG_LEVEL is unset', () => {
    const logger = createComponentLogger('Auth', {});

    expect(logger.isConsoleEnabled()).toBe(false);
    expect(logger.getMinLevel()).toBe('warn');
  });

  it('should enable output at the requested level', () => {
    const logger = createComponentLogger('Auth', { TARGET_LOG_LEVEL: 'DEBUG' });

    expect(logger.isConsoleEnabled()).toBe(true);
    expect(logger.getMinLevel()).toBe('debug');
  });

  it('should stay silent for an unknown level', () => {
    expect(createComponentLogger('Auth', { TARGET_LOG_LEVEL: 'verbose' }).isConsoleEnabled()).toBe(false);
  });
});
