import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatLog, logDebug, logError, logInfo, logWarn } from './logger';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('should format entries as JSON with context and extra fields', () => {
    const entry = JSON.parse(formatLog('info', 'resampler', 'Reduced profile', { stride: 4 }));

    expect(entry.level).toBe('info');
    expect(entry.context).toBe('resampler');
    expect(entry.message).toBe('Reduced profile');
    expect(entry.stride).toBe(4);
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should write to stderr only at or above LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    vi.stubEnv('NODE_ENV', 'test');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logDebug('test', 'hidden');
    logInfo('test', 'shown');
    logWarn('test', 'shown too');

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should default to warnings and errors', () => {
    vi.stubEnv('LOG_LEVEL', '');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logInfo('test', 'hidden');
    logWarn('test', 'shown');
    logError('test', new Error('boom'));

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(JSON.parse(errorSpy.mock.calls[1][0]).message).toBe('boom');
  });

  it('should never log debug output in production', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.stubEnv('NODE_ENV', 'production');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logDebug('test', 'hidden');

    expect(errorSpy).not.toHaveBeenCalled();
  });
});
