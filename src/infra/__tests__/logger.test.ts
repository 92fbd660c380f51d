import { describe, it, expect, afterEach, vi } from 'vitest';
import { configureLogger, logger } from '../logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    configureLogger({ level: 'silent', json: false });
  });

  it('should drop messages below the configured level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    configureLogger({ level: 'warn', json: false });

    logger.info('auth', 'Signed in');
    logger.warn('auth', 'Rejected bearer token', { reason: 'UnknownSubject' });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith(
      '[auth] WARN Rejected bearer token {"reason":"UnknownSubject"}'
    );
  });

  it('should write one JSON object per line when json is on', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    configureLogger({ level: 'info', json: true });

    logger.error('db', 'Unexpected database error', { error: 'connection reset' });

    expect(error).toHaveBeenCalledTimes(1);
    const [line] = error.mock.calls[0];
    expect(JSON.parse(String(line))).toMatchObject({
      level: 'error',
      component: 'db',
      message: 'Unexpected database error',
      error: 'connection reset',
    });
  });

  it('should write nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    configureLogger({ level: 'silent', json: false });

    logger.error('http', 'Unhandled error');

    expect(error).not.toHaveBeenCalled();
  });
});
