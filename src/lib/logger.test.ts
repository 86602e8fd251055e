import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, sanitise } from './logger';

describe('sanitise', () => {
  it('redacts credential-like keys at any depth', () => {
    expect(
      sanitise({ password: 'test-secret', nested: { apiKey: 'placeholder', ok: 1 }, list: [{ token: 't' }] })
    ).toEqual({
      password: '[REDACTED]',
      nested: { apiKey: '[REDACTED]', ok: 1 },
      list: [{ token: '[REDACTED]' }],
    });
  });

  it('returns primitives unchanged', () => {
    expect(sanitise('plain')).toBe('plain');
    expect(sanitise(null)).toBeNull();
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('writes to stderr with level and context', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('test').info('hello', { secret: 'test-secret' });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/ INFO \[test\] hello$/);
    expect(spy.mock.calls[0][1]).toEqual({ secret: '[REDACTED]' });
  });

  it('only logs errors under the test environment', () => {
    vi.stubEnv('LOG_LEVEL', '');
    vi.stubEnv('NODE_ENV', 'test');
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = createLogger('test');

    log.info('ignored');
    log.warn('ignored');
    log.error('failed', new Error('boom'));

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toMatch(/ ERROR \[test\] failed$/);
    expect(spy.mock.calls[0][1]).toMatchObject({ error: 'boom' });
  });
});
