import { describe, expect, it } from 'vitest';
import { loadConfig, requireToken } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      token: undefined,
      cacheDir: './stargazer_cache',
      userAgent: 'stargazer-fetch/0.1.0',
      maxAttempts: 10,
    });
  });

  it('reads values from the environment', () => {
    expect(
      loadConfig({
        GITHUB_TOKEN: ' test-token ',
        STARGAZER_CACHE_DIR: '/tmp/cache',
        STARGAZER_USER_AGENT: 'my-agent',
        STARGAZER_MAX_ATTEMPTS: '4',
      }),
    ).toEqual({ token: 'test-token', cacheDir: '/tmp/cache', userAgent: 'my-agent', maxAttempts: 4 });
  });

  it('rejects a non-positive attempt budget', () => {
    expect(() => loadConfig({ STARGAZER_MAX_ATTEMPTS: '0' })).toThrow('STARGAZER_MAX_ATTEMPTS must be a positive number.');
  });
});

describe('requireToken', () => {
  it('throws when no token is configured', () => {
    expect(() => requireToken(loadConfig({}))).toThrow('GITHUB_TOKEN is missing');
  });
});
