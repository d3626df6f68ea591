import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the scope and detail', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('fetch', 'octo/repo')('fetching https://api.example.com/x');
    createLogger('clear')('done');

    expect(spy.mock.calls).toEqual([['[fetch:octo/repo] fetching https://api.example.com/x'], ['[clear] done']]);
  });
});
