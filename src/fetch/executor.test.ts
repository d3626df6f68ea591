import { describe, expect, it } from 'vitest';
import { InMemoryResponseCache } from '../cache/memoryCache.js';
import { FakeApi, FakeClock, jsonReply } from '../testing/fakes.js';
import { createFetchContext, type CacheEntry } from '../types/index.js';
import { classifyResponse, HttpExecutor } from './executor.js';

const URL_A = 'https://api.example.com/repos/octo/repo/stargazers';
const context = createFetchContext({ scope: 'octo/repo', token: 'test-token' });

function setup(cache = new InMemoryResponseCache()) {
  const clock = new FakeClock(1_000);
  const api = new FakeApi(clock);
  const logs: string[] = [];
  const executor = new HttpExecutor({
    cache,
    userAgent: 'stargazer-fetch-test',
    fetchImpl: api.fetch,
    clock,
    logger: (message) => logs.push(message),
  });
  return { api, cache, clock, executor, logs };
}

describe('HttpExecutor', () => {
  it('sends the fixed headers and the bearer token', async () => {
    const { api, executor } = setup();
    api.reply(URL_A, jsonReply([]));

    await executor.execute(context, URL_A);

    expect(api.calls[0]?.headers).toEqual({
      'user-agent': 'stargazer-fetch-test',
      'accept-encoding': 'gzip',
      authorization: 'Bearer test-token',
    });
  });

  it('adds the accept override only when the context carries one', async () => {
    const { api, executor } = setup();
    api.reply(URL_A, jsonReply([]));

    await executor.execute(
      createFetchContext({ scope: 'octo/repo', accept: 'application/vnd.github.v3.star+json' }),
      URL_A,
    );

    expect(api.calls[0]?.headers).toEqual({
      'user-agent': 'stargazer-fetch-test',
      'accept-encoding': 'gzip',
      accept: 'application/vnd.github.v3.star+json',
    });
  });

  it('caches a 200 response before returning it', async () => {
    const { api, cache, executor } = setup();
    api.reply(URL_A, { status: 200, body: '[{"id":1}]', headers: { Link: '<https://next>; rel="next"', 'Content-Type': 'application/json' } });

    const outcome = await executor.execute(context, URL_A);

    const expected: CacheEntry = {
      identity: { method: 'GET', url: URL_A },
      status: 200,
      headers: { link: '<https://next>; rel="next"', 'content-type': 'application/json' },
      body: '[{"id":1}]',
      storedAt: '1970-01-01T00:00:01.000Z',
    };
    expect(outcome).toEqual({ kind: 'success', entry: expected });
    expect(await cache.get('octo/repo', { method: 'GET', url: URL_A })).toEqual(expected);
  });

  it('still succeeds when the cache write fails', async () => {
    class FailingCache extends InMemoryResponseCache {
      override async put(): Promise<void> {
        throw new Error('disk full');
      }
    }
    const { api, executor, logs } = setup(new FailingCache());
    api.reply(URL_A, jsonReply([1]));

    const outcome = await executor.execute(context, URL_A);

    expect(outcome.kind).toBe('success');
    expect(logs).toContain(`unable to cache ${URL_A}, continuing uncached: disk full`);
  });

  it('treats transport failures as transient', async () => {
    const { api, executor } = setup();
    api.reply(URL_A, new Error('socket hang up'));

    expect(await executor.execute(context, URL_A)).toEqual({
      kind: 'transient',
      cause: 'network error: socket hang up',
    });
  });

  it('does not cache failed responses', async () => {
    const { api, cache, executor } = setup();
    api.reply(URL_A, { status: 500, body: 'boom' });

    await executor.execute(context, URL_A);

    expect(cache.size('octo/repo')).toBe(0);
  });
});

describe('classifyResponse', () => {
  it('classifies 202 as transient', () => {
    expect(classifyResponse(URL_A, 202, {}, '', 0)).toEqual({
      kind: 'transient',
      cause: `202 (Accepted) from ${URL_A}; result still being computed`,
    });
  });

  it('classifies an exhausted quota as rate limited', () => {
    const headers = { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000000' };
    expect(classifyResponse(URL_A, 403, headers, '', 0)).toEqual({ kind: 'rate-limited', resetAt: 1_700_000_000_000 });
  });

  it('classifies other 403s as permanent', () => {
    expect(classifyResponse(URL_A, 403, { 'x-ratelimit-remaining': '12', 'x-ratelimit-reset': '1700000000' }, '', 0)).toEqual({
      kind: 'permanent',
      status: 403,
      diagnostic: `GET ${URL_A} returned 403`,
    });
    expect(classifyResponse(URL_A, 403, { 'x-ratelimit-remaining': '0' }, '', 0)).toMatchObject({
      kind: 'permanent',
      status: 403,
    });
  });

  it('uses retry-after on 429 responses', () => {
    expect(classifyResponse(URL_A, 429, { 'retry-after': '30' }, '', 5_000)).toEqual({
      kind: 'rate-limited',
      resetAt: 35_000,
    });
  });

  it('includes a body excerpt in permanent diagnostics', () => {
    expect(classifyResponse(URL_A, 404, {}, '{"message":"Not Found"}', 0)).toEqual({
      kind: 'permanent',
      status: 404,
      diagnostic: `GET ${URL_A} returned 404: {"message":"Not Found"}`,
    });
  });

  it('accepts 200 as success', () => {
    expect(classifyResponse(URL_A, 200, {}, '[]', 0)).toBe('success');
  });
});
