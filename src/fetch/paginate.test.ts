import { describe, expect, it } from 'vitest';
import { InMemoryResponseCache } from '../cache/memoryCache.js';
import { jot } from '../jot.js';
import { FakeApi, FakeClock, jsonReply, linkTo } from '../testing/fakes.js';
import { createFetchContext } from '../types/index.js';
import { Fetcher } from './fetcher.js';
import { collectPages } from './paginate.js';

const BASE = 'https://api.example.com/users/octocat/followers';
const PAGE_2 = `${BASE}?page=2`;
const PAGE_3 = `${BASE}?page=3`;
const UNPAGED = `${BASE}?per_page=100`;
const context = createFetchContext({ scope: 'octo/repo', token: 'test-token' });
const logins = jot.array(jot.object({ login: jot.string() }));

function setup() {
  const clock = new FakeClock();
  const api = new FakeApi(clock);
  const fetcher = new Fetcher({ cache: new InMemoryResponseCache(), fetchImpl: api.fetch, clock });
  api
    .reply(BASE, jsonReply([{ login: 'ada' }, { login: 'brian' }], linkTo(PAGE_2, PAGE_3)))
    .reply(PAGE_2, jsonReply([{ login: 'grace' }], linkTo(PAGE_3, PAGE_3)))
    .reply(PAGE_3, jsonReply([{ login: 'ken' }, { login: 'linus' }]))
    .reply(UNPAGED, jsonReply([{ login: 'ada' }, { login: 'brian' }, { login: 'grace' }, { login: 'ken' }, { login: 'linus' }]));
  return { api, fetcher };
}

describe('collectPages', () => {
  it('concatenates every page in order, matching the unpaged collection', async () => {
    const { fetcher } = setup();

    const paged = await collectPages(fetcher, context, BASE, logins);
    const unpaged = await collectPages(fetcher, context, UNPAGED, logins);

    expect(paged.pages).toBe(3);
    expect(paged.skipped).toEqual([]);
    expect(paged.items).toEqual(unpaged.items);
    expect(unpaged.pages).toBe(1);
  });

  it('stops requesting pages once maxItems is reached', async () => {
    const { api, fetcher } = setup();

    const result = await collectPages(fetcher, context, BASE, logins, { maxItems: 2 });

    expect(result.items.map((user) => user.login)).toEqual(['ada', 'brian']);
    expect(result.pages).toBe(1);
    expect(api.calls).toHaveLength(1);
  });

  it('reports the page it could not fetch and keeps what it has', async () => {
    const { api, fetcher } = setup();
    const missing = `${BASE}?page=9`;
    api.reply(missing, { status: 404 });
    api.reply(`${BASE}?start=1`, jsonReply([{ login: 'ada' }], linkTo(missing)));

    const result = await collectPages(fetcher, context, `${BASE}?start=1`, logins);

    expect(result).toEqual({ items: [{ login: 'ada' }], pages: 1, skipped: [missing] });
  });

  it('reports progress after each page', async () => {
    const { fetcher } = setup();
    const progress: Array<[number, number]> = [];

    await collectPages(fetcher, context, BASE, logins, {
      onPage: (items, total) => progress.push([items, total]),
    });

    expect(progress).toEqual([
      [2, 2],
      [1, 3],
      [2, 5],
    ]);
  });
});
