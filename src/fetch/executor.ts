import type { ResponseCache } from '../cache/cache.js';
import type { Logger } from '../logger.js';
import type { CacheEntry, FailedOutcome, FetchContext, FetchOutcome } from '../types/index.js';
import { identityFor } from '../types/index.js';
import { systemClock, type Clock } from '../utils/sleep.js';
import { excerpt } from '../utils/text.js';
import { errorMessage } from './errors.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpExecutorOptions {
  cache: ResponseCache;
  userAgent: string;
  fetchImpl?: FetchLike;
  clock?: Clock;
  logger?: Logger;
}

export const RATE_LIMIT_REMAINING_HEADER = 'x-ratelimit-remaining';
export const RATE_LIMIT_RESET_HEADER = 'x-ratelimit-reset';
export const RETRY_AFTER_HEADER = 'retry-after';

/**
 * Performs a single GET and classifies what came back. Successful responses
 * are written to the cache before they are returned.
 */
export class HttpExecutor {
  private readonly cache: ResponseCache;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly logger: Logger | undefined;

  constructor(options: HttpExecutorOptions) {
    this.cache = options.cache;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  buildHeaders(context: FetchContext): Record<string, string> {
    return {
      'User-Agent': this.userAgent,
      'Accept-Encoding': 'gzip',
      ...(context.token ? { Authorization: `Bearer ${context.token}` } : {}),
      ...(context.accept ? { Accept: context.accept } : {}),
    };
  }

  async execute(context: FetchContext, url: string): Promise<FetchOutcome> {
    this.logger?.(`fetching ${url}`);

    let status: number;
    let headers: Record<string, string>;
    let body: string;
    try {
      const response = await this.fetchImpl(url, { method: 'GET', headers: this.buildHeaders(context) });
      status = response.status;
      headers = collectHeaders(response.headers);
      body = await response.text();
    } catch (error) {
      return { kind: 'transient', cause: `network error: ${errorMessage(error)}` };
    }

    const classified = classifyResponse(url, status, headers, body, this.clock.now());
    if (classified !== 'success') {
      return classified;
    }

    const entry: CacheEntry = {
      identity: identityFor(context, url),
      status,
      headers,
      body,
      storedAt: new Date(this.clock.now()).toISOString(),
    };

    try {
      await this.cache.put(context.scope, entry);
    } catch (error) {
      this.logger?.(`unable to cache ${url}, continuing uncached: ${errorMessage(error)}`);
    }

    return { kind: 'success', entry };
  }
}

export function classifyResponse(
  url: string,
  status: number,
  headers: Record<string, string>,
  body: string,
  now: number,
): 'success' | FailedOutcome {
  if (status === 200) {
    return 'success';
  }

  if (status === 202) {
    return { kind: 'transient', cause: `202 (Accepted) from ${url}; result still being computed` };
  }

  if (status === 403 && headers[RATE_LIMIT_REMAINING_HEADER] !== undefined) {
    const remaining = parseInteger(headers[RATE_LIMIT_REMAINING_HEADER]);
    const reset = parseInteger(headers[RATE_LIMIT_RESET_HEADER]);
    if (remaining === 0 && reset !== undefined) {
      return { kind: 'rate-limited', resetAt: reset * 1000 };
    }
  }

  if (status === 429) {
    const retryAfter = parseInteger(headers[RETRY_AFTER_HEADER]);
    if (retryAfter !== undefined) {
      return { kind: 'rate-limited', resetAt: now + retryAfter * 1000 };
    }
  }

  return {
    kind: 'permanent',
    status,
    diagnostic: `GET ${url} returned ${status}${body ? `: ${excerpt(body)}` : ''}`,
  };
}

function collectHeaders(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key.toLowerCase()] = value;
  });
  return result;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}
