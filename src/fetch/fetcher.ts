import pLimit, { type LimitFunction } from 'p-limit';
import type { ResponseCache } from '../cache/cache.js';
import type { JotSchema } from '../jot.js';
import type { Logger } from '../logger.js';
import type { CacheEntry, FailedOutcome, FetchContext, PageResult, SkipReason } from '../types/index.js';
import { identityFor } from '../types/index.js';
import { systemClock, type Clock } from '../utils/sleep.js';
import { epochToIso, formatDuration } from '../utils/time.js';
import { BackoffPolicy, type BackoffPolicyOptions } from './backoff.js';
import { DecodeError, errorMessage } from './errors.js';
import { HttpExecutor, type FetchLike } from './executor.js';
import { nextPageUrl } from './linkHeader.js';

export interface FetcherOptions {
  cache: ResponseCache;
  userAgent?: string;
  fetchImpl?: FetchLike;
  clock?: Clock;
  logger?: Logger;
  backoff?: BackoffPolicyOptions;
}

export interface FetchPageOptions {
  /**
   * Re-fetch a cached page when it has no next link. The final page of a
   * collection that keeps growing (stargazers, say) may have gained items
   * since it was cached.
   */
  revalidateLastPage?: boolean;
}

export const DEFAULT_USER_AGENT = 'stargazer-fetch/0.1.0';

type LiveResult =
  | { kind: 'success'; entry: CacheEntry }
  | { kind: 'skipped'; reason: SkipReason; detail: string };

export class Fetcher {
  private readonly cache: ResponseCache;
  private readonly executor: HttpExecutor;
  private readonly policy: BackoffPolicy;
  private readonly clock: Clock;
  private readonly logger: Logger | undefined;
  // One limiter per access token: the remote quota is per token.
  private readonly limiters = new Map<string, LimitFunction>();

  constructor(options: FetcherOptions) {
    this.cache = options.cache;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    this.policy = new BackoffPolicy(options.backoff);
    this.executor = new HttpExecutor({
      cache: options.cache,
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      clock: this.clock,
      ...(options.fetchImpl ? { fetchImpl: options.fetchImpl } : {}),
      ...(options.logger ? { logger: options.logger } : {}),
    });
  }

  async fetchPage<T>(
    context: FetchContext,
    url: string,
    schema: JotSchema<T>,
    options: FetchPageOptions = {},
  ): Promise<PageResult<T>> {
    return this.fetchPageAttempt(context, url, schema, options.revalidateLastPage ?? false, true);
  }

  private async fetchPageAttempt<T>(
    context: FetchContext,
    url: string,
    schema: JotSchema<T>,
    revalidateLastPage: boolean,
    mayRecover: boolean,
  ): Promise<PageResult<T>> {
    const identity = identityFor(context, url);

    let entry = await this.cache.get(context.scope, identity);
    let fromCache = entry !== null;
    if (entry && revalidateLastPage && nextPageUrl(entry.headers.link) === undefined) {
      this.logger?.(`revalidating last page ${url}`);
      entry = null;
      fromCache = false;
    }

    if (!entry) {
      const live = await this.limiterFor(context)(() => this.fetchLive(context, url));
      if (live.kind === 'skipped') {
        return { kind: 'skipped', next: undefined, url, reason: live.reason, detail: live.detail };
      }
      entry = live.entry;
    }

    let data: T;
    try {
      data = schema.parse(JSON.parse(entry.body));
    } catch (error) {
      if (!mayRecover) {
        await this.cache.invalidate(context.scope, identity);
        throw new DecodeError(url, { cause: error });
      }
      this.logger?.(`cache entry for ${url} corrupted (${errorMessage(error)}); removing and refetching`);
      await this.cache.invalidate(context.scope, identity);
      return this.fetchPageAttempt(context, url, schema, revalidateLastPage, false);
    }

    return { kind: 'page', data, next: nextPageUrl(entry.headers.link), fromCache };
  }

  private async fetchLive(context: FetchContext, url: string): Promise<LiveResult> {
    let last: FailedOutcome | undefined;

    for (let attempt = 0; attempt < this.policy.maxAttempts; attempt += 1) {
      const outcome = await this.executor.execute(context, url);
      if (outcome.kind === 'success') {
        return outcome;
      }
      last = outcome;

      const decision = this.policy.decide(outcome, attempt, this.clock.now());
      if (decision.action === 'stop') {
        const detail = describeOutcome(outcome);
        this.logger?.(
          decision.reason === 'permanent'
            ? `unable to fetch ${url}: ${detail}`
            : `unable to fetch ${url} after ${attempt + 1} attempts: ${detail}`,
        );
        return { kind: 'skipped', reason: decision.reason, detail };
      }

      if (outcome.kind === 'rate-limited') {
        this.logger?.(
          `rate limit exhausted fetching ${url}; resets at ${epochToIso(outcome.resetAt)}, waiting ${formatDuration(decision.delayMs)}`,
        );
      } else {
        this.logger?.(`${describeOutcome(outcome)}; retrying ${url} in ${formatDuration(decision.delayMs)}`);
      }
      await this.clock.sleep(decision.delayMs);
    }

    // Only reachable if the policy retries past its own budget.
    const detail = last ? describeOutcome(last) : 'no attempts made';
    this.logger?.(`unable to fetch ${url}: ${detail}`);
    return { kind: 'skipped', reason: 'exhausted', detail };
  }

  private limiterFor(context: FetchContext): LimitFunction {
    const key = context.token ?? '';
    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = pLimit(1);
      this.limiters.set(key, limiter);
    }
    return limiter;
  }
}

function describeOutcome(outcome: FailedOutcome): string {
  switch (outcome.kind) {
    case 'rate-limited':
      return `rate limited until ${epochToIso(outcome.resetAt)}`;
    case 'transient':
      return outcome.cause;
    case 'permanent':
      return outcome.diagnostic;
  }
}
