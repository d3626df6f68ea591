export type { ResponseCache } from './cache/cache.js';
export { assertScope } from './cache/cache.js';
export { FileResponseCache, type FileCacheOptions } from './cache/fileCache.js';
export { InMemoryResponseCache } from './cache/memoryCache.js';
export { loadConfig, requireToken, type AppConfig } from './config.js';
export { BackoffPolicy, DEFAULT_MAX_ATTEMPTS, type BackoffPolicyOptions, type RetryDecision } from './fetch/backoff.js';
export { CacheIOError, DecodeError, FetchError } from './fetch/errors.js';
export { HttpExecutor, classifyResponse, type FetchLike, type HttpExecutorOptions } from './fetch/executor.js';
export { DEFAULT_USER_AGENT, Fetcher, type FetchPageOptions, type FetcherOptions } from './fetch/fetcher.js';
export { nextPageUrl, parseLinkHeader, type LinkValue } from './fetch/linkHeader.js';
export { collectPages, type CollectPagesOptions, type CollectedPages } from './fetch/paginate.js';
export { jot, type InferJot, type JotSchema } from './jot.js';
export { createLogger, type Logger } from './logger.js';
export * from './types/index.js';
export { systemClock, type Clock } from './utils/sleep.js';
