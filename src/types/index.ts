export type HttpMethod = 'GET';

export interface RequestIdentity {
  method: HttpMethod;
  url: string;
  accept?: string | undefined;
}

export interface CacheEntry {
  identity: RequestIdentity;
  status: number;
  headers: Record<string, string>;
  body: string;
  storedAt: string;
}

export type PageCursor = string | undefined;

export interface FetchContext {
  readonly scope: string;
  readonly token?: string | undefined;
  readonly accept?: string | undefined;
}

export type FetchOutcome =
  | { kind: 'success'; entry: CacheEntry }
  | { kind: 'rate-limited'; resetAt: number }
  | { kind: 'transient'; cause: string }
  | { kind: 'permanent'; status: number; diagnostic: string };

export type FailedOutcome = Exclude<FetchOutcome, { kind: 'success' }>;

export type SkipReason = 'permanent' | 'exhausted';

export type PageResult<T> =
  | { kind: 'page'; data: T; next: PageCursor; fromCache: boolean }
  | { kind: 'skipped'; next: undefined; url: string; reason: SkipReason; detail: string };

export function createFetchContext(context: FetchContext): FetchContext {
  return Object.freeze({
    scope: context.scope,
    ...(context.token ? { token: context.token } : {}),
    ...(context.accept ? { accept: context.accept } : {}),
  });
}

export function withAccept(context: FetchContext, accept: string | undefined): FetchContext {
  return createFetchContext({ ...context, accept });
}

export function identityFor(context: FetchContext, url: string): RequestIdentity {
  return {
    method: 'GET',
    url,
    ...(context.accept ? { accept: context.accept } : {}),
  };
}
