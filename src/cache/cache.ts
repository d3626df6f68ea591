import type { CacheEntry, RequestIdentity } from '../types/index.js';

export interface ResponseCache {
  get(scope: string, identity: RequestIdentity): Promise<CacheEntry | null>;
  put(scope: string, entry: CacheEntry): Promise<void>;
  invalidate(scope: string, identity: RequestIdentity): Promise<void>;
  clearScope(scope: string): Promise<void>;
}

const SCOPE_SEGMENT = /^[A-Za-z0-9_.-]+$/;

/**
 * Scopes are `owner/repo` keys; each segment must be a plain name so a
 * scope always maps to a directory inside the cache root.
 */
export function assertScope(scope: string): [owner: string, repo: string] {
  const parts = scope.split('/');
  const [owner, repo] = parts;
  if (
    parts.length !== 2 ||
    !owner ||
    !repo ||
    !SCOPE_SEGMENT.test(owner) ||
    !SCOPE_SEGMENT.test(repo) ||
    owner === '..' ||
    repo === '..' ||
    owner === '.' ||
    repo === '.'
  ) {
    throw new Error(`Invalid repository scope "${scope}"; expected :owner/:repo.`);
  }
  return [owner, repo];
}
