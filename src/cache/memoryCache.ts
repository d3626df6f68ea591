import type { CacheEntry, RequestIdentity } from '../types/index.js';
import { identityChecksum } from '../utils/hash.js';
import { assertScope, type ResponseCache } from './cache.js';

export class InMemoryResponseCache implements ResponseCache {
  private readonly scopes = new Map<string, Map<string, CacheEntry>>();

  async get(scope: string, identity: RequestIdentity): Promise<CacheEntry | null> {
    assertScope(scope);
    return this.scopes.get(scope)?.get(identityChecksum(identity, 64)) ?? null;
  }

  async put(scope: string, entry: CacheEntry): Promise<void> {
    assertScope(scope);
    let entries = this.scopes.get(scope);
    if (!entries) {
      entries = new Map();
      this.scopes.set(scope, entries);
    }
    entries.set(identityChecksum(entry.identity, 64), entry);
  }

  async invalidate(scope: string, identity: RequestIdentity): Promise<void> {
    assertScope(scope);
    this.scopes.get(scope)?.delete(identityChecksum(identity, 64));
  }

  async clearScope(scope: string): Promise<void> {
    assertScope(scope);
    this.scopes.delete(scope);
  }

  size(scope: string): number {
    return this.scopes.get(scope)?.size ?? 0;
  }
}
