import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CacheEntry, RequestIdentity } from '../types/index.js';
import { CacheIOError } from '../fetch/errors.js';
import { identityChecksum, sameIdentity } from '../utils/hash.js';
import { assertScope, type ResponseCache } from './cache.js';

interface MetadataFile {
  identity: RequestIdentity;
  status: number;
  headers: Record<string, string>;
  storedAt: string;
}

export interface FileCacheOptions {
  baseDir?: string;
}

const MAX_STEM_LENGTH = 96;

/**
 * Stores each response as a raw `.body` file next to a `.meta.json` file,
 * under `<baseDir>/<owner>/<repo>/<host>/`. File names start with a readable
 * form of the URL path and end in a short identity checksum.
 */
export class FileResponseCache implements ResponseCache {
  readonly baseDir: string;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? './stargazer_cache';
  }

  async get(scope: string, identity: RequestIdentity): Promise<CacheEntry | null> {
    const { bodyPath, metaPath } = this.paths(scope, identity);

    let body: string;
    let metaRaw: string;
    try {
      [body, metaRaw] = await Promise.all([fs.readFile(bodyPath, 'utf8'), fs.readFile(metaPath, 'utf8')]);
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw new CacheIOError('read cache entry', identity.url, { cause: error });
    }

    const meta = parseMetadata(metaRaw);
    if (!meta || !sameIdentity(meta.identity, identity)) {
      // Half-written or foreign record; drop it so the next fetch rewrites it.
      await this.invalidate(scope, identity);
      return null;
    }

    return {
      identity: meta.identity,
      status: meta.status,
      headers: meta.headers,
      body,
      storedAt: meta.storedAt,
    };
  }

  async put(scope: string, entry: CacheEntry): Promise<void> {
    const { dir, bodyPath, metaPath } = this.paths(scope, entry.identity);
    const metadata: MetadataFile = {
      identity: entry.identity,
      status: entry.status,
      headers: entry.headers,
      storedAt: entry.storedAt,
    };

    try {
      await fs.mkdir(dir, { recursive: true });
      const writes = await Promise.allSettled([
        fs.writeFile(bodyPath, entry.body, 'utf8'),
        fs.writeFile(metaPath, JSON.stringify(metadata, null, 2), 'utf8'),
      ]);
      const failed = writes.find((write): write is PromiseRejectedResult => write.status === 'rejected');
      if (failed) {
        throw failed.reason;
      }
    } catch (error) {
      // A body without matching metadata must not be served later.
      await Promise.allSettled([fs.rm(bodyPath, { force: true }), fs.rm(metaPath, { force: true })]);
      throw new CacheIOError('write cache entry', entry.identity.url, { cause: error });
    }
  }

  async invalidate(scope: string, identity: RequestIdentity): Promise<void> {
    const { bodyPath, metaPath } = this.paths(scope, identity);
    try {
      await Promise.all([fs.rm(bodyPath, { force: true }), fs.rm(metaPath, { force: true })]);
    } catch (error) {
      throw new CacheIOError('invalidate cache entry', identity.url, { cause: error });
    }
  }

  async clearScope(scope: string): Promise<void> {
    const dir = this.scopeDir(scope);
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (error) {
      throw new CacheIOError('clear cache scope', scope, { cause: error });
    }
  }

  paths(scope: string, identity: RequestIdentity) {
    const { host, stem } = describeUrl(identity.url);
    const dir = path.join(this.scopeDir(scope), host);
    const base = `${stem}.${identityChecksum(identity)}`;
    return {
      dir,
      bodyPath: path.join(dir, `${base}.body`),
      metaPath: path.join(dir, `${base}.meta.json`),
    };
  }

  private scopeDir(scope: string): string {
    const [owner, repo] = assertScope(scope);
    return path.join(this.baseDir, owner, repo);
  }
}

function describeUrl(url: string): { host: string; stem: string } {
  if (!URL.canParse(url)) {
    return { host: '_', stem: sanitize(url) };
  }

  const parsed = new URL(url);
  return {
    host: sanitize(parsed.host),
    stem: sanitize(`${parsed.pathname}${parsed.search}`),
  };
}

function sanitize(value: string): string {
  const cleaned = value
    .replace(/^\/+/, '')
    .replace(/[^A-Za-z0-9.=-]+/g, '_')
    .replace(/^[._]+/, '')
    .slice(0, MAX_STEM_LENGTH);
  return cleaned.length > 0 ? cleaned : 'index';
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseMetadata(raw: string): MetadataFile | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }

  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const { identity, status, headers, storedAt } = value as Record<string, unknown>;
  if (
    !isIdentity(identity) ||
    typeof status !== 'number' ||
    typeof storedAt !== 'string' ||
    !isStringRecord(headers)
  ) {
    return null;
  }

  return { identity, status, headers, storedAt };
}

function isIdentity(value: unknown): value is RequestIdentity {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate = value as Record<string, unknown>;
  return (
    candidate.method === 'GET' &&
    typeof candidate.url === 'string' &&
    (candidate.accept === undefined || typeof candidate.accept === 'string')
  );
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((item) => typeof item === 'string')
  );
}
