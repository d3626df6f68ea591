import { createHash } from 'node:crypto';
import type { RequestIdentity } from '../types/index.js';

function canonicalIdentity(identity: RequestIdentity): string {
  // Key order is fixed so equal identities always hash alike.
  return JSON.stringify([identity.method, identity.url, identity.accept ?? null]);
}

export function identityChecksum(identity: RequestIdentity, length: number = 12): string {
  return createHash('sha256').update(canonicalIdentity(identity)).digest('hex').slice(0, length);
}

export function sameIdentity(a: RequestIdentity, b: RequestIdentity): boolean {
  return canonicalIdentity(a) === canonicalIdentity(b);
}
