import type { Identity, MemberCache } from './identity.types';

interface CacheEntry {
  identity: Identity;
  expiresAt: number;
}

/**
 * Map-backed member cache with a fixed time-to-live per entry. Entries are kept
 * in insertion order, which is also expiry order, so each `set` drops expired
 * entries from the front of the map.
 */
export class InMemoryMemberCache implements MemberCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(tenantId: string, memberId: string): Identity | undefined {
    const key = cacheKey(tenantId, memberId);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.identity;
  }

  set(identity: Identity): void {
    const now = this.now();
    this.sweep(now);
    const key = cacheKey(identity.tenantId, identity.id);
    this.entries.delete(key);
    this.entries.set(key, { identity, expiresAt: now + this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt > now) break;
      this.entries.delete(key);
    }
  }
}

function cacheKey(tenantId: string, memberId: string): string {
  return `${tenantId}:${memberId}`;
}
