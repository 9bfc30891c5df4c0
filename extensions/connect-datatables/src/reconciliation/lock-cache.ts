/**
 * Lock Version Cache
 *
 * Holds the lock tokens fetched during one reconciliation run. Entries are
 * only ever replaced by a fresh fetch after `invalidate`; the cache never
 * edits a token itself.
 */

import { NO_LOCK_VERSION, type LockLevel, type LockTokenSource, type LockVersion, type TableHandle } from "../types.js";

export class LockVersionCache {
  private entries = new Map<string, Promise<LockVersion>>();
  private fetches = 0;

  constructor(private readonly source: LockTokenSource) {}

  /** Remote fetches performed so far */
  get fetchCount(): number {
    return this.fetches;
  }

  async get(table: TableHandle, level: LockLevel, scopeKey: string): Promise<LockVersion> {
    if (level === "NONE") return NO_LOCK_VERSION;

    const key = this.cacheKey(table, level, scopeKey);
    const cached = this.entries.get(key);
    if (cached) return cached;

    this.fetches += 1;
    const pending = this.source.fetchToken(table, level, level === "DATA_TABLE" ? "*" : scopeKey);
    this.entries.set(key, pending);
    try {
      return await pending;
    } catch (err) {
      // Concurrent waiters see the rejection; later gets fetch again
      if (this.entries.get(key) === pending) this.entries.delete(key);
      throw err;
    }
  }

  invalidate(table: TableHandle, level: LockLevel, scopeKey: string): void {
    if (level === "NONE") return;
    this.entries.delete(this.cacheKey(table, level, scopeKey));
  }

  private cacheKey(table: TableHandle, level: LockLevel, scopeKey: string): string {
    return `${table.id}\u0000${level}\u0000${level === "DATA_TABLE" ? "*" : scopeKey}`;
  }
}
