// ============================================
// Handler Cache — TTL cache for external handler results
// Keyed by normalized query text
// ============================================

import { logger } from "./logger.js";

interface CacheEntry<T> {
  value: T;
  createdAt: number;
}

export interface HandlerCacheOptions {
  ttlMs: number;
  /** Clock in milliseconds; injectable for tests */
  now?: () => number;
}

export interface CacheLookup<T> {
  value: T;
  hit: boolean;
}

/**
 * In-memory TTL cache with per-key mutual exclusion.
 *
 * Concurrent getOrLoad() calls for the same key run `load` at most once
 * while an entry is live. Only successful loads are stored; a rejected
 * load leaves the key empty so the next caller retries.
 */
export class HandlerCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: HandlerCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new RangeError(`ttlMs must be positive, got ${options.ttlMs}`);
    }
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Live entry for `key`, or null (expired entries are dropped) */
  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (this.now() - entry.createdAt >= this.ttlMs) {
      this.entries.delete(key);
      logger.debug("Cache entry expired", { stage: "cache", key });
      return null;
    }

    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, createdAt: this.now() });
    this.cleanupExpired();
  }

  async getOrLoad(key: string, load: () => Promise<T>): Promise<CacheLookup<T>> {
    const release = await this.acquire(key);
    try {
      const cached = this.get(key);
      if (cached !== null) {
        logger.debug("Cache hit", { stage: "cache", key });
        return { value: cached, hit: true };
      }

      const value = await load();
      this.set(key, value);
      return { value, hit: false };
    } finally {
      release();
    }
  }

  clear(): void {
    this.entries.clear();
  }

  /** Wait for earlier holders of `key`, then hold it until release() */
  private async acquire(key: string): Promise<() => void> {
    const previous = this.locks.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    };
  }

  private cleanupExpired(): void {
    const now = this.now();
    let cleaned = 0;

    for (const [key, entry] of this.entries.entries()) {
      if (now - entry.createdAt >= this.ttlMs) {
        this.entries.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug("Cleaned up expired cache entries", {
        stage: "cache",
        cleanedCount: cleaned,
        remainingCount: this.entries.size,
      });
    }
  }
}
