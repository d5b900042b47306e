/**
 * LRU Cache with TTL support
 */

import { LRUCache } from 'lru-cache';
import type { CacheEntry } from './types.js';

/**
 * Cache manager for host resolution results
 */
export class CacheManager<T extends {}> {
  private cache: LRUCache<string, CacheEntry<T>>;
  private defaultTTL: number;
  private now: () => number;

  /**
   * @param maxSize Maximum number of entries
   * @param ttl Time-to-live in milliseconds
   * @param now Clock, for tests
   */
  constructor(maxSize = 256, ttl = 300000, now: () => number = Date.now) {
    this.defaultTTL = ttl;
    this.now = now;
    this.cache = new LRUCache<string, CacheEntry<T>>({ max: maxSize });
  }

  /**
   * Cached value, or undefined if absent or expired
   */
  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T, ttl?: number): void {
    this.cache.set(key, { value, expiresAt: this.now() + (ttl ?? this.defaultTTL) });
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Get from cache or compute and cache. Failures are not cached.
   */
  async getOrSet(key: string, factory: () => Promise<T>, ttl?: number): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await factory();
    this.set(key, value, ttl);
    return value;
  }
}
