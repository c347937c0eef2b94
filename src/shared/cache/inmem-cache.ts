/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev without Redis) to run without external infra.
 *
 * HOW TO USE:
 * - const manager = new InMemCacheManager()
 * - const cache = manager.getCache('name', z.string())
 */

import type { ZodType } from 'zod';
import type { Cache, CacheManager, CacheOptions, CachePutOptions } from './cache';
import { resolveTtlSeconds } from './cache';

type Entry = { value: unknown; expiresAtMs: number | null };

export class InMemCache<V> implements Cache<V> {
  constructor(
    private readonly store: Map<string, Entry>,
    private readonly schema: ZodType<V>,
    private readonly opts?: CacheOptions,
  ) {}

  private now(): number {
    return Date.now();
  }

  get(key: string): Promise<V | null> {
    const entry = this.store.get(key);
    if (!entry) return Promise.resolve(null);

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return Promise.resolve(null);
    }

    const parsed = this.schema.safeParse(entry.value);
    return Promise.resolve(parsed.success ? parsed.data : null);
  }

  put(key: string, value: V, opts?: CachePutOptions): Promise<void> {
    const ttlSeconds = resolveTtlSeconds(opts, this.opts);
    const expiresAtMs = ttlSeconds ? this.now() + ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  remove(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }
}

export class InMemCacheManager implements CacheManager {
  private readonly stores = new Map<string, Map<string, Entry>>();

  getCache<V>(name: string, schema: ZodType<V>, opts?: CacheOptions): Cache<V> {
    let store = this.stores.get(name);
    if (!store) {
      store = new Map<string, Entry>();
      this.stores.set(name, store);
    }
    return new InMemCache(store, schema, opts);
  }

  close(): Promise<void> {
    this.stores.clear();
    return Promise.resolve();
  }
}
