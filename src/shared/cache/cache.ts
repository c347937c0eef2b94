/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Captcha records, and every other short-lived security value, live in a cache
 *   owned outside the code that reads them.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - const cache = cacheManager.getCache('shiro-captchaCache', z.string())
 * - await cache.put(key, value, { ttlSeconds })
 * - await cache.get(key) -> value or null
 *
 * RULES:
 * - Values read back are validated with the schema the cache was opened with.
 *   A stored value that no longer matches reads as null.
 * - Expiry is the cache's job. Callers never sweep.
 */

import type { ZodType } from 'zod';

export interface CachePutOptions {
  ttlSeconds?: number;
}

export interface Cache<V> {
  get(key: string): Promise<V | null>;
  put(key: string, value: V, opts?: CachePutOptions): Promise<void>;
  remove(key: string): Promise<void>;
}

export interface CacheOptions {
  /** Applied to every put() that does not pass its own ttlSeconds. */
  defaultTtlSeconds?: number;
}

export interface CacheManager {
  getCache<V>(name: string, schema: ZodType<V>, opts?: CacheOptions): Cache<V>;
  close(): Promise<void>;
}

export function resolveTtlSeconds(
  put: CachePutOptions | undefined,
  cache: CacheOptions | undefined,
): number | undefined {
  const ttl = put?.ttlSeconds ?? cache?.defaultTtlSeconds;
  return ttl && ttl > 0 ? ttl : undefined;
}
