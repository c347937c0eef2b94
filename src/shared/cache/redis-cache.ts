/**
 * src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of CacheManager used for captcha records and other
 *   ephemeral security state shared between instances.
 *
 * IMPORTANT:
 * - In monorepos, importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We avoid that by deriving the client type from createClient().
 * - Values are stored as JSON. Keys are `<cacheName>:<key>`.
 *
 * LOGGING:
 * - Redis connection errors fire outside any request context, so the global
 *   logger is used directly.
 */

import { createClient } from 'redis';
import type { ZodType } from 'zod';
import type { Cache, CacheManager, CacheOptions, CachePutOptions } from './cache';
import { resolveTtlSeconds } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache<V> implements Cache<V> {
  constructor(
    private readonly client: RedisClient,
    private readonly name: string,
    private readonly schema: ZodType<V>,
    private readonly opts?: CacheOptions,
  ) {}

  private key(key: string): string {
    return `${this.name}:${key}`;
  }

  async get(key: string): Promise<V | null> {
    const raw = await this.client.get(this.key(key));
    if (raw === null) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      logger.warn('redis.cache_decode_failed', { flow: 'redis', cache: this.name, err });
      return null;
    }

    const parsed = this.schema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  }

  async put(key: string, value: V, opts?: CachePutOptions): Promise<void> {
    const encoded = JSON.stringify(value);
    const ttlSeconds = resolveTtlSeconds(opts, this.opts);

    if (ttlSeconds) {
      await this.client.set(this.key(key), encoded, { EX: ttlSeconds });
      return;
    }
    await this.client.set(this.key(key), encoded);
  }

  async remove(key: string): Promise<void> {
    await this.client.del(this.key(key));
  }
}

export class RedisCacheManager implements CacheManager {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCacheManager> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCacheManager(client);
  }

  getCache<V>(name: string, schema: ZodType<V>, opts?: CacheOptions): Cache<V> {
    return new RedisCache(this.client, name, schema, opts);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
