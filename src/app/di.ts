/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (redis) and shares them safely.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (which cache backs the app) belong HERE,
 *   not inside the classes themselves.
 */

import type { AppConfig } from './config';

import type { CacheManager } from '../shared/cache/cache';
import { InMemCacheManager } from '../shared/cache/inmem-cache';
import { RedisCacheManager } from '../shared/cache/redis-cache';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createSecurityModule } from '../modules/security/security.module';
import type { SecurityModule } from '../modules/security/security.module';

import { createCaptchaModule } from '../modules/captcha/captcha.module';
import type { CaptchaModule } from '../modules/captcha/captcha.module';

export type AppDeps = {
  cacheManager: CacheManager;
  logger: Logger;

  // modules
  security: SecurityModule;
  captcha: CaptchaModule;

  // lifecycle
  close: () => Promise<void>;
};

async function buildCacheManager(config: AppConfig): Promise<CacheManager> {
  if (config.cacheDriver === 'memory') {
    if (config.nodeEnv === 'production') {
      logger.warn('cache.memory_in_production', { flow: 'di' });
    }
    return new InMemCacheManager();
  }

  if (!config.redisUrl) {
    throw new Error('REDIS_URL is required when CACHE_DRIVER=redis');
  }
  return RedisCacheManager.connect(config.redisUrl);
}

export async function buildDeps(
  config: AppConfig,
  overrides: { cacheManager?: CacheManager; now?: () => number } = {},
): Promise<AppDeps> {
  const cacheManager = overrides.cacheManager ?? (await buildCacheManager(config));

  // modules (no HTTP / no business logic here)
  const security = createSecurityModule({ properties: config.security });

  const captcha = createCaptchaModule({
    cacheManager,
    logger,
    security: config.security,
    text: { length: config.captcha.length, chars: config.captcha.chars },
    image: { width: config.captcha.width, height: config.captcha.height },
    isProduction: config.nodeEnv === 'production',
    now: overrides.now,
  });

  return {
    cacheManager,
    logger,
    security,
    captcha,
    close: async () => {
      await cacheManager.close();
    },
  };
}
