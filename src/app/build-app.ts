/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import type { CacheManager } from '../shared/cache/cache';
import { logger } from '../shared/logger/logger';

export async function buildApp(
  config: AppConfig,
  overrides: { cacheManager?: CacheManager; now?: () => number } = {},
) {
  const deps = await buildDeps(config, overrides);
  const app = buildServer();

  registerRoutes(app, { config, deps });

  logger.info('security.properties_bound', {
    flow: 'bootstrap',
    enabled: config.security.enabled,
    captchaEnabled: config.security.captchaEnabled,
    cachingEnabled: config.security.cachingEnabled,
    filterChains: config.security.filterChainDefinitionMap.size,
  });

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
