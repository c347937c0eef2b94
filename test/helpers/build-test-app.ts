import { buildApp } from '../../src/app/build-app';
import { buildConfig } from '../../src/app/config';
import { InMemCacheManager } from '../../src/shared/cache/inmem-cache';
import { CaptchaCacheValueSchema } from '../../src/modules/captcha/captcha.types';

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Always backed by InMemCacheManager; no Redis.
 * - Security + captcha are ON unless the test overrides them.
 * - `clock.now` drives captcha expiry; move it forward instead of sleeping.
 */
export async function buildTestApp(env: Record<string, string> = {}) {
  const config = buildConfig({
    NODE_ENV: 'test',
    CACHE_DRIVER: 'memory',
    SHIRO_ENABLED: 'true',
    SHIRO_CAPTCHA_ENABLED: 'true',
    ...env,
  });

  const cacheManager = new InMemCacheManager();
  const clock = { now: Date.now() };

  const built = await buildApp(config, { cacheManager, now: () => clock.now });

  const captchaCache = cacheManager.getCache(
    config.security.captchaCacheName,
    CaptchaCacheValueSchema,
  );

  /** Reads the text issued for a scope straight from the cache. */
  async function issuedText(scope: string): Promise<string> {
    const text = await captchaCache.get(`${config.security.captchaStoreKey}:${scope}`);
    if (typeof text !== 'string') throw new Error(`No captcha issued for scope ${scope}`);
    return text;
  }

  return {
    app: built.app,
    deps: built.deps,
    config,
    clock,
    issuedText,
    close: built.close,
  };
}

/** Extracts the captcha scope from a Set-Cookie header. */
export function scopeFromSetCookie(header: string | string[] | undefined): string {
  const raw = Array.isArray(header) ? header.join('; ') : (header ?? '');
  const match = /(?:^|;\s*)cid=([^;]+)/.exec(raw);
  if (!match?.[1]) throw new Error(`No cid cookie in: ${raw}`);
  return match[1];
}
