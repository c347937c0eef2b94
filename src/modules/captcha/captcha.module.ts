/**
 * src/modules/captcha/captcha.module.ts
 *
 * WHY:
 * - Encapsulates captcha module wiring.
 * - DI creates infra (cache manager); the module opens its cache and composes
 *   resolver → service → controller.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - The resolver is initialised from the bound security properties, never from env.
 */

import type { FastifyInstance } from 'fastify';
import type { CacheManager } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { SecurityProperties } from '../security/security.properties';
import { DEFAULT_CAPTCHA_TIMEOUT } from '../security/security.constants';

import { CaptchaCacheResolver } from './captcha-cache-resolver';
import { CaptchaController } from './captcha.controller';
import { registerCaptchaRoutes } from './captcha.routes';
import { CaptchaService } from './captcha.service';
import { CaptchaCacheValueSchema } from './captcha.types';
import type { CaptchaImageOptions, CaptchaTextOptions } from './captcha.types';

export type CaptchaModule = ReturnType<typeof createCaptchaModule>;

/**
 * Cache TTL for captcha records: the longer of the session timeout and the
 * captcha timeout the resolver will apply (a non-positive one keeps its default).
 * Never below one second.
 */
export function captchaRetentionSeconds(sessionTimeoutMs: number, captchaTimeoutMs: number): number {
  const effectiveCaptchaTimeout = captchaTimeoutMs > 0 ? captchaTimeoutMs : DEFAULT_CAPTCHA_TIMEOUT;
  const retentionMs = Math.max(sessionTimeoutMs, effectiveCaptchaTimeout);
  return Math.max(1, Math.ceil(retentionMs / 1000));
}

export function createCaptchaModule(deps: {
  cacheManager: CacheManager;
  logger: Logger;
  security: SecurityProperties;
  text: CaptchaTextOptions;
  image: CaptchaImageOptions;
  isProduction: boolean;
  now?: () => number;
}) {
  const { security } = deps;

  const resolver = new CaptchaCacheResolver(
    deps.cacheManager.getCache(security.captchaCacheName, CaptchaCacheValueSchema, {
      defaultTtlSeconds: captchaRetentionSeconds(security.sessionTimeout, security.captchaTimeout),
    }),
    { now: deps.now },
  );
  resolver.init(security.captchaStoreKey, security.captchaDateStoreKey, security.captchaTimeout);

  const captchaService = new CaptchaService({
    resolver,
    logger: deps.logger,
    text: deps.text,
    image: deps.image,
  });

  const controller = new CaptchaController(captchaService, {
    paramName: security.captchaParamName,
    isProduction: deps.isProduction,
  });

  return {
    resolver,
    captchaService,
    registerRoutes(app: FastifyInstance) {
      registerCaptchaRoutes(app, controller);
    },
  };
}
