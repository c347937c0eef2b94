import { describe, it, expect, vi } from 'vitest';
import { InMemCacheManager } from '../../../src/shared/cache/inmem-cache';
import { logger } from '../../../src/shared/logger/logger';
import { SecurityProperties } from '../../../src/modules/security/security.properties';
import {
  captchaRetentionSeconds,
  createCaptchaModule,
} from '../../../src/modules/captcha/captcha.module';

describe('captchaRetentionSeconds', () => {
  it('keeps records for the longer of session and captcha timeout', () => {
    expect(captchaRetentionSeconds(1_800_000, 60_000)).toBe(1800);
    expect(captchaRetentionSeconds(30_000, 90_500)).toBe(91);
  });

  it('uses the default captcha timeout when the configured one is not positive', () => {
    expect(captchaRetentionSeconds(-1, 0)).toBe(60);
    expect(captchaRetentionSeconds(-1, -5)).toBe(60);
  });

  it('never returns less than one second', () => {
    expect(captchaRetentionSeconds(0, 200)).toBe(1);
  });
});

describe('createCaptchaModule', () => {
  it('opens the captcha cache with a positive TTL matching the effective timeout', () => {
    const cacheManager = new InMemCacheManager();
    const getCache = vi.spyOn(cacheManager, 'getCache');

    const security = new SecurityProperties();
    security.captchaTimeout = 0;
    security.sessionTimeout = -1;

    const captcha = createCaptchaModule({
      cacheManager,
      logger,
      security,
      text: { length: 4, chars: 'k' },
      image: { width: 120, height: 40 },
      isProduction: false,
    });

    expect(captcha.resolver.getCaptchaTimeout()).toBe(60_000);
    expect(getCache).toHaveBeenCalledTimes(1);
    expect(getCache.mock.calls[0]?.[0]).toBe('shiro-captchaCache');
    expect(getCache.mock.calls[0]?.[2]).toEqual({ defaultTtlSeconds: 60 });
  });
});
