import { describe, it, expect } from 'vitest';
import { InMemCacheManager } from '../../../src/shared/cache/inmem-cache';
import { logger } from '../../../src/shared/logger/logger';
import { AppError } from '../../../src/shared/http/errors';
import { CaptchaCacheResolver } from '../../../src/modules/captcha/captcha-cache-resolver';
import { CaptchaService } from '../../../src/modules/captcha/captcha.service';
import { CaptchaCacheValueSchema } from '../../../src/modules/captcha/captcha.types';

function setup() {
  const cache = new InMemCacheManager().getCache('captcha', CaptchaCacheValueSchema);
  const clock = { now: 1_000_000 };
  const resolver = new CaptchaCacheResolver(cache, { now: () => clock.now });
  const service = new CaptchaService({
    resolver,
    logger,
    text: { length: 4, chars: 'k' },
    image: { width: 120, height: 40 },
  });
  return { cache, clock, service };
}

describe('CaptchaService', () => {
  it('issue() generates a scope when the request has none', async () => {
    const { cache, service } = setup();

    const result = await service.issue({ captchaScope: null, requestId: 'req-1' });

    expect(result.captchaScope).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(result.svg.startsWith('<svg')).toBe(true);
    expect(await cache.get(`CaptchaCacheResolver.Captcha:${result.captchaScope}`)).toBe('kkkk');
    expect(await cache.get(`CaptchaCacheResolver.Captcha_DATE:${result.captchaScope}`)).toBe(
      1_000_000,
    );
  });

  it('issue() keeps an existing scope', async () => {
    const { service } = setup();

    const result = await service.issue({ captchaScope: 'scope-abc', requestId: 'req-2' });

    expect(result.captchaScope).toBe('scope-abc');
  });

  it('verify() compares against the issued text', async () => {
    const { service } = setup();
    await service.issue({ captchaScope: 'scope-abc', requestId: 'req-3' });

    await expect(
      service.verify({ captchaScope: 'scope-abc', captcha: 'KKKK', requestId: 'req-4' }),
    ).resolves.toBe(true);
    await expect(
      service.verify({ captchaScope: 'scope-abc', captcha: 'kkk', requestId: 'req-5' }),
    ).resolves.toBe(false);
  });

  it('verify() rethrows CAPTCHA_INVALID after the timeout', async () => {
    const { clock, service } = setup();
    await service.issue({ captchaScope: 'scope-abc', requestId: 'req-6' });
    clock.now += 60_001;

    const err = await service
      .verify({ captchaScope: 'scope-abc', captcha: 'kkkk', requestId: 'req-7' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ code: 'CAPTCHA_INVALID', status: 401 });
  });

  it('verify() does not see another scope\'s captcha', async () => {
    const { service } = setup();
    await service.issue({ captchaScope: 'scope-abc', requestId: 'req-8' });

    await expect(
      service.verify({ captchaScope: 'scope-other', captcha: 'kkkk', requestId: 'req-9' }),
    ).rejects.toMatchObject({ code: 'CAPTCHA_INCORRECT' });
  });
});
