import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';

describe('GET /security/properties', () => {
  it('returns the bound properties with cache keys masked', async () => {
    const { app, close } = await buildTestApp({
      SHIRO_SESSION_TIMEOUT: '900000',
      'shiro.filterChainDefinitionMap[/admin/**]': 'authc,roles[admin]',
      SHIRO_SESSION_CACHING_ENABLED: 'true',
    });

    try {
      const res = await app.inject({ method: 'GET', url: '/security/properties' });

      expect(res.statusCode).toBe(200);

      const body = res.json();
      expect(body.enabled).toBe(true);
      expect(body.captchaEnabled).toBe(true);
      expect(body.sessionTimeout).toBe(900000);
      expect(body.cachingEnabled).toBe(true);
      expect(body.sessionCachingEnabled).toBe(true);
      expect(body.filterChainDefinitionMap).toEqual({
        '/**/favicon.ico': 'anon',
        '/assets/**': 'anon',
        '/webjars/**': 'anon',
        '/admin/**': 'authc,roles[admin]',
      });
      expect(body).not.toHaveProperty('captchaStoreKey');
      expect(body).not.toHaveProperty('captchaDateStoreKey');
    } finally {
      await close();
    }
  });
});
