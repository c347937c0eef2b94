import { describe, it, expect } from 'vitest';
import { SecurityProperties } from '../../../src/modules/security/security.properties';
import {
  DEFAULT_CAPTCHA_TIMEOUT,
  DEFAULT_GLOBAL_SESSION_TIMEOUT,
  DEFAULT_SESSION_VALIDATION_INTERVAL,
} from '../../../src/modules/security/security.constants';

describe('SecurityProperties', () => {
  it('pre-populates the filter chain map with three anonymous patterns, in order', () => {
    const props = new SecurityProperties();

    expect([...props.filterChainDefinitionMap.entries()]).toEqual([
      ['/**/favicon.ico', 'anon'],
      ['/assets/**', 'anon'],
      ['/webjars/**', 'anon'],
    ]);
  });

  it('does not share the default map between instances', () => {
    const a = new SecurityProperties();
    const b = new SecurityProperties();

    a.filterChainDefinitionMap.set('/admin/**', 'authc');

    expect(b.filterChainDefinitionMap.has('/admin/**')).toBe(false);
  });

  it('carries the documented defaults', () => {
    const props = new SecurityProperties();

    expect(DEFAULT_CAPTCHA_TIMEOUT).toBe(60_000);
    expect(props.captchaTimeout).toBe(60_000);
    expect(props.sessionTimeout).toBe(DEFAULT_GLOBAL_SESSION_TIMEOUT);
    expect(DEFAULT_GLOBAL_SESSION_TIMEOUT).toBe(1_800_000);
    expect(props.sessionValidationInterval).toBe(DEFAULT_SESSION_VALIDATION_INTERVAL);
    expect(DEFAULT_SESSION_VALIDATION_INTERVAL).toBe(30_000);
    expect(props.authorizationCacheName).toBe('shiro-authorizationCache');
    expect(props.authenticationCacheName).toBe('shiro-authenticationCache');
    expect(props.captchaParamName).toBe('captcha');
    expect(props.retryTimesWhenAccessDenied).toBe(3);
    expect(props.sessionMaximumKickout).toBe(1);
    expect(props.sessionCreationEnabled).toBe(true);
    expect(props.sessionStorageEnabled).toBe(true);
    expect(props.sessionValidationSchedulerEnabled).toBe(true);
    expect(props.enabled).toBe(false);
    expect(props.failureUrl).toBeNull();
    expect(props.unauthorizedUrl).toBeNull();
    expect(props.defaultRolePermissions.size).toBe(0);
  });

  it('starts with every caching flag off', () => {
    const props = new SecurityProperties();

    expect(props.cachingEnabled).toBe(false);
    expect(props.authenticationCachingEnabled).toBe(false);
    expect(props.authorizationCachingEnabled).toBe(false);
    expect(props.sessionCachingEnabled).toBe(false);
  });

  it('enabling authorization caching turns the master flag on', () => {
    const props = new SecurityProperties();
    props.authorizationCachingEnabled = true;

    expect(props.cachingEnabled).toBe(true);
    expect(props.authorizationCachingEnabled).toBe(true);
    expect(props.authenticationCachingEnabled).toBe(false);
  });

  it('enabling session caching turns the master flag on', () => {
    const props = new SecurityProperties();
    props.sessionCachingEnabled = true;

    expect(props.cachingEnabled).toBe(true);
    expect(props.sessionCachingEnabled).toBe(true);
  });

  it('disabling a sub-flag never turns the master flag off', () => {
    const props = new SecurityProperties();
    props.authenticationCachingEnabled = true;
    props.authenticationCachingEnabled = false;

    expect(props.cachingEnabled).toBe(true);
    expect(props.authenticationCachingEnabled).toBe(false);
  });

  it('reports a sub-flag as off once the master flag is switched off', () => {
    const props = new SecurityProperties();
    props.sessionCachingEnabled = true;
    props.cachingEnabled = false;

    expect(props.sessionCachingEnabled).toBe(false);

    // the stored sub-flag survives and shows again once the master is back on
    props.cachingEnabled = true;
    expect(props.sessionCachingEnabled).toBe(true);
  });

  it('accepts out-of-range values as given', () => {
    const props = new SecurityProperties();
    props.sessionTimeout = -1;
    props.sessionMaximumKickout = 0;

    expect(props.sessionTimeout).toBe(-1);
    expect(props.sessionMaximumKickout).toBe(0);
  });

  it('snapshot() renders maps as ordered objects and resolves derived flags', () => {
    const props = new SecurityProperties();
    props.defaultRolePermissions.set('admin', '*');
    props.filterChainDefinitionMap.set('/admin/**', 'authc,roles[admin]');
    props.sessionCachingEnabled = true;

    const snap = props.snapshot();

    expect(snap.defaultRolePermissions).toEqual({ admin: '*' });
    expect(Object.keys(snap.filterChainDefinitionMap)).toEqual([
      '/**/favicon.ico',
      '/assets/**',
      '/webjars/**',
      '/admin/**',
    ]);
    expect(snap.cachingEnabled).toBe(true);
    expect(snap.sessionCachingEnabled).toBe(true);
    expect(snap.authorizationCachingEnabled).toBe(false);
  });
});
