/**
 * src/modules/security/security.properties.ts
 *
 * WHY:
 * - Typed holder for every `shiro.*` setting: session timeouts, cache names,
 *   filter-chain definitions, captcha behaviour, redirect URLs.
 * - Built once at bootstrap (bindSecurityProperties), read-only afterwards.
 *
 * RULES:
 * - No range validation here. Values are taken as given; consumers decide what
 *   a negative timeout means.
 * - The three caching sub-flags go through accessors so the coupling in
 *   policies/caching-flags.policy.ts is applied on every write.
 */

import {
  ANONYMOUS_CHAIN,
  DEFAULT_CACHE_NAMES,
  DEFAULT_CAPTCHA_DATE_STORE_KEY,
  DEFAULT_CAPTCHA_PARAM,
  DEFAULT_CAPTCHA_STORE_KEY,
  DEFAULT_CAPTCHA_TIMEOUT,
  DEFAULT_CREDENTIALS_RETRY_TIMES_LIMIT,
  DEFAULT_GLOBAL_SESSION_TIMEOUT,
  DEFAULT_IGNORED,
  DEFAULT_LOGIN_URL,
  DEFAULT_REDIRECT_URL,
  DEFAULT_RETRY_TIMES_KEY_ATTRIBUTE,
  DEFAULT_RETRY_TIMES_WHEN_ACCESS_DENIED,
  DEFAULT_SESSION_VALIDATION_INTERVAL,
  DEFAULT_SUCCESS_URL,
} from './security.constants';
import {
  applyCachingFlag,
  isCachingFlagEffective,
  type CachingFlags,
  type CachingSubFlag,
} from './policies/caching-flags.policy';

export type SecurityPropertiesSnapshot = {
  activeSessionsCacheName: string;
  authorizationCachingEnabled: boolean;
  authorizationCacheName: string;
  authenticationCachingEnabled: boolean;
  authenticationCacheName: string;
  cachingEnabled: boolean;
  captchaEnabled: boolean;
  captchaParamName: string;
  captchaCacheName: string;
  captchaStoreKey: string;
  captchaDateStoreKey: string;
  captchaTimeout: number;
  credentialsRetryTimesLimit: number;
  credentialsRetryCacheName: string;
  defaultRolePermissions: Record<string, string>;
  enabled: boolean;
  failureUrl: string | null;
  filterChainDefinitionMap: Record<string, string>;
  loginUrl: string;
  postOnlyLogout: boolean;
  redirectUrl: string;
  retryTimesKeyAttribute: string;
  retryTimesWhenAccessDenied: number;
  sessionCachingEnabled: boolean;
  sessionCreationEnabled: boolean;
  sessionDequeCacheName: string;
  kickoutFirst: boolean;
  sessionMaximumKickout: number;
  sessionStorageEnabled: boolean;
  sessionStateless: boolean;
  sessionTimeout: number;
  sessionValidationInterval: number;
  sessionValidationSchedulerEnabled: boolean;
  successUrl: string;
  unauthorizedUrl: string | null;
  uniqueSession: boolean;
  userNativeSessionManager: boolean;
};

export class SecurityProperties {
  /* ============================== Caches ============================== */

  /** Name of the cache holding active sessions. */
  activeSessionsCacheName: string = DEFAULT_CACHE_NAMES.activeSessions;
  /** Cache of AuthorizationInfo keyed by principal; used when authorization caching is on. */
  authorizationCacheName: string = DEFAULT_CACHE_NAMES.authorization;
  /** Cache of AuthenticationInfo; only consulted when authentication caching is on. */
  authenticationCacheName: string = DEFAULT_CACHE_NAMES.authentication;

  private flags: CachingFlags = {
    cachingEnabled: false,
    authenticationCachingEnabled: false,
    authorizationCachingEnabled: false,
    sessionCachingEnabled: false,
  };

  /* ============================== Captcha ============================= */

  captchaEnabled = false;
  /** Request parameter carrying the presented captcha. */
  captchaParamName: string = DEFAULT_CAPTCHA_PARAM;
  captchaCacheName: string = DEFAULT_CACHE_NAMES.captcha;
  captchaStoreKey: string = DEFAULT_CAPTCHA_STORE_KEY;
  captchaDateStoreKey: string = DEFAULT_CAPTCHA_DATE_STORE_KEY;
  /** Captcha lifetime in milliseconds. */
  captchaTimeout: number = DEFAULT_CAPTCHA_TIMEOUT;

  /* ============================ Credentials =========================== */

  credentialsRetryTimesLimit: number = DEFAULT_CREDENTIALS_RETRY_TIMES_LIMIT;
  credentialsRetryCacheName: string = DEFAULT_CACHE_NAMES.credentialsRetry;
  /** Attribute name under which the failed-login counter is exposed. */
  retryTimesKeyAttribute: string = DEFAULT_RETRY_TIMES_KEY_ATTRIBUTE;
  /** Failed logins allowed before the captcha becomes mandatory. */
  retryTimesWhenAccessDenied: number = DEFAULT_RETRY_TIMES_WHEN_ACCESS_DENIED;

  /* ========================= Access / routing ========================= */

  enabled = false;
  /** role → permission string granted to authenticated subjects. */
  defaultRolePermissions = new Map<string, string>();
  /** URL pattern → filter chain, in evaluation order. */
  filterChainDefinitionMap = new Map<string, string>();
  failureUrl: string | null = null;
  loginUrl: string = DEFAULT_LOGIN_URL;
  /** Only POST requests log the subject out (guards against prefetching browsers). */
  postOnlyLogout = false;
  /** Where the user lands after logout. */
  redirectUrl: string = DEFAULT_REDIRECT_URL;
  /** Fallback destination after login when the original request URL is unknown. */
  successUrl: string = DEFAULT_SUCCESS_URL;
  /** null means a raw 401 instead of a redirect. */
  unauthorizedUrl: string | null = null;

  /* ============================= Sessions ============================= */

  sessionCreationEnabled = true;
  sessionDequeCacheName: string = DEFAULT_CACHE_NAMES.sessionDeque;
  /** Kick out the oldest session (true) or the newest (false) when over the limit. */
  kickoutFirst = false;
  sessionMaximumKickout = 1;
  sessionStorageEnabled = true;
  sessionStateless = false;
  sessionTimeout: number = DEFAULT_GLOBAL_SESSION_TIMEOUT;
  sessionValidationInterval: number = DEFAULT_SESSION_VALIDATION_INTERVAL;
  sessionValidationSchedulerEnabled = true;
  /** A new login kicks out every previous session of the same account. */
  uniqueSession = false;
  userNativeSessionManager = false;

  constructor() {
    for (const pattern of DEFAULT_IGNORED) {
      this.filterChainDefinitionMap.set(pattern, ANONYMOUS_CHAIN);
    }
  }

  get cachingEnabled(): boolean {
    return this.flags.cachingEnabled;
  }

  set cachingEnabled(value: boolean) {
    this.flags = { ...this.flags, cachingEnabled: value };
  }

  get authenticationCachingEnabled(): boolean {
    return isCachingFlagEffective(this.flags, 'authenticationCachingEnabled');
  }

  set authenticationCachingEnabled(value: boolean) {
    this.setCachingFlag('authenticationCachingEnabled', value);
  }

  get authorizationCachingEnabled(): boolean {
    return isCachingFlagEffective(this.flags, 'authorizationCachingEnabled');
  }

  set authorizationCachingEnabled(value: boolean) {
    this.setCachingFlag('authorizationCachingEnabled', value);
  }

  get sessionCachingEnabled(): boolean {
    return isCachingFlagEffective(this.flags, 'sessionCachingEnabled');
  }

  set sessionCachingEnabled(value: boolean) {
    this.setCachingFlag('sessionCachingEnabled', value);
  }

  setCachingFlag(which: CachingSubFlag, value: boolean): void {
    this.flags = applyCachingFlag(this.flags, which, value);
  }

  snapshot(): SecurityPropertiesSnapshot {
    return {
      activeSessionsCacheName: this.activeSessionsCacheName,
      authorizationCachingEnabled: this.authorizationCachingEnabled,
      authorizationCacheName: this.authorizationCacheName,
      authenticationCachingEnabled: this.authenticationCachingEnabled,
      authenticationCacheName: this.authenticationCacheName,
      cachingEnabled: this.cachingEnabled,
      captchaEnabled: this.captchaEnabled,
      captchaParamName: this.captchaParamName,
      captchaCacheName: this.captchaCacheName,
      captchaStoreKey: this.captchaStoreKey,
      captchaDateStoreKey: this.captchaDateStoreKey,
      captchaTimeout: this.captchaTimeout,
      credentialsRetryTimesLimit: this.credentialsRetryTimesLimit,
      credentialsRetryCacheName: this.credentialsRetryCacheName,
      defaultRolePermissions: Object.fromEntries(this.defaultRolePermissions),
      enabled: this.enabled,
      failureUrl: this.failureUrl,
      filterChainDefinitionMap: Object.fromEntries(this.filterChainDefinitionMap),
      loginUrl: this.loginUrl,
      postOnlyLogout: this.postOnlyLogout,
      redirectUrl: this.redirectUrl,
      retryTimesKeyAttribute: this.retryTimesKeyAttribute,
      retryTimesWhenAccessDenied: this.retryTimesWhenAccessDenied,
      sessionCachingEnabled: this.sessionCachingEnabled,
      sessionCreationEnabled: this.sessionCreationEnabled,
      sessionDequeCacheName: this.sessionDequeCacheName,
      kickoutFirst: this.kickoutFirst,
      sessionMaximumKickout: this.sessionMaximumKickout,
      sessionStorageEnabled: this.sessionStorageEnabled,
      sessionStateless: this.sessionStateless,
      sessionTimeout: this.sessionTimeout,
      sessionValidationInterval: this.sessionValidationInterval,
      sessionValidationSchedulerEnabled: this.sessionValidationSchedulerEnabled,
      successUrl: this.successUrl,
      unauthorizedUrl: this.unauthorizedUrl,
      uniqueSession: this.uniqueSession,
      userNativeSessionManager: this.userNativeSessionManager,
    };
  }
}
