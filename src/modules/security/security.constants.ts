/**
 * src/modules/security/security.constants.ts
 *
 * WHY:
 * - Default values of the security properties, single-sourced so the holder,
 *   the binder and the tests agree.
 *
 * RULES:
 * - Must not import from HTTP/framework code.
 * - Durations are milliseconds.
 */

export const SECURITY_PROPERTIES_PREFIX = 'shiro';

const MILLIS_PER_SECOND = 1000;
const MILLIS_PER_MINUTE = 60 * MILLIS_PER_SECOND;

export const DEFAULT_CAPTCHA_TIMEOUT = 60 * MILLIS_PER_SECOND;

/** Main session timeout, 30 minutes. */
export const DEFAULT_GLOBAL_SESSION_TIMEOUT = 30 * MILLIS_PER_MINUTE;

/** Session validation interval, 30 seconds. */
export const DEFAULT_SESSION_VALIDATION_INTERVAL = 30 * MILLIS_PER_SECOND;

/** Patterns reachable without authentication out of the box. */
export const DEFAULT_IGNORED = ['/**/favicon.ico', '/assets/**', '/webjars/**'] as const;

export const ANONYMOUS_CHAIN = 'anon';

export const DEFAULT_CACHE_NAMES = {
  activeSessions: 'shiro-activeSessionCache',
  authorization: 'shiro-authorizationCache',
  authentication: 'shiro-authenticationCache',
  captcha: 'shiro-captchaCache',
  credentialsRetry: 'shiro-credentialsRetryCache',
  sessionDeque: 'shiro-sessionDequeCache',
} as const;

export const DEFAULT_CAPTCHA_PARAM = 'captcha';
export const DEFAULT_CAPTCHA_STORE_KEY = 'CaptchaCacheResolver.Captcha';
export const DEFAULT_CAPTCHA_DATE_STORE_KEY = 'CaptchaCacheResolver.Captcha_DATE';

export const DEFAULT_CREDENTIALS_RETRY_TIMES_LIMIT = 5;
export const DEFAULT_RETRY_TIMES_KEY_ATTRIBUTE = 'shiroLoginFailureRetries';
export const DEFAULT_RETRY_TIMES_WHEN_ACCESS_DENIED = 3;

export const DEFAULT_LOGIN_URL = '/login.jsp';
export const DEFAULT_REDIRECT_URL = '/';
export const DEFAULT_SUCCESS_URL = '/';
