/**
 * src/modules/captcha/captcha-cache-resolver.ts
 *
 * WHY:
 * - Validates a time-boxed captcha against records kept in an injected cache,
 *   and writes those records when a challenge is issued.
 *
 * RECORD:
 * - text  under `captchaStoreKey`     ('' when issued blank)
 * - epoch ms under `captchaDateStoreKey`
 * - With a request scope both keys become `<key>:<scope>`.
 *
 * RULES:
 * - Never deletes. Entries live until the cache evicts them.
 * - validate(): no text given / nothing stored → CaptchaIncorrectError;
 *   no issue time stored or too old → CaptchaTimeoutError;
 *   otherwise the case-insensitive comparison decides.
 * - validateToken() is the authentication-facing variant and only throws AppError.
 */

import type { Cache } from '../../shared/cache/cache';
import {
  DEFAULT_CAPTCHA_DATE_STORE_KEY,
  DEFAULT_CAPTCHA_STORE_KEY,
  DEFAULT_CAPTCHA_TIMEOUT,
} from '../security/security.constants';
import { CaptchaErrors, CaptchaIncorrectError, CaptchaTimeoutError } from './captcha.errors';
import type {
  CaptchaAuthenticationToken,
  CaptchaCacheValue,
  CaptchaKeyConfig,
  CaptchaRequest,
  CaptchaResolver,
} from './captcha.types';

function isEmpty(value: string | null | undefined): value is '' | null | undefined {
  return value === undefined || value === null || value.length === 0;
}

function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class CaptchaCacheResolver implements CaptchaResolver {
  private captchaStoreKey: string = DEFAULT_CAPTCHA_STORE_KEY;
  private captchaDateStoreKey: string = DEFAULT_CAPTCHA_DATE_STORE_KEY;
  private captchaTimeout: number = DEFAULT_CAPTCHA_TIMEOUT;

  private readonly now: () => number;

  constructor(
    private readonly captchaCache: Cache<CaptchaCacheValue>,
    opts?: { now?: () => number },
  ) {
    this.now = opts?.now ?? Date.now;
  }

  init(config: CaptchaKeyConfig): void;
  init(
    captchaStoreKey: string | null | undefined,
    captchaDateStoreKey: string | null | undefined,
    captchaTimeout: number,
  ): void;
  init(
    configOrStoreKey: CaptchaKeyConfig | string | null | undefined,
    captchaDateStoreKey?: string | null,
    captchaTimeout?: number,
  ): void {
    if (typeof configOrStoreKey === 'object' && configOrStoreKey !== null) {
      this.applyKeys(configOrStoreKey.sessionKey, configOrStoreKey.sessionDate);
      return;
    }

    this.applyKeys(configOrStoreKey, captchaDateStoreKey);
    if (captchaTimeout !== undefined && captchaTimeout > 0) {
      this.captchaTimeout = captchaTimeout;
    }
  }

  private applyKeys(
    storeKey: string | null | undefined,
    dateStoreKey: string | null | undefined,
  ): void {
    if (!isEmpty(storeKey)) this.captchaStoreKey = storeKey;
    if (!isEmpty(dateStoreKey)) this.captchaDateStoreKey = dateStoreKey;
  }

  getCaptchaStoreKey(): string {
    return this.captchaStoreKey;
  }

  getCaptchaDateStoreKey(): string {
    return this.captchaDateStoreKey;
  }

  getCaptchaTimeout(): number {
    return this.captchaTimeout;
  }

  private scoped(key: string, request: CaptchaRequest): string {
    return request.captchaScope ? `${key}:${request.captchaScope}` : key;
  }

  async validateToken(request: CaptchaRequest, token: CaptchaAuthenticationToken): Promise<boolean> {
    if (isEmpty(token.captcha)) {
      throw CaptchaErrors.incorrect();
    }

    try {
      return await this.validate(request, token.captcha);
    } catch (err) {
      if (err instanceof CaptchaIncorrectError) throw CaptchaErrors.incorrect(err);
      if (err instanceof CaptchaTimeoutError) throw CaptchaErrors.invalid(err);
      throw err;
    }
  }

  async validate(request: CaptchaRequest, captchaText: string | null | undefined): Promise<boolean> {
    if (isEmpty(captchaText)) {
      throw new CaptchaIncorrectError();
    }

    const storedText = await this.captchaCache.get(this.scoped(this.captchaStoreKey, request));
    if (typeof storedText !== 'string' || storedText.length === 0) {
      throw new CaptchaIncorrectError();
    }

    // A text without an issue time cannot be proven fresh.
    const storedAt = await this.captchaCache.get(this.scoped(this.captchaDateStoreKey, request));
    if (typeof storedAt !== 'number' || this.now() - storedAt > this.captchaTimeout) {
      throw new CaptchaTimeoutError();
    }

    return equalsIgnoreCase(storedText, captchaText);
  }

  async setCaptcha(
    request: CaptchaRequest,
    captchaText: string | null | undefined,
    captchaDate?: Date | number | null,
  ): Promise<void> {
    const issuedAt =
      captchaDate instanceof Date ? captchaDate.getTime() : (captchaDate ?? this.now());

    await this.captchaCache.put(
      this.scoped(this.captchaStoreKey, request),
      isEmpty(captchaText) ? '' : captchaText,
    );
    await this.captchaCache.put(this.scoped(this.captchaDateStoreKey, request), issuedAt);
  }
}
