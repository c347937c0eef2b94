/**
 * src/modules/captcha/captcha.service.ts
 *
 * WHY:
 * - Orchestrates issuing a challenge (text → cache → SVG) and verifying what the
 *   user typed back.
 *
 * RULES:
 * - No HTTP here (cookies and headers belong to the controller).
 * - Never log captcha text.
 */

import type { Logger } from '../../shared/logger/logger';
import { generateSecureToken } from '../../shared/security/token';
import { createCaptchaChallenge } from './captcha-challenge';
import type { CaptchaImageOptions, CaptchaResolver, CaptchaTextOptions } from './captcha.types';

export type IssueCaptchaParams = {
  captchaScope: string | null;
  requestId: string;
};

export type IssueCaptchaResult = {
  captchaScope: string;
  svg: string;
};

export type VerifyCaptchaParams = {
  captchaScope: string | null;
  captcha: string;
  requestId: string;
};

export class CaptchaService {
  constructor(
    private readonly deps: {
      resolver: CaptchaResolver;
      logger: Logger;
      text: CaptchaTextOptions;
      image: CaptchaImageOptions;
    },
  ) {}

  async issue(params: IssueCaptchaParams): Promise<IssueCaptchaResult> {
    const captchaScope = params.captchaScope ?? generateSecureToken();
    const { text, svg } = createCaptchaChallenge(this.deps.text, this.deps.image);

    await this.deps.resolver.setCaptcha({ captchaScope }, text);

    this.deps.logger.info('captcha.issued', {
      flow: 'captcha.issue',
      requestId: params.requestId,
      captchaScope,
      newScope: params.captchaScope === null,
    });

    return { captchaScope, svg };
  }

  /**
   * Returns whether the captcha matches.
   * Throws CAPTCHA_INCORRECT / CAPTCHA_INVALID (AppError) when there is nothing
   * valid to compare against.
   */
  async verify(params: VerifyCaptchaParams): Promise<boolean> {
    try {
      const valid = await this.deps.resolver.validateToken(
        { captchaScope: params.captchaScope },
        { captcha: params.captcha },
      );

      this.deps.logger.info('captcha.verified', {
        flow: 'captcha.verify',
        requestId: params.requestId,
        captchaScope: params.captchaScope,
        valid,
      });

      return valid;
    } catch (err) {
      this.deps.logger.warn('captcha.verify_failed', {
        flow: 'captcha.verify',
        requestId: params.requestId,
        captchaScope: params.captchaScope,
        reason: err instanceof Error ? err.message : 'unknown',
      });
      throw err;
    }
  }
}
