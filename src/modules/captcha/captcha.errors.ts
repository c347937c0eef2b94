/**
 * src/modules/captcha/captcha.errors.ts
 *
 * WHY:
 * - Two layers fail differently:
 *   - the resolver's text check throws plain errors (CaptchaIncorrectError,
 *     CaptchaTimeoutError), usable without HTTP;
 *   - the authentication layer maps them to AppError (CaptchaErrors) so the
 *     error handler renders a 401 with a stable code.
 *
 * RULES:
 * - Never put the presented or stored captcha text in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export class CaptchaIncorrectError extends Error {
  constructor(message = 'Captcha incorrect') {
    super(message);
    this.name = 'CaptchaIncorrectError';
  }
}

export class CaptchaTimeoutError extends Error {
  constructor(message = 'Captcha timed out') {
    super(message);
    this.name = 'CaptchaTimeoutError';
  }
}

export const CaptchaErrors = {
  /** Missing, never issued, or not matching. */
  incorrect(cause?: unknown, meta?: AppErrorMeta) {
    return new AppError({
      code: 'CAPTCHA_INCORRECT',
      status: 401,
      message: 'Incorrect captcha.',
      meta,
      cause,
    });
  },

  /** Issued too long ago. */
  invalid(cause?: unknown, meta?: AppErrorMeta) {
    return new AppError({
      code: 'CAPTCHA_INVALID',
      status: 401,
      message: 'Captcha has expired. Please request a new one.',
      meta,
      cause,
    });
  },
} as const;
