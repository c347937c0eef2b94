/**
 * src/modules/captcha/captcha.schemas.ts
 *
 * WHY:
 * - Request validation for the captcha endpoints.
 * - The body field name is configurable (shiro.captchaParamName), so the schema
 *   is built from it at module creation.
 */

import { z } from 'zod';

export const CAPTCHA_MAX_LENGTH = 64;

export function buildVerifyCaptchaSchema(paramName: string) {
  return z
    .object({
      [paramName]: z.string().max(CAPTCHA_MAX_LENGTH, 'Captcha is too long'),
    })
    .transform((body) => ({ captcha: body[paramName] ?? '' }));
}
