/**
 * src/modules/captcha/captcha.controller.ts
 *
 * WHY:
 * - Maps HTTP → CaptchaService.
 * - Owns the scope cookie and the image response headers.
 *
 * RULES:
 * - No cache access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { setCookie } from '../../shared/http/cookies';
import { CAPTCHA_SCOPE_COOKIE_NAME } from '../../shared/http/request-context';
import { buildVerifyCaptchaSchema } from './captcha.schemas';
import type { CaptchaService } from './captcha.service';

export class CaptchaController {
  private readonly verifySchema: ReturnType<typeof buildVerifyCaptchaSchema>;

  constructor(
    private readonly captchaService: CaptchaService,
    private readonly opts: { paramName: string; isProduction: boolean },
  ) {
    this.verifySchema = buildVerifyCaptchaSchema(opts.paramName);
  }

  async issue(req: FastifyRequest, reply: FastifyReply) {
    const result = await this.captchaService.issue({
      captchaScope: req.requestContext.captchaScope,
      requestId: req.requestContext.requestId,
    });

    setCookie(reply, CAPTCHA_SCOPE_COOKIE_NAME, result.captchaScope, {
      isProduction: this.opts.isProduction,
    });

    return reply
      .status(200)
      .header('Content-Type', 'image/svg+xml')
      .header('Cache-Control', 'no-store')
      .send(result.svg);
  }

  async verify(req: FastifyRequest, reply: FastifyReply) {
    const parsed = this.verifySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }

    const valid = await this.captchaService.verify({
      captchaScope: req.requestContext.captchaScope,
      captcha: parsed.data.captcha,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ valid });
  }
}
