/**
 * src/modules/captcha/captcha.routes.ts
 *
 * RULES:
 * - No business logic here.
 * - The presented captcha travels in the POST body only.
 */

import type { FastifyInstance } from 'fastify';
import type { CaptchaController } from './captcha.controller';

export function registerCaptchaRoutes(app: FastifyInstance, controller: CaptchaController) {
  app.get('/captcha', controller.issue.bind(controller));
  app.post('/captcha/verify', controller.verify.bind(controller));
}
