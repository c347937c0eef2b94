/**
 * src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs and debugging.
 * - Captcha records are scoped per client; the scope id arrives as a cookie and
 *   is resolved once here so handlers never parse headers themselves.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - captchaScope can be null (first visit, cookie stripped). Unscoped records
 *   use the bare cache keys.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';
import { parseCookies } from './cookies';

export const CAPTCHA_SCOPE_COOKIE_NAME = 'cid';

const SCOPE_PATTERN = /^[A-Za-z0-9_-]{16,128}$/;

export type RequestContext = {
  requestId: string;
  host: string | null;
  captchaScope: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "localhost:3000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

export function parseCaptchaScope(rawCookie: string | undefined): string | null {
  const value = parseCookies(rawCookie)[CAPTCHA_SCOPE_COOKIE_NAME];
  if (!value || !SCOPE_PATTERN.test(value)) return null;
  return value;
}

export function registerRequestContext(app: FastifyInstance) {
  // Decorate so Fastify knows the property exists; the real value is assigned per request.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: randomUUID(),
      host: parseHost(req.headers.host),
      captchaScope: parseCaptchaScope(req.headers.cookie),
    };

    done();
  });
}
