/**
 * src/shared/http/cookies.ts
 *
 * WHY:
 * - The captcha scope travels as a cookie. Reading and writing it with the same
 *   flags in one place keeps HttpOnly / SameSite=Strict / Secure (prod) from drifting.
 *
 * RULES:
 * - No business logic here.
 * - Receives isProduction from the caller.
 */

import type { FastifyReply } from 'fastify';

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function setCookie(
  reply: FastifyReply,
  name: string,
  value: string,
  opts: { isProduction: boolean },
): void {
  const parts = [`${name}=${value}`, 'Path=/', 'HttpOnly', 'SameSite=Strict'];

  if (opts.isProduction) {
    parts.push('Secure');
  }

  reply.header('Set-Cookie', parts.join('; '));
}
