/**
 * src/shared/security/token.ts
 *
 * WHY:
 * - Opaque ids handed to clients (captcha scope cookie) must be unguessable
 *   and URL/cookie safe.
 */

import { randomBytes } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
