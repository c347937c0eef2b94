/**
 * src/modules/security/security.module.ts
 *
 * WHY:
 * - Encapsulates security-properties wiring: the bound holder is created by
 *   config.ts and shared read-only with every other module through this one.
 */

import type { FastifyInstance } from 'fastify';
import type { SecurityProperties } from './security.properties';
import { registerSecurityRoutes } from './security.routes';

export type SecurityModule = ReturnType<typeof createSecurityModule>;

export function createSecurityModule(deps: { properties: SecurityProperties }) {
  return {
    properties: deps.properties,

    /** Captcha endpoints are exposed only when both switches are on. */
    isCaptchaActive(): boolean {
      return deps.properties.enabled && deps.properties.captchaEnabled;
    },

    registerRoutes(app: FastifyInstance) {
      registerSecurityRoutes(app, deps.properties);
    },
  };
}
