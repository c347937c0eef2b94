/**
 * src/modules/security/security.routes.ts
 *
 * WHY:
 * - Operators need to see which security settings the process actually bound
 *   (defaults + overrides), without shelling into the host.
 *
 * RULES:
 * - Read-only. Properties are never mutated after bootstrap.
 * - Cache key names are internal; they are masked in the response.
 */

import type { FastifyInstance } from 'fastify';
import type { SecurityProperties, SecurityPropertiesSnapshot } from './security.properties';

const MASKED_FIELDS = ['captchaStoreKey', 'captchaDateStoreKey'] as const;

export type PublicSecurityProperties = Omit<
  SecurityPropertiesSnapshot,
  (typeof MASKED_FIELDS)[number]
>;

export function toPublicSnapshot(properties: SecurityProperties): PublicSecurityProperties {
  const { captchaStoreKey: _storeKey, captchaDateStoreKey: _dateKey, ...rest } =
    properties.snapshot();
  return rest;
}

export function registerSecurityRoutes(app: FastifyInstance, properties: SecurityProperties) {
  app.get('/security/properties', () => toPublicSnapshot(properties));
}
