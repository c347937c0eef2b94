/**
 * src/modules/security/bind-security-properties.ts
 *
 * WHY:
 * - Populates SecurityProperties from flat key/value configuration
 *   (process.env, a parsed .env file, test fixtures).
 *
 * KEY FORMS (all bind the same field):
 * - shiro.sessionTimeout
 * - shiro.session-timeout
 * - SHIRO_SESSION_TIMEOUT
 * Map fields additionally accept bracketed entries:
 * - shiro.filterChainDefinitionMap[/admin/**]=authc
 * or a JSON object as the whole value:
 * - SHIRO_FILTER_CHAIN_DEFINITION_MAP={"/admin/**":"authc"}
 *
 * RULES:
 * - Keys outside the prefix are not ours: skipped silently.
 * - Unknown fields under the prefix are ignored (debug log), like relaxed binding does.
 * - Map entries merge into the current map; defaults survive unless overridden.
 * - cachingEnabled is applied before everything else so an explicit caching
 *   sub-flag always wins over `cachingEnabled=false`.
 * - Every bad value is collected; one PropertyBindingError reports them all.
 */

import { z } from 'zod';
import { logger } from '../../shared/logger/logger';
import { SECURITY_PROPERTIES_PREFIX } from './security.constants';
import { SecurityProperties, type SecurityPropertiesSnapshot } from './security.properties';

type FieldKind = 'boolean' | 'integer' | 'string' | 'nullableString' | 'map';

const FIELD_KINDS = {
  activeSessionsCacheName: 'string',
  authorizationCachingEnabled: 'boolean',
  authorizationCacheName: 'string',
  authenticationCachingEnabled: 'boolean',
  authenticationCacheName: 'string',
  cachingEnabled: 'boolean',
  captchaEnabled: 'boolean',
  captchaParamName: 'string',
  captchaCacheName: 'string',
  captchaStoreKey: 'string',
  captchaDateStoreKey: 'string',
  captchaTimeout: 'integer',
  credentialsRetryTimesLimit: 'integer',
  credentialsRetryCacheName: 'string',
  defaultRolePermissions: 'map',
  enabled: 'boolean',
  failureUrl: 'nullableString',
  filterChainDefinitionMap: 'map',
  loginUrl: 'string',
  postOnlyLogout: 'boolean',
  redirectUrl: 'string',
  retryTimesKeyAttribute: 'string',
  retryTimesWhenAccessDenied: 'integer',
  sessionCachingEnabled: 'boolean',
  sessionCreationEnabled: 'boolean',
  sessionDequeCacheName: 'string',
  kickoutFirst: 'boolean',
  sessionMaximumKickout: 'integer',
  sessionStorageEnabled: 'boolean',
  sessionStateless: 'boolean',
  sessionTimeout: 'integer',
  sessionValidationInterval: 'integer',
  sessionValidationSchedulerEnabled: 'boolean',
  successUrl: 'string',
  unauthorizedUrl: 'nullableString',
  uniqueSession: 'boolean',
  userNativeSessionManager: 'boolean',
} as const satisfies Record<keyof SecurityPropertiesSnapshot, FieldKind>;

type FieldName = keyof typeof FIELD_KINDS;
type FieldsOfKind<K extends FieldKind> = {
  [F in FieldName]: (typeof FIELD_KINDS)[F] extends K ? F : never;
}[FieldName];

// Older configuration files carry the misspelled key.
const FIELD_ALIASES = new Map<string, FieldName>([['uniquesessin', 'uniqueSession']]);

const booleanSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false']))
  .transform((v) => v === 'true');

const integerSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'Expected an integer')
  .transform(Number)
  .pipe(z.number().refine(Number.isSafeInteger, 'Integer out of range'));

const nullableStringSchema = z.string().transform((v) => (v.trim() === '' ? null : v));

const mapSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const decoded: unknown = JSON.parse(raw);
      return decoded;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a JSON object' });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string()));

export type PropertyBindingIssue = { key: string; message: string };

export class PropertyBindingError extends Error {
  constructor(public readonly issues: PropertyBindingIssue[]) {
    super(
      `Invalid ${SECURITY_PROPERTIES_PREFIX}.* configuration: ` +
        issues.map((i) => `${i.key} (${i.message})`).join(', '),
    );
    this.name = 'PropertyBindingError';
  }
}

type Assignment =
  | { key: string; kind: 'boolean'; field: FieldsOfKind<'boolean'>; value: boolean }
  | { key: string; kind: 'integer'; field: FieldsOfKind<'integer'>; value: number }
  | { key: string; kind: 'string'; field: FieldsOfKind<'string'>; value: string }
  | {
      key: string;
      kind: 'nullableString';
      field: FieldsOfKind<'nullableString'>;
      value: string | null;
    }
  | { key: string; kind: 'map'; field: FieldsOfKind<'map'>; entries: [string, string][] };

function canonicalize(name: string): string {
  return name.toLowerCase().replace(/[-_.]/g, '');
}

function isFieldName(name: string): name is FieldName {
  return Object.prototype.hasOwnProperty.call(FIELD_KINDS, name);
}

const CANONICAL_FIELDS = new Map<string, FieldName>();
for (const name of Object.keys(FIELD_KINDS)) {
  if (isFieldName(name)) CANONICAL_FIELDS.set(canonicalize(name), name);
}

function isFieldOfKind<K extends FieldKind>(field: FieldName, kind: K): field is FieldsOfKind<K> {
  return FIELD_KINDS[field] === kind;
}

/**
 * Splits `shiro.foo-bar[entry]` / `SHIRO_FOO_BAR` into the field part and the
 * optional map entry key. Returns null for keys outside the prefix.
 */
export function parsePropertyKey(key: string): { field: string; entry: string | null } | null {
  const prefixLength = SECURITY_PROPERTIES_PREFIX.length + 1;
  const head = key.slice(0, prefixLength).toLowerCase();
  if (head !== `${SECURITY_PROPERTIES_PREFIX}.` && head !== `${SECURITY_PROPERTIES_PREFIX}_`) {
    return null;
  }

  const rest = key.slice(prefixLength);
  const bracket = /^([^[]+)\[(.+)\]$/.exec(rest);
  if (bracket?.[1] && bracket[2]) {
    return { field: bracket[1], entry: bracket[2] };
  }
  return { field: rest, entry: null };
}

export function resolveFieldName(field: string): FieldName | null {
  const canonical = canonicalize(field);
  return CANONICAL_FIELDS.get(canonical) ?? FIELD_ALIASES.get(canonical) ?? null;
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid value';
}

function toAssignment(
  key: string,
  field: FieldName,
  entry: string | null,
  raw: string,
): Assignment | PropertyBindingIssue {
  if (entry !== null) {
    if (!isFieldOfKind(field, 'map')) return { key, message: 'Not a map property' };
    return { key, kind: 'map', field, entries: [[entry, raw]] };
  }

  if (isFieldOfKind(field, 'boolean')) {
    const parsed = booleanSchema.safeParse(raw);
    if (!parsed.success) return { key, message: 'Expected true or false' };
    return { key, kind: 'boolean', field, value: parsed.data };
  }

  if (isFieldOfKind(field, 'integer')) {
    const parsed = integerSchema.safeParse(raw);
    if (!parsed.success) return { key, message: firstIssue(parsed.error) };
    return { key, kind: 'integer', field, value: parsed.data };
  }

  if (isFieldOfKind(field, 'nullableString')) {
    const parsed = nullableStringSchema.safeParse(raw);
    if (!parsed.success) return { key, message: firstIssue(parsed.error) };
    return { key, kind: 'nullableString', field, value: parsed.data };
  }

  if (isFieldOfKind(field, 'map')) {
    const parsed = mapSchema.safeParse(raw);
    if (!parsed.success) return { key, message: firstIssue(parsed.error) };
    return { key, kind: 'map', field, entries: Object.entries(parsed.data) };
  }

  if (isFieldOfKind(field, 'string')) {
    return { key, kind: 'string', field, value: raw };
  }

  return { key, message: 'Unsupported property' };
}

function apply(target: SecurityProperties, assignment: Assignment): void {
  switch (assignment.kind) {
    case 'boolean':
      target[assignment.field] = assignment.value;
      return;
    case 'integer':
      target[assignment.field] = assignment.value;
      return;
    case 'string':
      target[assignment.field] = assignment.value;
      return;
    case 'nullableString':
      target[assignment.field] = assignment.value;
      return;
    case 'map': {
      const map = target[assignment.field];
      for (const [k, v] of assignment.entries) {
        map.set(k, v);
      }
      return;
    }
  }
}

export function bindSecurityProperties(
  source: Record<string, string | undefined>,
  target: SecurityProperties = new SecurityProperties(),
): SecurityProperties {
  const assignments: Assignment[] = [];
  const issues: PropertyBindingIssue[] = [];

  for (const [key, raw] of Object.entries(source)) {
    if (raw === undefined) continue;

    const parsedKey = parsePropertyKey(key);
    if (!parsedKey) continue;

    const field = resolveFieldName(parsedKey.field);
    if (!field) {
      logger.debug('security.property_ignored', { flow: 'security.bind', key });
      continue;
    }

    const result = toAssignment(key, field, parsedKey.entry, raw);
    if ('kind' in result) {
      assignments.push(result);
    } else {
      issues.push(result);
    }
  }

  if (issues.length > 0) {
    throw new PropertyBindingError(issues);
  }

  const master = assignments.filter((a) => a.field === 'cachingEnabled');
  const rest = assignments.filter((a) => a.field !== 'cachingEnabled');
  for (const assignment of [...master, ...rest]) {
    apply(target, assignment);
  }

  return target;
}
