/**
 * src/modules/security/policies/caching-flags.policy.ts
 *
 * WHY:
 * - Caching of authentication info, authorization info and sessions hangs off
 *   one master switch. Turning any of them on must turn the master on too.
 * - Keep it pure + unit-testable (no holder, no binder).
 *
 * RULE:
 * - sub-flag := true  → sub-flag true, cachingEnabled true
 * - sub-flag := false → sub-flag false, cachingEnabled untouched (no auto-disable)
 * - effective(sub) = sub && cachingEnabled
 */

export type CachingSubFlag =
  | 'authenticationCachingEnabled'
  | 'authorizationCachingEnabled'
  | 'sessionCachingEnabled';

export const CACHING_SUB_FLAGS: readonly CachingSubFlag[] = [
  'authenticationCachingEnabled',
  'authorizationCachingEnabled',
  'sessionCachingEnabled',
];

export type CachingFlags = Record<CachingSubFlag, boolean> & { cachingEnabled: boolean };

export function applyCachingFlag(
  flags: CachingFlags,
  which: CachingSubFlag,
  value: boolean,
): CachingFlags {
  return {
    ...flags,
    [which]: value,
    cachingEnabled: value ? true : flags.cachingEnabled,
  };
}

export function isCachingFlagEffective(flags: CachingFlags, which: CachingSubFlag): boolean {
  return flags[which] && flags.cachingEnabled;
}
