// ---------------------------------------------------------------------------
// Database dialects and instance-local naming
//
// Cloud SQL reports engines as version strings (MYSQL_8_0_26, POSTGRES_15).
// They are normalized once, here, into a DatabaseDialect; every other module
// switches on `dialect.family` and never compares version strings.
// ---------------------------------------------------------------------------

import { UnsupportedDialectError } from './errors';
import type { DatabaseDialect, DialectFamily, GroupIdentifier, MemberAccount } from './types';

const SUPPORTED_VERSIONS: ReadonlyMap<string, DialectFamily> = new Map([
  ['MYSQL_8_0', 'mysql'],
  ['MYSQL_8_4', 'mysql'],
  ['POSTGRES_9_6', 'postgres'],
  ['POSTGRES_10', 'postgres'],
  ['POSTGRES_11', 'postgres'],
  ['POSTGRES_12', 'postgres'],
  ['POSTGRES_13', 'postgres'],
  ['POSTGRES_14', 'postgres'],
  ['POSTGRES_15', 'postgres'],
  ['POSTGRES_16', 'postgres'],
  ['POSTGRES_17', 'postgres'],
]);

export const ROLE_NAME_LIMITS: Readonly<Record<DialectFamily, number>> = {
  mysql: 32,
  postgres: 63,
};

/** Largest limit of any supported dialect. */
export const MAX_ROLE_NAME_LENGTH = Math.max(...Object.values(ROLE_NAME_LIMITS));

const SERVICE_ACCOUNT_SUFFIX = '.gserviceaccount.com';

/**
 * Drops the patch part of a MySQL version (`MYSQL_8_0_26` → `MYSQL_8_0`).
 * Postgres versions are left alone: `POSTGRES_9_6` is a major version.
 */
export function stripMinorVersion(databaseVersion: string): string {
  const match = /^(MYSQL_\d+_\d+)_\d+$/.exec(databaseVersion);
  return match ? match[1] : databaseVersion;
}

export function parseDatabaseVersion(databaseVersion: string, instance?: string): DatabaseDialect {
  const version = stripMinorVersion(databaseVersion.trim().toUpperCase());
  const family = SUPPORTED_VERSIONS.get(version);
  switch (family) {
    case 'mysql':
      return { family: 'mysql', version };
    case 'postgres':
      return { family: 'postgres', version };
    case undefined:
      throw new UnsupportedDialectError(databaseVersion, instance);
  }
}

export function roleNameLimit(dialect: DatabaseDialect): number {
  return ROLE_NAME_LIMITS[dialect.family];
}

// ---------------------------------------------------------------------------
// Naming adapter
// ---------------------------------------------------------------------------

/**
 * Maps an IAM account to the username the instance knows it by.
 * MySQL truncates at the `@`; Postgres drops the service-account suffix.
 */
export function localName(dialect: DatabaseDialect, account: MemberAccount): string {
  switch (dialect.family) {
    case 'mysql':
      return account.split('@')[0];
    case 'postgres':
      return stripServiceAccountSuffix(account);
  }
}

export function isServiceAccount(account: MemberAccount): boolean {
  return account.endsWith(SERVICE_ACCOUNT_SUFFIX);
}

/**
 * Role mirroring a group when no override is given: the part before `@`,
 * with the service-account suffix also dropped on Postgres.
 */
export function defaultRoleName(family: DialectFamily, group: GroupIdentifier): string {
  const prefix = group.split('@')[0];
  return family === 'postgres' ? stripServiceAccountSuffix(prefix) : prefix;
}

export function effectiveRoleName(
  family: DialectFamily,
  group: GroupIdentifier,
  roleOverrides: Readonly<Record<GroupIdentifier, string>>,
): string {
  return Object.prototype.hasOwnProperty.call(roleOverrides, group)
    ? roleOverrides[group]
    : defaultRoleName(family, group);
}

function stripServiceAccountSuffix(name: string): string {
  return name.endsWith(SERVICE_ACCOUNT_SUFFIX) ? name.slice(0, -SERVICE_ACCOUNT_SUFFIX.length) : name;
}
