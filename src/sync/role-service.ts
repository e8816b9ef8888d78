// ---------------------------------------------------------------------------
// Role services — one implementation per dialect
//
// Both variants satisfy RoleService: inspect who holds a role, create the
// role if it is absent, grant and revoke.  Grant and revoke with an empty
// list issue no statement.
// ---------------------------------------------------------------------------

import { SqlExecutionError } from './errors';
import type { DatabaseDialect, RoleService, SqlExecutor, SqlRow } from './types';

// ---------------------------------------------------------------------------
// MySQL 8
// ---------------------------------------------------------------------------

export const MYSQL_SQL = {
  selectRoleEdges: 'SELECT FROM_USER, TO_USER FROM mysql.role_edges WHERE FROM_USER = ?',
  createRole: 'CREATE ROLE IF NOT EXISTS ?',
  grant: 'GRANT ? TO ?',
  revoke: 'REVOKE ? FROM ?',
} as const;

/**
 * MySQL binds role and user names as quoted strings, which the GRANT/REVOKE
 * grammar accepts, so one statement per user is issued.
 */
export class MysqlRoleService implements RoleService {
  constructor(private readonly sql: SqlExecutor) {}

  async usersWithRole(role: string): Promise<Set<string>> {
    const rows = await this.sql.execute(MYSQL_SQL.selectRoleEdges, [role]);
    return new Set(rows.map((row) => column(row, 'TO_USER')));
  }

  async createRoleIfAbsent(role: string): Promise<void> {
    await this.sql.execute(MYSQL_SQL.createRole, [role]);
  }

  async grant(role: string, users: readonly string[]): Promise<void> {
    for (const user of users) {
      await this.sql.execute(MYSQL_SQL.grant, [role, user]);
    }
  }

  async revoke(role: string, users: readonly string[]): Promise<void> {
    for (const user of users) {
      await this.sql.execute(MYSQL_SQL.revoke, [role, user]);
    }
  }
}

// ---------------------------------------------------------------------------
// PostgreSQL
// ---------------------------------------------------------------------------

export const POSTGRES_SQL = {
  selectRoleMembers:
    'SELECT member_role.rolname AS member FROM pg_auth_members ' +
    'JOIN pg_roles AS granted_role ON granted_role.oid = pg_auth_members.roleid ' +
    'JOIN pg_roles AS member_role ON member_role.oid = pg_auth_members.member ' +
    'WHERE granted_role.rolname = ?',
  roleExists: 'SELECT 1 FROM pg_roles WHERE rolname = ?',
} as const;

/** SQLSTATE duplicate_object, raised when a concurrent caller created the role first. */
const PG_DUPLICATE_OBJECT = '42710';

/**
 * Postgres has no CREATE ROLE IF NOT EXISTS and does not bind identifiers,
 * so role and user names are quoted here and GRANT/REVOKE are batched into a
 * single statement.
 */
export class PostgresRoleService implements RoleService {
  constructor(private readonly sql: SqlExecutor) {}

  async usersWithRole(role: string): Promise<Set<string>> {
    const rows = await this.sql.execute(POSTGRES_SQL.selectRoleMembers, [role]);
    return new Set(rows.map((row) => column(row, 'member')));
  }

  async createRoleIfAbsent(role: string): Promise<void> {
    const existing = await this.sql.execute(POSTGRES_SQL.roleExists, [role]);
    if (existing.length > 0) return;

    try {
      await this.sql.execute(`CREATE ROLE ${quoteIdent(role)}`);
    } catch (err) {
      if (err instanceof SqlExecutionError && err.driverCode === PG_DUPLICATE_OBJECT) return;
      throw err;
    }
  }

  async grant(role: string, users: readonly string[]): Promise<void> {
    if (users.length === 0) return;
    await this.sql.execute(`GRANT ${quoteIdent(role)} TO ${users.map(quoteIdent).join(', ')}`);
  }

  async revoke(role: string, users: readonly string[]): Promise<void> {
    if (users.length === 0) return;
    await this.sql.execute(`REVOKE ${quoteIdent(role)} FROM ${users.map(quoteIdent).join(', ')}`);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function createRoleService(dialect: DatabaseDialect, sql: SqlExecutor): RoleService {
  switch (dialect.family) {
    case 'mysql':
      return new MysqlRoleService(sql);
    case 'postgres':
      return new PostgresRoleService(sql);
  }
}

/**
 * Double-quotes a Postgres identifier, doubling embedded quotes.  A `?` is
 * written `\?` so the executor does not read it as a placeholder.
 */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""').replace(/\?/g, '\\?')}"`;
}

function column(row: SqlRow, name: string): string {
  const value = row[name];
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return String(value);
}
