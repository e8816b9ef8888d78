import knex from 'knex';
import type { Knex } from 'knex';
import { AuthTypes, Connector, IpAddressTypes } from '@google-cloud/cloud-sql-connector';
import { isRecord } from './clients/google-api';
import { ensureValidCredentials } from './sync/credentials';
import { localName } from './sync/dialect';
import { errorMessage, SqlExecutionError, UpstreamLookupError } from './sync/errors';
import { formatInstanceRef } from './sync/instance';
import { createRoleService } from './sync/role-service';
import type {
  CredentialProvider,
  DatabaseDialect,
  DialectFamily,
  InstanceRef,
  RoleServiceFactory,
  RoleServiceHandle,
  SqlExecutor,
  SqlRow,
} from './sync/types';

// ---------------------------------------------------------------------------
// Pool settings
// ---------------------------------------------------------------------------

export interface DatabasePoolOptions {
  poolMax: number;
  acquireTimeoutMs: number;
}

const DRIVERS: Readonly<Record<DialectFamily, { client: string; database: string }>> = {
  mysql: { client: 'mysql2', database: '' },
  postgres: { client: 'pg', database: 'postgres' },
};

// ---------------------------------------------------------------------------
// Role service factory — one short-lived pool per (group, instance) pair
// ---------------------------------------------------------------------------

/**
 * Connects through the Cloud SQL connector with IAM database
 * authentication.  The login user is the service account's instance-local
 * name, so the service account must itself be an IAM database user with
 * rights to manage roles.
 */
export class CloudSqlRoleServiceFactory implements RoleServiceFactory {
  constructor(
    private readonly credentials: CredentialProvider,
    private readonly options: DatabasePoolOptions,
  ) {}

  async open(
    instance: InstanceRef,
    dialect: DatabaseDialect,
    usePrivateNetwork: boolean,
  ): Promise<RoleServiceHandle> {
    await ensureValidCredentials(this.credentials);

    const connector = new Connector();
    const clientOpts = await connector
      .getOptions({
        instanceConnectionName: formatInstanceRef(instance),
        ipType: usePrivateNetwork ? IpAddressTypes.PRIVATE : IpAddressTypes.PUBLIC,
        authType: AuthTypes.IAM,
      })
      .catch(async (err: unknown) => {
        await connector.close();
        throw new UpstreamLookupError(
          'sql-admin',
          formatInstanceRef(instance),
          `Failed to prepare a connection to \`${formatInstanceRef(instance)}\`: ${errorMessage(err)}`,
          null,
          { cause: err },
        );
      });

    const driver = DRIVERS[dialect.family];
    const db = knex({
      client: driver.client,
      connection: {
        ...clientOpts,
        user: localName(dialect, this.credentials.serviceAccountEmail),
        database: driver.database,
      },
      pool: { min: 0, max: this.options.poolMax },
      acquireConnectionTimeout: this.options.acquireTimeoutMs,
    });

    return {
      service: createRoleService(dialect, new KnexSqlExecutor(db, dialect.family)),
      close: async () => {
        try {
          await db.destroy();
        } finally {
          await connector.close();
        }
      },
    };
  }
}

// ---------------------------------------------------------------------------
// SQL execution
// ---------------------------------------------------------------------------

export class KnexSqlExecutor implements SqlExecutor {
  constructor(
    private readonly db: Knex,
    private readonly family: DialectFamily,
  ) {}

  async execute(sql: string, bindings: readonly string[] = []): Promise<SqlRow[]> {
    try {
      const result: unknown = await this.db.raw(sql, [...bindings]);
      return rawRows(this.family, result);
    } catch (err) {
      throw new SqlExecutionError(
        sql,
        driverErrorCode(err),
        `Failed to execute \`${sql}\`: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}

/**
 * knex.raw resolves to the driver's own result: `[rows, fields]` for mysql2
 * and a result object with `rows` for pg.  Statements without a result set
 * yield no rows.
 */
export function rawRows(family: DialectFamily, result: unknown): SqlRow[] {
  let rows: unknown;
  if (family === 'mysql') {
    rows = Array.isArray(result) ? result[0] : undefined;
  } else {
    rows = isRecord(result) ? result['rows'] : undefined;
  }
  return Array.isArray(rows) ? rows.filter(isRecord) : [];
}

/** SQLSTATE from pg, or the ER_* code from mysql2. */
export function driverErrorCode(err: unknown): string | null {
  if (!isRecord(err)) return null;
  const code = err['code'];
  return typeof code === 'string' ? code : null;
}
