// ---------------------------------------------------------------------------
// Sync error taxonomy
//
// Every failure the reconciliation core raises is a SyncError carrying a
// stable `code`.  The HTTP layer maps codes to status codes through
// mapSyncErrorToHttp(); nothing else inspects messages.
// ---------------------------------------------------------------------------

export type SyncErrorCode =
  | 'CONFIGURATION'
  | 'UPSTREAM_LOOKUP'
  | 'UNSUPPORTED_DIALECT'
  | 'SQL_EXECUTION'
  | 'INTERNAL';

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SyncError';
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface RoleLengthViolation {
  group: string;
  role: string;
  limit: number;
  instance?: string;
}

export class ConfigurationError extends SyncError {
  declare readonly code: 'CONFIGURATION';
  readonly violation: RoleLengthViolation | null;

  constructor(message: string, violation: RoleLengthViolation | null = null) {
    super('CONFIGURATION', message);
    this.name = 'ConfigurationError';
    this.violation = violation;
  }

  static roleTooLong(violation: RoleLengthViolation): ConfigurationError {
    const where = violation.instance ? ` on instance \`${violation.instance}\`` : '';
    return new ConfigurationError(
      `Group role \`${violation.role}\` for IAM group \`${violation.group}\`${where} ` +
        `exceeds the ${violation.limit} character limit. ` +
        'Map the group to a shorter role name with `group_roles`.',
      violation,
    );
  }
}

// ---------------------------------------------------------------------------
// Upstream REST services
// ---------------------------------------------------------------------------

export type UpstreamService = 'directory' | 'sql-admin';

export class UpstreamLookupError extends SyncError {
  declare readonly code: 'UPSTREAM_LOOKUP';
  readonly service: UpstreamService;
  readonly resource: string;
  /** HTTP status reported by the upstream API, null for transport failures. */
  readonly status: number | null;

  constructor(
    service: UpstreamService,
    resource: string,
    message: string,
    status: number | null = null,
    options?: ErrorOptions,
  ) {
    super('UPSTREAM_LOOKUP', message, options);
    this.name = 'UpstreamLookupError';
    this.service = service;
    this.resource = resource;
    this.status = status;
  }

  get notFound(): boolean {
    return this.status === 404;
  }

  get alreadyExists(): boolean {
    return this.status === 409;
  }
}

// ---------------------------------------------------------------------------
// Dialect / SQL
// ---------------------------------------------------------------------------

export class UnsupportedDialectError extends SyncError {
  declare readonly code: 'UNSUPPORTED_DIALECT';
  readonly databaseVersion: string;

  constructor(databaseVersion: string, instance?: string) {
    const where = instance ? ` of instance \`${instance}\`` : '';
    super(
      'UNSUPPORTED_DIALECT',
      `Database version \`${databaseVersion}\`${where} is not supported. ` +
        'Supported engines are MySQL 8 and PostgreSQL.',
    );
    this.name = 'UnsupportedDialectError';
    this.databaseVersion = databaseVersion;
  }
}

export class SqlExecutionError extends SyncError {
  declare readonly code: 'SQL_EXECUTION';
  readonly sql: string;
  /** Driver error code: SQLSTATE for pg, ER_* for mysql2. */
  readonly driverCode: string | null;

  constructor(sql: string, driverCode: string | null, message: string, options?: ErrorOptions) {
    super('SQL_EXECUTION', message, options);
    this.name = 'SqlExecutionError';
    this.sql = sql;
    this.driverCode = driverCode;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function toSyncError(err: unknown): SyncError {
  if (err instanceof SyncError) return err;
  const cause = err instanceof Error ? err : new Error(String(err));
  return new SyncError('INTERNAL', `Unexpected error during sync: ${cause.message}`, { cause });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Maps a sync failure to the HTTP status returned by PUT /run.
 */
export function mapSyncErrorToHttp(
  err: SyncError,
): { status: number; code: SyncErrorCode; detail: string } {
  switch (err.code) {
    case 'CONFIGURATION':
    case 'UNSUPPORTED_DIALECT':
      return { status: 400, code: err.code, detail: err.message };
    case 'UPSTREAM_LOOKUP':
      return { status: 502, code: err.code, detail: err.message };
    case 'SQL_EXECUTION':
    case 'INTERNAL':
      return { status: 500, code: err.code, detail: err.message };
  }
}
