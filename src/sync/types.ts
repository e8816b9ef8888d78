// ---------------------------------------------------------------------------
// Shared types for the reconciliation core
// ---------------------------------------------------------------------------

import type { BaseLogger } from 'pino';

export type GroupIdentifier = string;
export type MemberAccount = string;

export type DialectFamily = 'mysql' | 'postgres';

/** Normalized engine of an instance; `version` has its minor suffix stripped. */
export type DatabaseDialect =
  | { family: 'mysql'; version: string }
  | { family: 'postgres'; version: string };

export interface InstanceRef {
  /** Project id (may be domain-scoped, e.g. `example.com:my-project`). */
  namespace: string;
  /** Region. */
  locality: string;
  name: string;
}

export type SyncLogger = Pick<BaseLogger, 'error' | 'warn' | 'info' | 'debug'>;

// ---------------------------------------------------------------------------
// Collaborator interfaces
// ---------------------------------------------------------------------------

export type DirectoryMemberKind = 'USER' | 'GROUP' | 'OTHER';

export interface DirectoryMember {
  id: string;
  kind: DirectoryMemberKind;
}

export interface DirectoryClient {
  /** Direct members of a group; throws UpstreamLookupError on failure. */
  listGroupMembers(group: GroupIdentifier): Promise<DirectoryMember[]>;
}

export interface AdminClient {
  /** Names of the database users of an instance, as the admin API reports them. */
  listPrincipals(instance: InstanceRef): Promise<string[]>;
  createPrincipal(
    instance: InstanceRef,
    dialect: DatabaseDialect,
    account: MemberAccount,
  ): Promise<void>;
  /** Raw engine version string, e.g. `MYSQL_8_0_26`. */
  getDatabaseVersion(instance: InstanceRef): Promise<string>;
}

export interface CredentialProvider {
  readonly valid: boolean;
  readonly token: string | null;
  readonly serviceAccountEmail: string;
  refresh(): Promise<void>;
}

export type SqlRow = Record<string, unknown>;

export interface SqlExecutor {
  /** Runs one statement; each `?` binds a value and `\?` is a literal `?`. */
  execute(sql: string, bindings?: readonly string[]): Promise<SqlRow[]>;
}

export interface RoleService {
  usersWithRole(role: string): Promise<Set<string>>;
  createRoleIfAbsent(role: string): Promise<void>;
  grant(role: string, users: readonly string[]): Promise<void>;
  revoke(role: string, users: readonly string[]): Promise<void>;
}

export interface RoleServiceHandle {
  service: RoleService;
  close(): Promise<void>;
}

export interface RoleServiceFactory {
  open(
    instance: InstanceRef,
    dialect: DatabaseDialect,
    usePrivateNetwork: boolean,
  ): Promise<RoleServiceHandle>;
}

// ---------------------------------------------------------------------------
// Request / result
// ---------------------------------------------------------------------------

export interface SyncRequest {
  groups: GroupIdentifier[];
  /** Connection names, `project:region:instance`. */
  instances: string[];
  roleOverrides?: Record<GroupIdentifier, string>;
  usePrivateNetwork?: boolean;
}

export interface SyncContext {
  runId: string;
  credentials: CredentialProvider;
  directory: DirectoryClient;
  admin: AdminClient;
  roleServices: RoleServiceFactory;
  logger: SyncLogger;
}

export interface PairResult {
  group: GroupIdentifier;
  instance: string;
  role: string;
  skipped: boolean;
  provisioned: MemberAccount[];
  provisioningFailures: MemberAccount[];
  granted: string[];
  revoked: string[];
}

export interface SyncSummary {
  runId: string;
  pairs: PairResult[];
}
