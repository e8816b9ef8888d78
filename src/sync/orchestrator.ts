// ---------------------------------------------------------------------------
// Sync orchestrator
//
// One reconciliation pass over every (group × instance) pair:
//
//   1. pre-flight   parse instances, check role-name limits, fetch dialects
//   2. lookups      resolve groups ‖ list each instance's database users
//   3. per pair     provision missing users ‖ open role service + create role
//   4. per pair     read role holders, plan, revoke ‖ grant
//
// Pairs run concurrently.  Any failure other than a per-account provisioning
// failure fails the whole run.
// ---------------------------------------------------------------------------

import {
  effectiveRoleName,
  MAX_ROLE_NAME_LENGTH,
  parseDatabaseVersion,
  roleNameLimit,
} from './dialect';
import { ensureValidCredentials } from './credentials';
import { ConfigurationError, SyncError, toSyncError } from './errors';
import { resolveGroupMembers } from './identity-resolver';
import { parseInstanceRef } from './instance';
import { joinAll, joinBoth, logSuppressed } from './join';
import { planReconciliation, toLocalNames } from './planner';
import { ensurePrincipals } from './provisioner';
import type {
  DatabaseDialect,
  GroupIdentifier,
  InstanceRef,
  MemberAccount,
  PairResult,
  RoleServiceHandle,
  SyncContext,
  SyncLogger,
  SyncRequest,
  SyncSummary,
} from './types';

interface InstanceTarget {
  connectionName: string;
  ref: InstanceRef;
  dialect: DatabaseDialect;
}

interface PairInput {
  group: GroupIdentifier;
  target: InstanceTarget;
  role: string;
  members: ReadonlySet<MemberAccount>;
  principals: readonly string[];
}

export type SyncOutcome =
  | { ok: true; summary: SyncSummary }
  | { ok: false; error: SyncError };

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * Boundary operation: never throws, reports either a summary or a typed
 * failure.
 */
export async function runSync(request: SyncRequest, ctx: SyncContext): Promise<SyncOutcome> {
  try {
    return { ok: true, summary: await groupsSync(request, ctx) };
  } catch (err) {
    const error = toSyncError(err);
    ctx.logger.error({ err: error, code: error.code }, 'Sync failed');
    return { ok: false, error };
  }
}

export async function groupsSync(request: SyncRequest, ctx: SyncContext): Promise<SyncSummary> {
  const { logger } = ctx;
  const groups = [...new Set(request.groups)];
  const connectionNames = [...new Set(request.instances)];
  const roleOverrides = request.roleOverrides ?? {};
  const usePrivateNetwork = request.usePrivateNetwork ?? false;

  // ── 1. Pre-flight ─────────────────────────────────────────────────────────
  const refs = connectionNames.map((name) => ({ connectionName: name, ref: parseInstanceRef(name) }));
  verifyRoleLengthUpperBound(groups, roleOverrides);

  if (groups.length === 0 || refs.length === 0) {
    logger.warn({ groups: groups.length, instances: refs.length }, 'Nothing to sync');
    return { runId: ctx.runId, pairs: [] };
  }

  await ensureValidCredentials(ctx.credentials);

  const dialects = await joinAll(
    refs.map(async ({ connectionName, ref }) =>
      parseDatabaseVersion(await ctx.admin.getDatabaseVersion(ref), connectionName),
    ),
    logger,
    'database-version',
  );
  const targets: InstanceTarget[] = refs.map((r, i) => ({ ...r, dialect: dialects[i] }));
  verifyGroupRoleLength(groups, targets, roleOverrides);
  verifyDistinctRoles(groups, targets, roleOverrides);

  // ── 2. Group resolution ‖ database user listing ───────────────────────────
  const [memberSets, principalLists] = await joinBoth(
    joinAll(
      groups.map((group) => resolveGroupMembers(ctx.directory, group, logger)),
      logger,
      'resolve-group',
    ),
    joinAll(
      targets.map((target) => ctx.admin.listPrincipals(target.ref)),
      logger,
      'list-principals',
    ),
    logger,
    'lookups',
  );

  // ── 3 + 4. Pairs ──────────────────────────────────────────────────────────
  const pairs: PairInput[] = groups.flatMap((group, g) =>
    targets.map((target, t) => ({
      group,
      target,
      role: effectiveRoleName(target.dialect.family, group, roleOverrides),
      members: memberSets[g],
      principals: principalLists[t],
    })),
  );

  const results = await joinAll(
    pairs.map((pair) => syncPair(ctx, pair, usePrivateNetwork)),
    logger,
    'sync-pair',
  );

  logger.info(
    {
      pairs: results.length,
      provisioned: total(results, (r) => r.provisioned.length),
      granted: total(results, (r) => r.granted.length),
      revoked: total(results, (r) => r.revoked.length),
    },
    'Sync complete',
  );
  return { runId: ctx.runId, pairs: results };
}

// ---------------------------------------------------------------------------
// Role-name limits
// ---------------------------------------------------------------------------

/**
 * Rejects roles no supported dialect can hold.  Runs before any network
 * call, since it does not need to know the instances' engines.
 */
export function verifyRoleLengthUpperBound(
  groups: readonly GroupIdentifier[],
  roleOverrides: Readonly<Record<GroupIdentifier, string>>,
): void {
  for (const group of groups) {
    // Postgres has the largest limit and never a longer default role
    const role = effectiveRoleName('postgres', group, roleOverrides);
    if (role.length > MAX_ROLE_NAME_LENGTH) {
      throw ConfigurationError.roleTooLong({ group, role, limit: MAX_ROLE_NAME_LENGTH });
    }
  }
}

export function verifyGroupRoleLength(
  groups: readonly GroupIdentifier[],
  targets: readonly Pick<InstanceTarget, 'connectionName' | 'dialect'>[],
  roleOverrides: Readonly<Record<GroupIdentifier, string>>,
): void {
  for (const target of targets) {
    const limit = roleNameLimit(target.dialect);
    for (const group of groups) {
      const role = effectiveRoleName(target.dialect.family, group, roleOverrides);
      if (role.length > limit) {
        throw ConfigurationError.roleTooLong({
          group,
          role,
          limit,
          instance: target.connectionName,
        });
      }
    }
  }
}

/**
 * Each pair reconciles the role against its own group only, so two groups
 * sharing a role on one instance would revoke each other's members.
 */
export function verifyDistinctRoles(
  groups: readonly GroupIdentifier[],
  targets: readonly Pick<InstanceTarget, 'connectionName' | 'dialect'>[],
  roleOverrides: Readonly<Record<GroupIdentifier, string>>,
): void {
  for (const target of targets) {
    const owners = new Map<string, GroupIdentifier>();
    for (const group of groups) {
      const role = effectiveRoleName(target.dialect.family, group, roleOverrides);
      const owner = owners.get(role);
      if (owner !== undefined) {
        throw new ConfigurationError(
          `IAM groups \`${owner}\` and \`${group}\` map to the same role \`${role}\` ` +
            `on instance \`${target.connectionName}\`. ` +
            'Map each group to its own role with `group_roles`.',
        );
      }
      owners.set(role, group);
    }
  }
}

// ---------------------------------------------------------------------------
// Per pair
// ---------------------------------------------------------------------------

async function syncPair(
  ctx: SyncContext,
  pair: PairInput,
  usePrivateNetwork: boolean,
): Promise<PairResult> {
  const { group, target, role, members } = pair;
  const logger = ctx.logger;
  const result: PairResult = {
    group,
    instance: target.connectionName,
    role,
    skipped: false,
    provisioned: [],
    provisioningFailures: [],
    granted: [],
    revoked: [],
  };

  if (members.size === 0) {
    logger.warn({ group, instance: target.connectionName }, 'Group has no members, skipping');
    return { ...result, skipped: true };
  }

  const [provisioning, opening] = await Promise.allSettled([
    ensurePrincipals(ctx.admin, target.ref, target.dialect, members, pair.principals, logger),
    openRoleService(ctx, target, role, usePrivateNetwork),
  ]);
  if (opening.status === 'rejected') {
    logSuppressed([provisioning], logger, 'provision');
    throw opening.reason;
  }

  const handle = opening.value;
  try {
    if (provisioning.status === 'rejected') throw provisioning.reason;
    const { provisioned, failed } = provisioning.value;

    const grantable = [...members].filter((account) => !failed.has(account));
    const desired = toLocalNames(target.dialect, grantable);
    const held = await handle.service.usersWithRole(role);
    const plan = planReconciliation(desired, held);

    await joinBoth(
      handle.service.revoke(role, plan.revoke),
      handle.service.grant(role, plan.grant),
      logger,
      'apply-plan',
    );

    logger.info(
      {
        group,
        instance: target.connectionName,
        role,
        provisioned: provisioned.size,
        granted: plan.grant.length,
        revoked: plan.revoke.length,
      },
      'Reconciled group role',
    );

    return {
      ...result,
      provisioned: [...provisioned],
      provisioningFailures: [...failed.keys()],
      granted: plan.grant,
      revoked: plan.revoke,
    };
  } finally {
    await closeQuietly(handle, logger, target.connectionName);
  }
}

async function openRoleService(
  ctx: SyncContext,
  target: InstanceTarget,
  role: string,
  usePrivateNetwork: boolean,
): Promise<RoleServiceHandle> {
  const handle = await ctx.roleServices.open(target.ref, target.dialect, usePrivateNetwork);
  try {
    await handle.service.createRoleIfAbsent(role);
  } catch (err) {
    await closeQuietly(handle, ctx.logger, target.connectionName);
    throw err;
  }
  return handle;
}

async function closeQuietly(
  handle: RoleServiceHandle,
  logger: SyncLogger,
  instance: string,
): Promise<void> {
  try {
    await handle.close();
  } catch (err) {
    logger.warn({ err, instance }, 'Failed to close database pool');
  }
}

function total(results: readonly PairResult[], count: (r: PairResult) => number): number {
  return results.reduce((sum, r) => sum + count(r), 0);
}
