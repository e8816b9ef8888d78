// ---------------------------------------------------------------------------
// Instance user provisioner
//
// Creates a database principal for every group member the instance does not
// know yet.  This is the one step where failures stay local: each account is
// created independently and a failed account is reported, not thrown.
// ---------------------------------------------------------------------------

import { formatInstanceRef } from './instance';
import { missingPrincipals } from './planner';
import { errorMessage, UpstreamLookupError } from './errors';
import type {
  AdminClient,
  DatabaseDialect,
  InstanceRef,
  MemberAccount,
  SyncLogger,
} from './types';

export interface ProvisionResult {
  /** Accounts created by this call. */
  provisioned: Set<MemberAccount>;
  /** Accounts that could not be created, with the reason. */
  failed: Map<MemberAccount, string>;
}

export async function ensurePrincipals(
  admin: AdminClient,
  instance: InstanceRef,
  dialect: DatabaseDialect,
  desiredAccounts: ReadonlySet<MemberAccount>,
  existingPrincipals: readonly string[],
  logger: SyncLogger,
): Promise<ProvisionResult> {
  const missing = missingPrincipals(dialect, desiredAccounts, existingPrincipals);
  const result: ProvisionResult = { provisioned: new Set(), failed: new Map() };
  const instanceName = formatInstanceRef(instance);

  await Promise.all(
    missing.map(async (account) => {
      try {
        await admin.createPrincipal(instance, dialect, account);
        result.provisioned.add(account);
        logger.info({ instance: instanceName, account }, 'Created database user');
      } catch (err) {
        if (err instanceof UpstreamLookupError && err.alreadyExists) {
          // Created concurrently by another pair of the same run
          logger.debug({ instance: instanceName, account }, 'Database user already exists');
          return;
        }
        result.failed.set(account, errorMessage(err));
        logger.error(
          { err, instance: instanceName, account },
          'Failed to create database user, continuing without it',
        );
      }
    }),
  );

  return result;
}
