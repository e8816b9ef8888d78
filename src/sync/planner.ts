// ---------------------------------------------------------------------------
// Reconciliation planner — pure set arithmetic, no I/O
// ---------------------------------------------------------------------------

import { localName } from './dialect';
import type { DatabaseDialect, MemberAccount } from './types';

export interface ReconciliationPlan {
  grant: string[];
  revoke: string[];
}

/**
 * Both inputs must already be in the instance's local naming convention.
 */
export function planReconciliation(
  desired: ReadonlySet<string>,
  held: ReadonlySet<string>,
): ReconciliationPlan {
  return {
    grant: [...desired].filter((name) => !held.has(name)),
    revoke: [...held].filter((name) => !desired.has(name)),
  };
}

export function toLocalNames(
  dialect: DatabaseDialect,
  accounts: Iterable<MemberAccount>,
): Set<string> {
  const names = new Set<string>();
  for (const account of accounts) names.add(localName(dialect, account));
  return names;
}

/** Accounts with no database principal on the instance yet. */
export function missingPrincipals(
  dialect: DatabaseDialect,
  desired: Iterable<MemberAccount>,
  existing: Iterable<string>,
): MemberAccount[] {
  const present = toLocalNames(dialect, existing);
  return [...desired].filter((account) => !present.has(localName(dialect, account)));
}
