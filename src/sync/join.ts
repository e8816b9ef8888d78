// ---------------------------------------------------------------------------
// Join points
//
// Siblings always run to completion before a failure is re-thrown, so no
// task is left holding a connection.  The first rejection in task order is
// propagated; later ones are only logged.
// ---------------------------------------------------------------------------

import type { SyncLogger } from './types';

export async function joinAll<T>(
  tasks: readonly Promise<T>[],
  logger: SyncLogger,
  label: string,
): Promise<Awaited<T>[]> {
  const settled = await Promise.allSettled(tasks);
  return unwrap(settled, logger, label);
}

export async function joinBoth<A, B>(
  first: Promise<A>,
  second: Promise<B>,
  logger: SyncLogger,
  label: string,
): Promise<[Awaited<A>, Awaited<B>]> {
  const [a, b] = await Promise.allSettled([first, second]);
  if (a.status === 'rejected') {
    logSuppressed([b], logger, label);
    throw a.reason;
  }
  if (b.status === 'rejected') throw b.reason;
  return [a.value, b.value];
}

export function unwrap<T>(
  settled: readonly PromiseSettledResult<T>[],
  logger: SyncLogger,
  label: string,
): T[] {
  const index = settled.findIndex((r) => r.status === 'rejected');
  const first = settled[index];
  if (first !== undefined && first.status === 'rejected') {
    logSuppressed(settled.slice(index + 1), logger, label);
    throw first.reason;
  }

  const values: T[] = [];
  for (const result of settled) {
    if (result.status === 'fulfilled') values.push(result.value);
  }
  return values;
}

export function logSuppressed(
  settled: readonly PromiseSettledResult<unknown>[],
  logger: SyncLogger,
  label: string,
): void {
  for (const result of settled) {
    if (result.status === 'rejected') {
      logger.error({ err: result.reason, task: label }, 'Sibling task failed after the first error');
    }
  }
}
