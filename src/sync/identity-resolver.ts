// ---------------------------------------------------------------------------
// Identity resolver
//
// Flattens a group into the set of USER accounts reachable through nested
// groups.  Breadth-first; `searched` holds every group ever enqueued and is
// consulted before enqueueing, so membership cycles terminate.
// ---------------------------------------------------------------------------

import { UpstreamLookupError } from './errors';
import type {
  DirectoryClient,
  DirectoryMember,
  GroupIdentifier,
  MemberAccount,
  SyncLogger,
} from './types';

export async function resolveGroupMembers(
  directory: DirectoryClient,
  group: GroupIdentifier,
  logger: SyncLogger,
): Promise<Set<MemberAccount>> {
  const searched = new Set<GroupIdentifier>([group]);
  const queue: GroupIdentifier[] = [group];
  const users = new Set<MemberAccount>();

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;

    const members = await listMembers(directory, group, current, logger);
    for (const member of members) {
      switch (member.kind) {
        case 'USER':
          users.add(member.id);
          break;
        case 'GROUP':
          if (!searched.has(member.id)) {
            searched.add(member.id);
            queue.push(member.id);
          }
          break;
        case 'OTHER':
          break;
      }
    }
  }

  logger.debug({ group, members: users.size, groupsSearched: searched.size }, 'Resolved group');
  return users;
}

/**
 * A nested group that no longer exists contributes nothing; the top-level
 * group must resolve.
 */
async function listMembers(
  directory: DirectoryClient,
  root: GroupIdentifier,
  group: GroupIdentifier,
  logger: SyncLogger,
): Promise<DirectoryMember[]> {
  try {
    return await directory.listGroupMembers(group);
  } catch (err) {
    if (group !== root && err instanceof UpstreamLookupError && err.notFound) {
      logger.warn({ group: root, nestedGroup: group }, 'Nested group not found, skipping');
      return [];
    }
    throw err;
  }
}
