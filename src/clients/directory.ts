// ---------------------------------------------------------------------------
// Admin SDK Directory API — group membership
// ---------------------------------------------------------------------------

import { GoogleApiClient, isRecord, stringField } from './google-api';
import type { DirectoryClient, DirectoryMember, DirectoryMemberKind } from '../sync/types';

const DIRECTORY_BASE_URL = 'https://admin.googleapis.com/admin/directory/v1';

export class GoogleDirectoryClient implements DirectoryClient {
  constructor(
    private readonly api: GoogleApiClient,
    private readonly baseUrl: string = DIRECTORY_BASE_URL,
  ) {}

  async listGroupMembers(group: string): Promise<DirectoryMember[]> {
    const members: DirectoryMember[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.api.requestJson({
        service: 'directory',
        resource: group,
        method: 'GET',
        url: `${this.baseUrl}/groups/${encodeURIComponent(group)}/members`,
        query: pageToken ? { pageToken } : {},
        failure:
          `Failed to get members of IAM group \`${group}\`. ` +
          'Verify the group exists and is configured correctly',
      });

      const items = page['members'];
      if (Array.isArray(items)) {
        for (const item of items) {
          const member = toDirectoryMember(item);
          if (member) members.push(member);
        }
      }
      pageToken = stringField(page, 'nextPageToken');
    } while (pageToken);

    return members;
  }
}

function toDirectoryMember(item: unknown): DirectoryMember | null {
  if (!isRecord(item)) return null;
  const email = stringField(item, 'email');
  if (!email) return null;
  return { id: email, kind: memberKind(stringField(item, 'type')) };
}

function memberKind(type: string | undefined): DirectoryMemberKind {
  if (type === 'USER' || type === 'GROUP') return type;
  return 'OTHER';
}
