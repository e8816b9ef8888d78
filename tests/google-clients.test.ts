import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GoogleDirectoryClient } from '../src/clients/directory';
import { GoogleApiClient } from '../src/clients/google-api';
import { CloudSqlAdminClient } from '../src/clients/sql-admin';
import { UpstreamLookupError } from '../src/sync/errors';
import { parseInstanceRef } from '../src/sync/instance';
import { FakeCredentials } from './fakes';

const DIRECTORY_ORIGIN = 'https://admin.googleapis.com';
const SQL_ADMIN_ORIGIN = 'https://sqladmin.googleapis.com';
const MEMBERS_PATH = '/admin/directory/v1/groups/eng%40test.com/members';
const INSTANCE_PATH = '/sql/v1beta4/projects/test-project/instances/db';
const AUTH = { authorization: 'Bearer test-token' };

let agent: MockAgent;
let credentials: FakeCredentials;
let api: GoogleApiClient;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
  credentials = new FakeCredentials();
  api = new GoogleApiClient({ credentials, dispatcher: agent });
});

afterEach(async () => {
  agent.assertNoPendingInterceptors();
  await agent.close();
});

// ── Directory ──────────────────────────────────────────────────

describe('GoogleDirectoryClient', () => {
  it('follows nextPageToken across pages', async () => {
    const pool = agent.get(DIRECTORY_ORIGIN);
    pool
      .intercept({ path: MEMBERS_PATH, method: 'GET', headers: AUTH })
      .reply(200, {
        members: [
          { email: 'a@test.com', type: 'USER' },
          { email: 'nested@test.com', type: 'GROUP' },
        ],
        nextPageToken: 'page-2',
      });
    pool
      .intercept({ path: `${MEMBERS_PATH}?pageToken=page-2`, method: 'GET', headers: AUTH })
      .reply(200, {
        members: [
          { email: 'b@test.com', type: 'USER' },
          { type: 'CUSTOMER', id: 'C0123' },
          { email: 'all@test.com', type: 'CUSTOMER' },
        ],
      });

    const members = await new GoogleDirectoryClient(api).listGroupMembers('eng@test.com');

    expect(members).toEqual([
      { id: 'a@test.com', kind: 'USER' },
      { id: 'nested@test.com', kind: 'GROUP' },
      { id: 'b@test.com', kind: 'USER' },
      { id: 'all@test.com', kind: 'OTHER' },
    ]);
  });

  it('reports a missing group as not found', async () => {
    agent
      .get(DIRECTORY_ORIGIN)
      .intercept({ path: MEMBERS_PATH, method: 'GET' })
      .reply(404, { error: { code: 404, message: 'Resource Not Found: groupKey' } });

    const err = await new GoogleDirectoryClient(api)
      .listGroupMembers('eng@test.com')
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamLookupError);
    if (!(err instanceof UpstreamLookupError)) return;
    expect(err.notFound).toBe(true);
    expect(err.service).toBe('directory');
    expect(err.message).toBe(
      'Failed to get members of IAM group `eng@test.com`. ' +
        'Verify the group exists and is configured correctly: HTTP 404 Resource Not Found: groupKey',
    );
  });

  it('returns no members for an empty group', async () => {
    agent.get(DIRECTORY_ORIGIN).intercept({ path: MEMBERS_PATH, method: 'GET' }).reply(200, {});

    await expect(new GoogleDirectoryClient(api).listGroupMembers('eng@test.com')).resolves.toEqual(
      [],
    );
  });
});

// ── Cloud SQL Admin ────────────────────────────────────────────

describe('CloudSqlAdminClient', () => {
  const ref = parseInstanceRef('test-project:us-central1:db');

  it('reads the database version', async () => {
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({ path: INSTANCE_PATH, method: 'GET', headers: AUTH })
      .reply(200, { name: 'db', databaseVersion: 'POSTGRES_15' });

    await expect(new CloudSqlAdminClient(api).getDatabaseVersion(ref)).resolves.toBe('POSTGRES_15');
  });

  it('lists database user names', async () => {
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({ path: `${INSTANCE_PATH}/users`, method: 'GET' })
      .reply(200, {
        items: [{ name: 'postgres' }, { name: 'alice@test.com', type: 'CLOUD_IAM_USER' }, {}],
      });

    await expect(new CloudSqlAdminClient(api).listPrincipals(ref)).resolves.toEqual([
      'postgres',
      'alice@test.com',
    ]);
  });

  it('creates a Postgres service-account user without its suffix', async () => {
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({
        path: `${INSTANCE_PATH}/users`,
        method: 'POST',
        body: JSON.stringify({ name: 'svc@test-project.iam', type: 'CLOUD_IAM_SERVICE_ACCOUNT' }),
      })
      .reply(200, { kind: 'sql#operation', status: 'DONE' });

    await expect(
      new CloudSqlAdminClient(api).createPrincipal(
        ref,
        { family: 'postgres', version: 'POSTGRES_15' },
        'svc@test-project.iam.gserviceaccount.com',
      ),
    ).resolves.toBeUndefined();
  });

  it('creates a MySQL user under the full email', async () => {
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({
        path: `${INSTANCE_PATH}/users`,
        method: 'POST',
        body: JSON.stringify({ name: 'alice@test.com', type: 'CLOUD_IAM_USER' }),
      })
      .reply(200, {});

    await expect(
      new CloudSqlAdminClient(api).createPrincipal(
        ref,
        { family: 'mysql', version: 'MYSQL_8_0' },
        'alice@test.com',
      ),
    ).resolves.toBeUndefined();
  });

  it('flags an existing user as a conflict', async () => {
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({ path: `${INSTANCE_PATH}/users`, method: 'POST' })
      .reply(409, { error: { code: 409, message: 'User already exists' } });

    const err = await new CloudSqlAdminClient(api)
      .createPrincipal(ref, { family: 'mysql', version: 'MYSQL_8_0' }, 'alice@test.com')
      .catch((e: unknown) => e);

    expect(err instanceof UpstreamLookupError && err.alreadyExists).toBe(true);
  });
});

// ── Shared request handling ────────────────────────────────────

describe('GoogleApiClient', () => {
  it('refreshes invalid credentials before calling', async () => {
    credentials.valid = false;
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({ path: INSTANCE_PATH, method: 'GET' })
      .reply(200, { databaseVersion: 'MYSQL_8_0_31' });

    await new CloudSqlAdminClient(api).getDatabaseVersion(parseInstanceRef('test-project:r:db'));

    expect(credentials.refreshes).toBe(1);
  });

  it('keeps valid credentials', async () => {
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({ path: INSTANCE_PATH, method: 'GET' })
      .reply(200, { databaseVersion: 'MYSQL_8_0_31' });

    await new CloudSqlAdminClient(api).getDatabaseVersion(parseInstanceRef('test-project:r:db'));

    expect(credentials.refreshes).toBe(0);
  });

  it('uses the raw body when the error is not a Google envelope', async () => {
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({ path: INSTANCE_PATH, method: 'GET' })
      .reply(503, 'upstream unavailable');

    await expect(
      api.requestJson({
        service: 'sql-admin',
        resource: 'db',
        method: 'GET',
        url: `${SQL_ADMIN_ORIGIN}${INSTANCE_PATH}`,
        failure: 'Lookup failed',
      }),
    ).rejects.toThrow('Lookup failed: HTTP 503 upstream unavailable');
  });

  it('rejects a body that is not a JSON object', async () => {
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({ path: INSTANCE_PATH, method: 'GET' })
      .reply(200, '[1, 2]');

    await expect(
      api.requestJson({
        service: 'sql-admin',
        resource: 'db',
        method: 'GET',
        url: `${SQL_ADMIN_ORIGIN}${INSTANCE_PATH}`,
        failure: 'Lookup failed',
      }),
    ).rejects.toThrow('Lookup failed: response is not a JSON object');
  });

  it('reports transport failures without a status', async () => {
    agent
      .get(SQL_ADMIN_ORIGIN)
      .intercept({ path: INSTANCE_PATH, method: 'GET' })
      .replyWithError(new Error('socket hang up'));

    const err = await api
      .requestJson({
        service: 'sql-admin',
        resource: 'db',
        method: 'GET',
        url: `${SQL_ADMIN_ORIGIN}${INSTANCE_PATH}`,
        failure: 'Lookup failed',
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamLookupError);
    expect(err instanceof UpstreamLookupError && err.status).toBe(null);
  });
});
