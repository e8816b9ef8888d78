// ---------------------------------------------------------------------------
// Cloud SQL Admin API (v1beta4) — instance users and engine version
// ---------------------------------------------------------------------------

import { GoogleApiClient, isRecord, stringField } from './google-api';
import { isServiceAccount, localName } from '../sync/dialect';
import { formatInstanceRef } from '../sync/instance';
import type { AdminClient, DatabaseDialect, InstanceRef } from '../sync/types';

const SQL_ADMIN_BASE_URL = 'https://sqladmin.googleapis.com/sql/v1beta4';

export class CloudSqlAdminClient implements AdminClient {
  constructor(
    private readonly api: GoogleApiClient,
    private readonly baseUrl: string = SQL_ADMIN_BASE_URL,
  ) {}

  async listPrincipals(instance: InstanceRef): Promise<string[]> {
    const body = await this.api.requestJson({
      service: 'sql-admin',
      resource: formatInstanceRef(instance),
      method: 'GET',
      url: `${this.instanceUrl(instance)}/users`,
      failure:
        `Failed to get the database users for instance \`${formatInstanceRef(instance)}\`. ` +
        'Verify instance connection name and instance details',
    });

    const items = body['items'];
    if (!Array.isArray(items)) return [];
    return items.flatMap((item: unknown) => {
      const name = isRecord(item) ? stringField(item, 'name') : undefined;
      return name ? [name] : [];
    });
  }

  /**
   * Adds an IAM account as a database user.  Postgres knows service accounts
   * without their `.gserviceaccount.com` suffix.
   */
  async createPrincipal(
    instance: InstanceRef,
    dialect: DatabaseDialect,
    account: string,
  ): Promise<void> {
    const serviceAccount = isServiceAccount(account);
    await this.api.requestJson({
      service: 'sql-admin',
      resource: `${formatInstanceRef(instance)}/${account}`,
      method: 'POST',
      url: `${this.instanceUrl(instance)}/users`,
      body: {
        name: dialect.family === 'postgres' ? localName(dialect, account) : account,
        type: serviceAccount ? 'CLOUD_IAM_SERVICE_ACCOUNT' : 'CLOUD_IAM_USER',
      },
      failure:
        `Failed to add IAM user \`${account}\` to Cloud SQL database instance ` +
        `\`${instance.name}\``,
    });
  }

  async getDatabaseVersion(instance: InstanceRef): Promise<string> {
    const body = await this.api.requestJson({
      service: 'sql-admin',
      resource: formatInstanceRef(instance),
      method: 'GET',
      url: this.instanceUrl(instance),
      failure:
        `Failed to get the database version for \`${formatInstanceRef(instance)}\`. ` +
        'Verify instance connection name and instance details',
    });
    return stringField(body, 'databaseVersion') ?? '';
  }

  private instanceUrl(instance: InstanceRef): string {
    return (
      `${this.baseUrl}/projects/${encodeURIComponent(instance.namespace)}` +
      `/instances/${encodeURIComponent(instance.name)}`
    );
  }
}
