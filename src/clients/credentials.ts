// ---------------------------------------------------------------------------
// Google credentials
//
// Wraps Application Default Credentials (the Cloud Run service account in
// production) behind the CredentialProvider interface the sync core uses.
// ---------------------------------------------------------------------------

import { GoogleAuth } from 'google-auth-library';
import type { CredentialProvider } from '../sync/types';

export const DEFAULT_SCOPES = [
  'https://www.googleapis.com/auth/admin.directory.group.member.readonly',
  'https://www.googleapis.com/auth/sqlservice.admin',
];

/** Tokens are treated as expired this long before their real expiry. */
const EXPIRY_SKEW_MS = 60_000;
const DEFAULT_TOKEN_TTL_MS = 5 * 60_000;

export class GoogleCredentials implements CredentialProvider {
  private accessToken: string | null = null;
  private expiresAt = 0;
  private email = '';

  constructor(private readonly auth: GoogleAuth) {}

  static fromEnvironment(scopes: string[] = DEFAULT_SCOPES): GoogleCredentials {
    return new GoogleCredentials(new GoogleAuth({ scopes }));
  }

  get valid(): boolean {
    return this.accessToken !== null && Date.now() < this.expiresAt - EXPIRY_SKEW_MS;
  }

  get token(): string | null {
    return this.accessToken;
  }

  get serviceAccountEmail(): string {
    return this.email;
  }

  async refresh(): Promise<void> {
    const client = await this.auth.getClient();
    const { token } = await client.getAccessToken();
    if (!token) {
      throw new Error('Failed to obtain an access token from Application Default Credentials');
    }

    this.accessToken = token;
    this.expiresAt = client.credentials.expiry_date ?? Date.now() + DEFAULT_TOKEN_TTL_MS;

    if (!this.email) {
      const body = await this.auth.getCredentials();
      if (!body.client_email) {
        throw new Error(
          'Failed to get the service account email of the default credentials. ' +
            'Verify the service account used to run the service',
        );
      }
      this.email = body.client_email;
    }
  }
}
