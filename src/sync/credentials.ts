import type { CredentialProvider } from './types';

/** Refreshes the credentials when they are missing or expired. */
export async function ensureValidCredentials(credentials: CredentialProvider): Promise<string> {
  if (!credentials.valid) {
    await credentials.refresh();
  }
  if (!credentials.token) {
    throw new Error('Credentials did not yield an access token after refresh');
  }
  return credentials.token;
}
