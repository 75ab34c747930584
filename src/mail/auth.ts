import { z } from 'zod';
import { readFile } from 'fs/promises';
import { google } from 'googleapis';
import { authenticate } from '@google-cloud/local-auth';
import { ExternalServiceError } from '../core/errors';
import type { CredentialStore, StoredToken } from '../store/credentials';

export const GMAIL_READONLY_SCOPE = 'https://www.googleapis.com/auth/gmail.readonly';

// Refresh a little early so the token survives a full polling run
const EXPIRY_MARGIN_MS = 5 * 60_000;

const ClientSecretSchema = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  redirect_uris: z.array(z.string()).optional(),
});

const ClientSecretsFileSchema = z
  .object({ installed: ClientSecretSchema.optional(), web: ClientSecretSchema.optional() })
  .refine((file) => file.installed || file.web, 'expected an "installed" or "web" client');

export type GmailClient = InstanceType<typeof google.auth.OAuth2>;

/** Runs the browser consent flow and returns the granted token. */
export type ConsentFlow = (credentialsPath: string, scopes: string[]) => Promise<StoredToken>;

const localConsent: ConsentFlow = async (keyfilePath, scopes) => {
  const client = await authenticate({ keyfilePath, scopes });
  return client.credentials;
};

/**
 * Owns the Gmail OAuth token: loads it from the credential store, refreshes
 * it when it is about to expire and saves whatever Google hands back.
 */
export class GmailAuthorizer {
  constructor(
    private store: CredentialStore,
    private credentialsPath: string,
    private consent: ConsentFlow = localConsent,
    private now: () => number = Date.now
  ) {}

  async authorize(): Promise<GmailClient> {
    const token = await this.store.load();
    if (!token || (!token.access_token && !token.refresh_token)) {
      throw new ExternalServiceError('mail', 'No Gmail token found. Run "greenhouse-apply login" first');
    }

    const client = await this.createClient();
    client.setCredentials(token);

    if (this.isExpiring(token)) {
      if (!token.refresh_token) {
        throw new ExternalServiceError('mail', 'Gmail token expired. Run "greenhouse-apply login" again');
      }
      try {
        await client.getAccessToken();
      } catch (error) {
        throw new ExternalServiceError('mail', 'Could not refresh the Gmail token', error);
      }
      await this.store.save({ ...token, ...client.credentials });
    }

    return client;
  }

  /** Interactive consent; replaces any stored token. */
  async login(): Promise<StoredToken> {
    let token: StoredToken;
    try {
      token = await this.consent(this.credentialsPath, [GMAIL_READONLY_SCOPE]);
    } catch (error) {
      throw new ExternalServiceError('mail', 'Gmail authorization failed', error);
    }
    await this.store.save(token);
    return token;
  }

  async logout(): Promise<void> {
    await this.store.clear();
  }

  private isExpiring(token: StoredToken): boolean {
    if (!token.access_token) return true;
    return typeof token.expiry_date === 'number' && token.expiry_date - EXPIRY_MARGIN_MS <= this.now();
  }

  private async createClient(): Promise<GmailClient> {
    let content: string;
    try {
      content = await readFile(this.credentialsPath, 'utf-8');
    } catch {
      throw new ExternalServiceError('mail', `Gmail client secrets not found at ${this.credentialsPath}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ExternalServiceError('mail', 'Gmail client secrets are not valid JSON', error);
    }

    const parsed = ClientSecretsFileSchema.safeParse(data);
    const secrets = parsed.success ? (parsed.data.installed ?? parsed.data.web) : undefined;
    if (!secrets) {
      const reason = parsed.success ? 'no client entry' : (parsed.error.issues[0]?.message ?? 'unknown error');
      throw new ExternalServiceError('mail', `Gmail client secrets are invalid: ${reason}`);
    }

    return new google.auth.OAuth2(secrets.client_id, secrets.client_secret, secrets.redirect_uris?.[0]);
  }
}
