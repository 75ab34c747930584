import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ExternalServiceError } from '../core/errors';
import type { CredentialStore, StoredToken } from '../store/credentials';
import { GmailAuthorizer, GMAIL_READONLY_SCOPE } from './auth';

const NOW = Date.parse('2026-03-01T10:00:00Z');

class MemoryStore implements CredentialStore {
  constructor(public token: StoredToken | null = null) {}

  async load(): Promise<StoredToken | null> {
    return this.token;
  }

  async save(token: StoredToken): Promise<void> {
    this.token = token;
  }

  async clear(): Promise<void> {
    this.token = null;
  }
}

describe('GmailAuthorizer', () => {
  let dir: string;
  let secretsPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'greenhouse-apply-auth-'));
    secretsPath = join(dir, 'credentials.json');
    await writeFile(
      secretsPath,
      JSON.stringify({
        installed: { client_id: 'test-client', client_secret: 'test-secret', redirect_uris: ['http://localhost'] },
      })
    );
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('asks for a login when no token is stored', async () => {
    const authorizer = new GmailAuthorizer(new MemoryStore(), secretsPath);

    const error = await authorizer.authorize().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toHaveProperty('message', 'No Gmail token found. Run "greenhouse-apply login" first');
  });

  test('uses a fresh stored token as is', async () => {
    const token = { access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: NOW + 3_600_000 };
    const store = new MemoryStore(token);
    const save = vi.spyOn(store, 'save');

    const client = await new GmailAuthorizer(store, secretsPath, undefined, () => NOW).authorize();

    expect(client.credentials.access_token).toBe('test-access');
    expect(save).not.toHaveBeenCalled();
  });

  test('rejects an expired token without a refresh token', async () => {
    const store = new MemoryStore({ access_token: 'test-access', expiry_date: NOW - 1000 });

    await expect(new GmailAuthorizer(store, secretsPath, undefined, () => NOW).authorize()).rejects.toThrow(
      'Gmail token expired. Run "greenhouse-apply login" again'
    );
  });

  test('reports missing client secrets', async () => {
    const store = new MemoryStore({ access_token: 'test-access' });

    await expect(new GmailAuthorizer(store, join(dir, 'missing.json')).authorize()).rejects.toThrow(
      `Gmail client secrets not found at ${join(dir, 'missing.json')}`
    );
  });

  test('login stores the token from the consent flow', async () => {
    const store = new MemoryStore();
    const consent = vi.fn(async (_path: string, _scopes: string[]): Promise<StoredToken> => ({
      access_token: 'test-access',
      refresh_token: 'test-refresh',
    }));

    await new GmailAuthorizer(store, secretsPath, consent).login();

    expect(consent).toHaveBeenCalledWith(secretsPath, [GMAIL_READONLY_SCOPE]);
    expect(store.token).toEqual({ access_token: 'test-access', refresh_token: 'test-refresh' });
  });

  test('logout clears the store', async () => {
    const store = new MemoryStore({ access_token: 'test-access' });

    await new GmailAuthorizer(store, secretsPath).logout();

    expect(store.token).toBeNull();
  });
});
