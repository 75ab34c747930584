import { z } from 'zod';
import { readFile, writeFile, rm } from 'fs/promises';
import { dirname, join } from 'path';
import { ensureAppDir, getAppDir } from './index';

export const StoredTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  id_token: z.string().nullish(),
  token_type: z.string().nullish(),
  scope: z.string().optional(),
});

export type StoredToken = z.infer<typeof StoredTokenSchema>;

export interface CredentialStore {
  load(): Promise<StoredToken | null>;
  save(token: StoredToken): Promise<void>;
  clear(): Promise<void>;
}

export function defaultTokenPath(): string {
  return join(getAppDir(), 'token.json');
}

/** Keeps the mail API token in a JSON file readable only by the owner. */
export class FileCredentialStore implements CredentialStore {
  constructor(private file: string = defaultTokenPath()) {}

  async load(): Promise<StoredToken | null> {
    let content: string;
    try {
      content = await readFile(this.file, 'utf-8');
    } catch {
      return null;
    }

    try {
      const parsed = StoredTokenSchema.safeParse(JSON.parse(content));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  async save(token: StoredToken): Promise<void> {
    ensureAppDir(dirname(this.file));
    await writeFile(this.file, JSON.stringify(token, null, 2), { mode: 0o600 });
  }

  async clear(): Promise<void> {
    await rm(this.file, { force: true });
  }
}
