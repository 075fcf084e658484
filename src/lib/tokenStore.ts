// src/lib/tokenStore.ts
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { Credentials } from 'google-auth-library';
import { z } from 'zod';
import { decrypt, encrypt } from './crypto.js';

/**
 * Where OAuth tokens live between runs
 */
export interface CredentialProvider {
  load(): Promise<Credentials | null>;
  save(tokens: Credentials): Promise<void>;
}

const StoredTokensSchema = z
  .object({
    access_token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    expiry_date: z.number().nullish(),
    token_type: z.string().nullish(),
    id_token: z.string().nullish(),
    scope: z.string().optional(),
  })
  .passthrough();

const EncryptedFileSchema = z.object({
  encrypted: z.string().min(1),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON token cache on disk. With a secret, the JSON is wrapped as
 * `{ "encrypted": "salt:iv:content" }`.
 */
export class FileTokenStore implements CredentialProvider {
  constructor(
    private readonly path: string,
    private readonly secret?: string
  ) {}

  async load(): Promise<Credentials | null> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const json: unknown = JSON.parse(text);
    const wrapped = EncryptedFileSchema.safeParse(json);
    if (wrapped.success) {
      if (!this.secret) {
        throw new Error(`Token cache ${this.path} is encrypted; set TOKEN_ENCRYPTION_SECRET to read it`);
      }
      return StoredTokensSchema.parse(JSON.parse(decrypt(wrapped.data.encrypted, this.secret)));
    }

    return StoredTokensSchema.parse(json);
  }

  async save(tokens: Credentials): Promise<void> {
    const json = JSON.stringify(tokens);
    const body = this.secret ? JSON.stringify({ encrypted: encrypt(json, this.secret) }) : json;

    await mkdir(dirname(this.path), { recursive: true });

    // Write to temp file first, then rename (atomic on POSIX systems).
    // Saves may overlap, so each one gets its own temp file.
    const tempPath = `${this.path}.${randomUUID()}.tmp`;
    await writeFile(tempPath, body, { mode: 0o600 });
    await rename(tempPath, this.path);
  }
}
