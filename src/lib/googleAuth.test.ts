// src/lib/googleAuth.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import type { Credentials } from 'google-auth-library';
import {
  authorizeInteractively,
  createOAuthClient,
  getAuthorizedClient,
  persistTokenRefreshes,
  readClientSecret,
  redirectUriFor,
} from './googleAuth.js';
import { FileTokenStore } from './tokenStore.js';
import type { CredentialProvider } from './tokenStore.js';

const log = pino({ level: 'silent' });

function memoryStore(initial: Credentials | null = null) {
  let stored = initial;
  return {
    load: vi.fn(async () => stored),
    save: vi.fn(async (tokens: Credentials) => {
      stored = tokens;
    }),
  } satisfies CredentialProvider;
}

const exchangedTokens: Credentials = {
  access_token: 'test-access',
  refresh_token: 'test-refresh',
  expiry_date: 1717200000000,
};

/**
 * Client whose code exchange succeeds locally, announcing the tokens the way the library does
 */
function consentClient(callbackPort: number) {
  const client = createOAuthClient({ client_id: 'test-client', client_secret: 'test-secret' }, callbackPort);
  const getToken = vi.spyOn(client, 'getToken').mockImplementation(async () => {
    client.emit('tokens', exchangedTokens);
    return { tokens: exchangedTokens, res: null };
  });
  return { client, getToken };
}

/**
 * The redirect Google would send after the consent screen
 */
function callbackUrl(authUrl: string, query: Record<string, string>): string {
  const params = new URL(authUrl).searchParams;
  const callback = new URLSearchParams({ state: params.get('state') ?? '', ...query });
  return `${params.get('redirect_uri') ?? ''}?${callback.toString()}`;
}

describe('googleAuth', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'calendar-sync-auth-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeCredentials(body: unknown): string {
    const file = path.join(dir, 'credentials.json');
    fs.writeFileSync(file, JSON.stringify(body));
    return file;
  }

  describe('readClientSecret', () => {
    it('should read a desktop client', async () => {
      const file = writeCredentials({
        installed: { client_id: 'test-client', client_secret: 'test-secret', redirect_uris: ['http://localhost'] },
      });

      await expect(readClientSecret(file)).resolves.toEqual({
        client_id: 'test-client',
        client_secret: 'test-secret',
        redirect_uris: ['http://localhost'],
      });
    });

    it('should read a web client', async () => {
      const file = writeCredentials({ web: { client_id: 'test-client', client_secret: 'test-secret' } });

      await expect(readClientSecret(file)).resolves.toEqual({ client_id: 'test-client', client_secret: 'test-secret' });
    });

    it('should explain a missing file', async () => {
      const file = path.join(dir, 'missing.json');

      await expect(readClientSecret(file)).rejects.toThrow(`Failed to read Google credentials at ${file}`);
    });

    it('should reject a file without client credentials', async () => {
      const file = writeCredentials({ installed: { client_id: 'test-client' } });

      await expect(readClientSecret(file)).rejects.toThrow(`Invalid Google credentials file ${file}`);
    });
  });

  it('should redirect to the loopback callback', () => {
    expect(redirectUriFor(8085)).toBe('http://127.0.0.1:8085/oauth2callback');
  });

  describe('persistTokenRefreshes', () => {
    it('should save refreshed tokens and keep the cached refresh token', () => {
      const client = createOAuthClient({ client_id: 'test-client', client_secret: 'test-secret' }, 8085);
      client.setCredentials({ access_token: 'old-access', refresh_token: 'test-refresh' });
      const store = memoryStore();

      persistTokenRefreshes(client, store, log);
      client.emit('tokens', { access_token: 'new-access', expiry_date: 1717200000000 });

      expect(store.save).toHaveBeenCalledWith({
        access_token: 'new-access',
        refresh_token: 'test-refresh',
        expiry_date: 1717200000000,
      });
    });
  });

  describe('getAuthorizedClient', () => {
    it('should use cached tokens without asking for consent', async () => {
      const file = writeCredentials({ installed: { client_id: 'test-client', client_secret: 'test-secret' } });
      const store = memoryStore({ access_token: 'cached-access', refresh_token: 'cached-refresh' });
      const onAuthUrl = vi.fn();

      const client = await getAuthorizedClient({
        credentialsPath: file,
        store,
        callbackPort: 8085,
        log,
        onAuthUrl,
      });

      expect(client.credentials).toEqual({ access_token: 'cached-access', refresh_token: 'cached-refresh' });
      expect(onAuthUrl).not.toHaveBeenCalled();
      expect(store.save).not.toHaveBeenCalled();
    });

    it('should save later refreshes of cached tokens', async () => {
      const file = writeCredentials({ installed: { client_id: 'test-client', client_secret: 'test-secret' } });
      const store = memoryStore({ access_token: 'cached-access', refresh_token: 'cached-refresh' });

      const client = await getAuthorizedClient({ credentialsPath: file, store, callbackPort: 8085, log, onAuthUrl: vi.fn() });
      client.emit('tokens', { access_token: 'refreshed-access' });

      expect(store.save).toHaveBeenCalledWith({ access_token: 'refreshed-access', refresh_token: 'cached-refresh' });
    });
  });

  describe('authorizeInteractively', () => {
    it('should exchange the code, save the tokens and stop listening', async () => {
      const { client, getToken } = consentClient(18471);
      const store = new FileTokenStore(path.join(dir, 'tokens.json'));
      const save = vi.spyOn(store, 'save');
      // Refresh listener already attached, so the exchange triggers a second save
      persistTokenRefreshes(client, store, log);
      const authUrls: string[] = [];
      const responses: Promise<Response>[] = [];

      const tokens = await authorizeInteractively(client, store, {
        callbackPort: 18471,
        log,
        onAuthUrl: (url) => {
          authUrls.push(url);
          responses.push(fetch(callbackUrl(url, { code: 'test-code' })));
        },
      });

      expect(tokens).toEqual(exchangedTokens);
      expect(getToken).toHaveBeenCalledWith('test-code');
      expect(client.credentials).toEqual(exchangedTokens);

      await Promise.all(save.mock.results.map((result) => result.value));
      expect(save).toHaveBeenCalledTimes(2);
      await expect(store.load()).resolves.toEqual(exchangedTokens);
      expect(fs.readdirSync(dir).sort()).toEqual(['tokens.json']);

      const authUrl = new URL(authUrls[0] ?? '');
      expect(authUrl.searchParams.get('access_type')).toBe('offline');
      expect(authUrl.searchParams.get('prompt')).toBe('consent');
      expect(authUrl.searchParams.get('redirect_uri')).toBe('http://127.0.0.1:18471/oauth2callback');
      expect((await responses[0])?.status).toBe(200);
      await expect(fetch(callbackUrl(authUrls[0] ?? '', { code: 'test-code' }))).rejects.toThrow();
    });

    it('should fail when consent is denied', async () => {
      const { client, getToken } = consentClient(18472);
      const store = memoryStore();
      const responses: Promise<Response>[] = [];

      await expect(
        authorizeInteractively(client, store, {
          callbackPort: 18472,
          log,
          onAuthUrl: (url) => {
            responses.push(fetch(callbackUrl(url, { error: 'access_denied' })));
          },
        })
      ).rejects.toThrow('Authorization denied: access_denied');

      expect((await responses[0])?.status).toBe(400);
      expect(getToken).not.toHaveBeenCalled();
      expect(store.save).not.toHaveBeenCalled();
    });

    it('should give up when no callback arrives in time', async () => {
      const { client, getToken } = consentClient(18473);
      const store = memoryStore();
      const authUrls: string[] = [];

      await expect(
        authorizeInteractively(client, store, {
          callbackPort: 18473,
          log,
          timeoutMs: 50,
          onAuthUrl: (url) => {
            authUrls.push(url);
          },
        })
      ).rejects.toThrow('waiting for OAuth consent');

      expect(getToken).not.toHaveBeenCalled();
      await expect(fetch(callbackUrl(authUrls[0] ?? '', { code: 'test-code' }))).rejects.toThrow();
    });
  });
});
