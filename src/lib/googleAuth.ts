// src/lib/googleAuth.ts
import { randomBytes } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import Fastify from 'fastify';
import { OAuth2Client } from 'google-auth-library';
import type { Credentials } from 'google-auth-library';
import { z } from 'zod';
import type { Logger } from 'pino';
import { OAUTH_CALLBACK_PATH, oauthRoutes } from '../routes/oauthRoutes.js';
import type { CredentialProvider } from './tokenStore.js';

/**
 * Read/write access to calendars and their events
 */
export const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar'];

const DEFAULT_CONSENT_TIMEOUT_MS = 5 * 60 * 1000;

const OAuthClientSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

/**
 * credentials.json as downloaded from Google Cloud Console.
 * Desktop clients nest under "installed", web clients under "web".
 */
const CredentialsFileSchema = z
  .union([z.object({ installed: OAuthClientSchema }), z.object({ web: OAuthClientSchema })])
  .transform((file) => ('installed' in file ? file.installed : file.web));

export type OAuthClientSecret = z.infer<typeof OAuthClientSchema>;

export async function readClientSecret(path: string): Promise<OAuthClientSecret> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new Error(
      `Failed to read Google credentials at ${path}. Download an OAuth client JSON from Google Cloud Console.`,
      { cause: error }
    );
  }

  const result = CredentialsFileSchema.safeParse(JSON.parse(text));
  if (!result.success) {
    throw new Error(`Invalid Google credentials file ${path}: ${result.error.issues.map((i) => i.message).join(', ')}`);
  }
  return result.data;
}

export function redirectUriFor(port: number): string {
  return `http://127.0.0.1:${port}${OAUTH_CALLBACK_PATH}`;
}

export function createOAuthClient(secret: OAuthClientSecret, callbackPort: number): OAuth2Client {
  return new OAuth2Client({
    clientId: secret.client_id,
    clientSecret: secret.client_secret,
    redirectUri: redirectUriFor(callbackPort),
  });
}

/**
 * Write refreshed tokens back to the store.
 * Google only sends a refresh token on first consent, so the cached one is carried over.
 */
export function persistTokenRefreshes(client: OAuth2Client, store: CredentialProvider, log: Logger): void {
  client.on('tokens', (tokens: Credentials) => {
    const merged: Credentials = {
      ...client.credentials,
      ...tokens,
      refresh_token: tokens.refresh_token ?? client.credentials.refresh_token,
    };

    void store.save(merged).then(
      () => log.debug('Saved refreshed OAuth tokens'),
      (error: unknown) => log.error({ err: error }, 'Failed to save refreshed OAuth tokens')
    );
  });
}

export interface InteractiveAuthOptions {
  callbackPort: number;
  log: Logger;
  /** Shows the consent URL to the user */
  onAuthUrl: (url: string) => void;
  timeoutMs?: number;
}

/**
 * Run the installed-app consent flow: serve the callback on loopback,
 * hand the consent URL to the user, exchange the returned code and cache the tokens.
 *
 * @throws Error when consent is denied or does not arrive before the timeout
 */
export async function authorizeInteractively(
  client: OAuth2Client,
  store: CredentialProvider,
  options: InteractiveAuthOptions
): Promise<Credentials> {
  const { callbackPort, log } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONSENT_TIMEOUT_MS;

  // CSRF token echoed back by Google
  const state = randomBytes(32).toString('hex');
  const authUrl = client.generateAuthUrl({
    access_type: 'offline',
    prompt: 'consent',
    scope: CALENDAR_SCOPES,
    state,
  });

  let onCode: (code: string) => void = () => undefined;
  let onDenied: (reason: string) => void = () => undefined;
  const codeReceived = new Promise<string>((resolve, reject) => {
    onCode = resolve;
    onDenied = (reason) => reject(new Error(`Authorization denied: ${reason}`));
  });

  const server = Fastify({ logger: false });
  await server.register(oauthRoutes, { expectedState: state, onCode, onDenied });

  let timer: NodeJS.Timeout | undefined;
  try {
    await server.listen({ port: callbackPort, host: '127.0.0.1' });
    log.info({ redirectUri: redirectUriFor(callbackPort) }, 'Waiting for OAuth consent');
    options.onAuthUrl(authUrl);

    const timedOut = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Timed out after ${Math.round(timeoutMs / 1000)}s waiting for OAuth consent`)),
        timeoutMs
      );
    });
    const code = await Promise.race([codeReceived, timedOut]);

    const { tokens } = await client.getToken(code);
    client.setCredentials(tokens);
    await store.save(tokens);
    log.info('Authorization successful; tokens cached');

    return tokens;
  } finally {
    clearTimeout(timer);
    await server.close();
  }
}

export interface GoogleAuthOptions {
  credentialsPath: string;
  store: CredentialProvider;
  callbackPort: number;
  log: Logger;
  onAuthUrl: (url: string) => void;
  /** Ignore cached tokens and ask for consent again */
  forceConsent?: boolean;
}

/**
 * OAuth client ready for Calendar calls.
 * Uses cached tokens when present and falls back to the consent flow otherwise.
 */
export async function getAuthorizedClient(options: GoogleAuthOptions): Promise<OAuth2Client> {
  const { store, log } = options;
  const secret = await readClientSecret(options.credentialsPath);
  const client = createOAuthClient(secret, options.callbackPort);

  const cached = options.forceConsent ? null : await store.load();
  if (cached && (cached.refresh_token || cached.access_token)) {
    client.setCredentials(cached);
    log.debug('Using cached OAuth tokens');
  } else {
    await authorizeInteractively(client, store, {
      callbackPort: options.callbackPort,
      log,
      onAuthUrl: options.onAuthUrl,
    });
  }

  // The code exchange saves its own tokens; only later refreshes go through the listener
  persistTokenRefreshes(client, store, log);
  return client;
}
