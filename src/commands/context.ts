// src/commands/context.ts
import type { OAuth2Client } from 'google-auth-library';
import type { Logger } from 'pino';
import { requireCodaToken } from '../config/env.js';
import type { EnvConfig } from '../config/env.js';
import { getAuthorizedClient } from '../lib/googleAuth.js';
import { FileTokenStore } from '../lib/tokenStore.js';
import { CodaClient } from '../services/codaClient.js';
import { GoogleCalendarService } from '../utils/calendarIntegration.js';
import type { CalendarService } from '../types/calendar.js';
import type { SyncDeps } from './syncCommand.js';

/**
 * Everything a command handler needs, resolved lazily so commands that
 * never reach Google or Coda never ask for their credentials
 */
export interface CommandContext {
  env: EnvConfig;
  log: Logger;
  write: (text: string) => void;
  authorize: (forceConsent?: boolean) => Promise<OAuth2Client>;
  calendar: () => Promise<CalendarService>;
  coda: () => CodaClient;
}

function writeLine(text: string): void {
  process.stdout.write(`${text}\n`);
}

export function createCommandContext(env: EnvConfig, log: Logger, write: (text: string) => void = writeLine): CommandContext {
  const store = new FileTokenStore(env.GOOGLE_TOKEN_CACHE_PATH, env.TOKEN_ENCRYPTION_SECRET);

  const authorize = (forceConsent = false): Promise<OAuth2Client> =>
    getAuthorizedClient({
      credentialsPath: env.GOOGLE_CREDENTIALS_PATH,
      store,
      callbackPort: env.OAUTH_CALLBACK_PORT,
      log: log.child({ module: 'googleAuth' }),
      forceConsent,
      onAuthUrl: (url) => write(`\nOpen this URL in your browser to authorize access:\n\n  ${url}\n`),
    });

  let calendar: Promise<CalendarService> | undefined;

  return {
    env,
    log,
    write,
    authorize,
    calendar: () => {
      calendar ??= authorize().then((auth) => new GoogleCalendarService(auth, env.REFERENCE_TIME_ZONE));
      return calendar;
    },
    coda: () => new CodaClient(requireCodaToken(env), { baseUrl: env.CODA_API_BASE }),
  };
}

export function syncDepsFor(context: CommandContext): SyncDeps {
  return {
    calendar: context.calendar,
    timeZone: context.env.REFERENCE_TIME_ZONE,
    log: context.log,
    write: context.write,
  };
}
