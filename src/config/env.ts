// src/config/env.ts
import { z } from 'zod';
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';
import { ConfigError } from '../lib/errors.js';

/**
 * Load environment variables from the appropriate .env file based on NODE_ENV.
 * Priority: .env.{NODE_ENV}.local > .env.{NODE_ENV} > .env.local > .env
 *
 * Since dotenv doesn't override by default, we load highest priority first.
 * The first value set for each variable wins.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  const nodeEnv = process.env.NODE_ENV || 'development';

  const envFiles = [
    `.env.${nodeEnv}.local`,
    `.env.${nodeEnv}`,
    '.env.local',
    '.env',
  ];

  for (const file of envFiles) {
    const filePath = join(cwd, file);
    if (existsSync(filePath)) {
      config({ path: filePath });
    }
  }
}

function isIanaTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Environment variable schema using Zod.
 * Validated once at startup so bad settings fail before any API call.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  // Unset means info, or silent under NODE_ENV=test
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Wall-clock times from sources are read in this zone
  REFERENCE_TIME_ZONE: z
    .string()
    .default('America/Los_Angeles')
    .refine(isIanaTimeZone, 'REFERENCE_TIME_ZONE must be an IANA time zone (e.g. America/Los_Angeles)'),
  DEFAULT_EVENT_DURATION_MINUTES: z.coerce.number().int().positive().default(150),

  // Coda
  CODA_API_TOKEN: z.string().min(1).optional(),
  CODA_API_BASE: z.string().url().default('https://coda.io/apis/v1'),

  // Google OAuth
  GOOGLE_CREDENTIALS_PATH: z.string().default('credentials.json'),
  GOOGLE_TOKEN_CACHE_PATH: z.string().default('token_cache.json'),
  TOKEN_ENCRYPTION_SECRET: z.string().min(16, 'TOKEN_ENCRYPTION_SECRET must be at least 16 characters').optional(),
  OAUTH_CALLBACK_PORT: z.coerce.number().int().min(1).max(65535).default(8085),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate environment variables. Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = envSchema.safeParse(present);

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  return result.data;
}

/**
 * Coda commands need a token; everything else runs without one
 */
export function requireCodaToken(env: EnvConfig): string {
  if (!env.CODA_API_TOKEN) {
    throw new ConfigError([
      'CODA_API_TOKEN: environment variable not set. Get your token from https://coda.io/account',
    ]);
  }
  return env.CODA_API_TOKEN;
}
