// src/lib/logger.test.ts
import { describe, it, expect } from 'vitest';
import { createLogger } from './logger.js';
import { parseEnv } from '../config/env.js';

function loggerFor(vars: NodeJS.ProcessEnv) {
  const env = parseEnv(vars);
  return createLogger({ NODE_ENV: env.NODE_ENV, LOG_LEVEL: env.LOG_LEVEL });
}

describe('createLogger', () => {
  it('should stay silent under test when no level is set', () => {
    expect(loggerFor({ NODE_ENV: 'test' }).level).toBe('silent');
  });

  it('should log at info by default outside tests', () => {
    expect(loggerFor({ NODE_ENV: 'production' }).level).toBe('info');
  });

  it('should honor an explicit LOG_LEVEL', () => {
    expect(loggerFor({ NODE_ENV: 'test', LOG_LEVEL: 'debug' }).level).toBe('debug');
    expect(loggerFor({ NODE_ENV: 'production', LOG_LEVEL: 'warn' }).level).toBe('warn');
  });
});
