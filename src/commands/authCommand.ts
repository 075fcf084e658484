// src/commands/authCommand.ts
import type { CommandContext } from './context.js';

/**
 * Run the consent flow even when tokens are cached, and store the result
 */
export async function authenticate(context: CommandContext): Promise<void> {
  context.log.info('Authenticating with Google Calendar...');
  await context.authorize(true);
  context.log.info('Authentication successful!');
}
