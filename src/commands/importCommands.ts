// src/commands/importCommands.ts
import { CodaRecordMapper } from '../parsers/codaRecordMapper.js';
import { CsvRecordMapper } from '../parsers/csvRecordMapper.js';
import { readCsvEvents } from '../services/csvReader.js';
import { syncDepsFor } from './context.js';
import type { CommandContext } from './context.js';
import { runSync } from './syncCommand.js';
import type { SyncOptions, SyncOutcome } from './syncCommand.js';

/**
 * Sync events from a CSV file
 */
export async function importCsv(file: string, options: SyncOptions, context: CommandContext): Promise<SyncOutcome> {
  const { env, log } = context;
  log.info(`Importing events from: ${file}`);

  const mapper = new CsvRecordMapper({ defaultDurationMinutes: env.DEFAULT_EVENT_DURATION_MINUTES });
  const { events } = await readCsvEvents(file, mapper, log.child({ module: 'csv' }));
  log.info(`Parsed ${events.length} events`);

  return runSync(events, options, syncDepsFor(context));
}

/**
 * Sync events from a Coda performances table
 */
export async function importCoda(
  docId: string,
  tableId: string,
  options: SyncOptions,
  context: CommandContext
): Promise<SyncOutcome> {
  const { env, log } = context;
  log.info(`Importing events from Coda doc: ${docId}, table: ${tableId}`);

  const client = context.coda();
  const mapper = new CodaRecordMapper({ defaultDurationMinutes: env.DEFAULT_EVENT_DURATION_MINUTES });
  const { events } = await client.fetchEvents(docId, tableId, mapper, log.child({ module: 'coda' }));

  return runSync(events, options, syncDepsFor(context));
}
