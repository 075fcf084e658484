#!/usr/bin/env node
// src/cli.ts
import yargs from 'yargs/yargs';
import type { Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadEnvFile, parseEnv } from './config/env.js';
import { isCalendarDate } from './lib/calendarDate.js';
import { createLogger } from './lib/logger.js';
import { authenticate } from './commands/authCommand.js';
import { createCommandContext } from './commands/context.js';
import type { CommandContext } from './commands/context.js';
import { importCoda, importCsv } from './commands/importCommands.js';
import { listCalendars, listCodaTables } from './commands/listCommands.js';
import type { SyncOptions } from './commands/syncCommand.js';
import type { CalendarDate } from './types/event.js';

function parseDateOption(value: string): CalendarDate {
  if (!isCalendarDate(value)) {
    throw new Error(`Invalid date format '${value}'. Use YYYY-MM-DD`);
  }
  return value;
}

function withSyncOptions<T>(args: Argv<T>) {
  return args
    .option('calendar-id', {
      alias: 'c',
      type: 'string',
      default: 'primary',
      describe: "Google Calendar ID to sync with (use 'primary' for main calendar)",
    })
    .option('dry-run', {
      alias: 'n',
      type: 'boolean',
      default: false,
      describe: 'Preview without changing Google Calendar',
    })
    .option('stats', {
      alias: 's',
      type: 'boolean',
      default: false,
      describe: 'Show statistics (total events, by organization, by venue)',
    })
    .option('start-date', {
      type: 'string',
      coerce: parseDateOption,
      describe: 'Only include events on or after this date (YYYY-MM-DD)',
    })
    .option('end-date', {
      type: 'string',
      coerce: parseDateOption,
      describe: 'Only include events on or before this date (YYYY-MM-DD)',
    })
    .option('purchased', {
      alias: 'p',
      type: 'boolean',
      default: false,
      describe: 'Only include events where Purchased is Yes',
    })
    .option('delete', {
      type: 'boolean',
      default: false,
      describe: 'Delete matching events from Google Calendar instead of creating them',
    });
}

interface SyncArgs {
  calendarId: string;
  dryRun: boolean;
  stats: boolean;
  startDate: CalendarDate | undefined;
  endDate: CalendarDate | undefined;
  purchased: boolean;
  delete: boolean;
}

function toSyncOptions(argv: SyncArgs): SyncOptions {
  return {
    calendarId: argv.calendarId,
    dryRun: argv.dryRun,
    stats: argv.stats,
    startDate: argv.startDate,
    endDate: argv.endDate,
    purchasedOnly: argv.purchased,
    deleteMatches: argv.delete,
  };
}

/**
 * Command failures are logged here so yargs only reports usage errors
 */
async function run(context: CommandContext, command: () => Promise<unknown>): Promise<void> {
  try {
    await command();
  } catch (error) {
    context.log.error({ err: error }, error instanceof Error ? error.message : 'Command failed');
    process.exitCode = 1;
  }
}

function buildCli(argv: string[], context: CommandContext) {
  return yargs(argv)
    .scriptName('calendar-sync')
    .usage('$0 <command> [options]\n\nSync calendar events from CSV files and Coda tables to Google Calendar')
    .command(
      'import',
      'Import events from a CSV file to Google Calendar (use --dry-run to preview)',
      (args) =>
        withSyncOptions(args).option('file', {
          alias: 'f',
          type: 'string',
          demandOption: true,
          describe: 'Path to the CSV file containing events',
        }),
      (args) => run(context, () => importCsv(args.file, toSyncOptions(args), context))
    )
    .command(
      'coda-import',
      'Import events from a Coda table to Google Calendar (use --dry-run to preview)',
      (args) =>
        withSyncOptions(args)
          .option('doc-id', { alias: 'd', type: 'string', demandOption: true, describe: 'Coda document ID (from the doc URL)' })
          .option('table-id', { alias: 't', type: 'string', demandOption: true, describe: 'Coda table ID or name' }),
      (args) => run(context, () => importCoda(args.docId, args.tableId, toSyncOptions(args), context))
    )
    .command(
      'list-coda-tables',
      'List tables in a Coda document (helps find table IDs)',
      (args) =>
        args.option('doc-id', { alias: 'd', type: 'string', demandOption: true, describe: 'Coda document ID (from the doc URL)' }),
      (args) => run(context, () => listCodaTables(args.docId, context))
    )
    .command('list-calendars', 'List available calendars', {}, () => run(context, () => listCalendars(context)))
    .command(
      'auth',
      'Authenticate with Google Calendar (stores credentials for future use)',
      {},
      () => run(context, () => authenticate(context))
    )
    .demandCommand(1, 'Specify a command')
    .strict()
    .help();
}

async function main(): Promise<void> {
  loadEnvFile();
  const env = parseEnv();
  const log = createLogger({ NODE_ENV: env.NODE_ENV, LOG_LEVEL: env.LOG_LEVEL });
  const context = createCommandContext(env, log.child({ module: 'cli' }));

  await buildCli(hideBin(process.argv), context).parseAsync();
}

main().catch((error: unknown) => {
  // Configuration errors happen before the logger exists
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
