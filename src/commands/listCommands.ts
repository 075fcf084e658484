// src/commands/listCommands.ts
import { renderCalendarList, renderCodaTables } from '../templates/consoleReport.js';
import type { CommandContext } from './context.js';

/**
 * Print the tables of a Coda doc, to find the table ID for coda-import
 */
export async function listCodaTables(docId: string, context: CommandContext): Promise<void> {
  context.log.info(`Listing tables in Coda doc: ${docId}`);
  const tables = await context.coda().listTables(docId);
  context.write(`\n${renderCodaTables(tables)}\n`);
}

export async function listCalendars(context: CommandContext): Promise<void> {
  const service = await context.calendar();
  const calendars = await service.listCalendars();
  context.write(`\n${renderCalendarList(calendars)}\n`);
}

