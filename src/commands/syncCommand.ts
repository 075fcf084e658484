// src/commands/syncCommand.ts
import type { Logger } from 'pino';
import { createCalendarEvents, deleteCalendarEvents, fetchPageFor } from '../utils/calendarIntegration.js';
import { findMatchingEvents } from '../utils/eventMatcher.js';
import { filterEvents, hasActiveFilter } from '../utils/eventFilter.js';
import type { EventFilterOptions } from '../utils/eventFilter.js';
import { renderDeletionPreview, renderEventTable, renderStats } from '../templates/consoleReport.js';
import type { CalendarService, MatchPair } from '../types/calendar.js';
import type { CanonicalEvent } from '../types/event.js';

export interface SyncOptions extends EventFilterOptions {
  calendarId: string;
  dryRun: boolean;
  stats: boolean;
  /** Remove matching calendar events instead of creating new ones */
  deleteMatches: boolean;
}

export interface SyncDeps {
  /** Only called when Google is actually needed, so a plain dry run never authorizes */
  calendar: () => Promise<CalendarService>;
  timeZone: string;
  log: Logger;
  /** Prints one block of report text to stdout */
  write: (text: string) => void;
}

export type SyncOutcome =
  | { action: 'delete-preview'; matches: MatchPair[] }
  | { action: 'deleted'; deleted: number }
  | { action: 'create-preview'; events: CanonicalEvent[] }
  | { action: 'created'; eventIds: string[] };

/**
 * Filter the loaded events, then create them in the calendar, delete their
 * calendar matches, or print what either would do.
 */
export async function runSync(
  loaded: readonly CanonicalEvent[],
  options: SyncOptions,
  deps: SyncDeps
): Promise<SyncOutcome> {
  const { log, write } = deps;

  const events = filterEvents(loaded, options);
  if (hasActiveFilter(options)) {
    log.info({ before: loaded.length, after: events.length }, `After filtering: ${events.length} events`);
  }

  if (options.deleteMatches) {
    const service = await deps.calendar();
    const matches = await findMatchingEvents(events, fetchPageFor(service, options.calendarId), log);

    if (options.dryRun) {
      write(`\n${renderDeletionPreview(matches)}`);
      if (options.stats) {
        write(`\n${renderStats(events)}`);
      }
      return { action: 'delete-preview', matches };
    }

    // A calendar event can match more than one local event
    const eventIds = [...new Set(matches.map((match) => match.remote.id))];
    const deleted = await deleteCalendarEvents(service, options.calendarId, eventIds, log);
    log.info(`Successfully deleted ${deleted} events`);
    return { action: 'deleted', deleted };
  }

  if (options.dryRun) {
    log.info('Dry run mode - not creating events');
    write(`\n${renderEventTable(events)}`);
    if (options.stats) {
      write(`\n${renderStats(events)}`);
    }
    return { action: 'create-preview', events };
  }

  if (options.stats) {
    write(`\n${renderStats(events)}`);
  }

  const service = await deps.calendar();
  const eventIds = await createCalendarEvents(service, options.calendarId, events, deps.timeZone, log);
  log.info(`Successfully created ${eventIds.length} events`);
  return { action: 'created', eventIds };
}
