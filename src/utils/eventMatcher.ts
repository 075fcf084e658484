// src/utils/eventMatcher.ts
import type { Logger } from 'pino';
import { paginate } from '../lib/pagination.js';
import { nextCalendarDate } from '../lib/calendarDate.js';
import type { CanonicalEvent } from '../types/event.js';
import type { DateWindow, FetchRemotePage, MatchPair, RemoteEventRecord } from '../types/calendar.js';

/**
 * Window covering every local start date. The end is one day past the latest
 * date so all-day events on that day are included.
 */
export function matchWindow(events: readonly CanonicalEvent[]): DateWindow | undefined {
  const [first, ...rest] = events;
  if (!first) {
    return undefined;
  }

  let min = first.start_date;
  let max = min;
  for (const event of rest) {
    if (event.start_date < min) min = event.start_date;
    if (event.start_date > max) max = event.start_date;
  }

  return { start: min, endExclusive: nextCalendarDate(max) };
}

/**
 * Fetch every page of remote events in `window`, sequentially, in fetch order.
 * Stops when a page has no next token.
 *
 * @throws PaginationStalledError if a page token comes back a second time
 */
export async function collectRemoteEvents(
  window: DateWindow,
  fetchPage: FetchRemotePage,
  log: Logger
): Promise<RemoteEventRecord[]> {
  const collected: RemoteEventRecord[] = [];
  let pages = 0;

  for await (const items of paginate((pageToken) => fetchPage(window, pageToken))) {
    pages += 1;
    collected.push(...items);
    log.debug({ page: pages, items: items.length }, 'Fetched remote event page');
  }

  return collected;
}

/**
 * Pair local and remote events with the same case-insensitive title and date.
 * Every pair is returned: duplicates in the calendar all match the same local event.
 */
export function matchEvents(
  localEvents: readonly CanonicalEvent[],
  remoteEvents: readonly RemoteEventRecord[]
): MatchPair[] {
  const matches: MatchPair[] = [];

  for (const local of localEvents) {
    const title = local.title.toLowerCase();
    for (const remote of remoteEvents) {
      if (remote.title.toLowerCase() === title && remote.date === local.start_date) {
        matches.push(Object.freeze({ local, remote }));
      }
    }
  }

  return matches;
}

/**
 * Fetch the remote events around `localEvents` and match them
 */
export async function findMatchingEvents(
  localEvents: readonly CanonicalEvent[],
  fetchPage: FetchRemotePage,
  log: Logger
): Promise<MatchPair[]> {
  const window = matchWindow(localEvents);
  if (!window) {
    return [];
  }

  const remoteEvents = await collectRemoteEvents(window, fetchPage, log);
  log.info(
    { start: window.start, endExclusive: window.endExclusive },
    `Found ${remoteEvents.length} events in Google Calendar within date range`
  );

  return matchEvents(localEvents, remoteEvents);
}
