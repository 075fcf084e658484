// src/utils/calendarIntegration.ts

import { google } from 'googleapis';
import type { calendar_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { formatInTimeZone } from 'date-fns-tz';
import type { Logger } from 'pino';
import { describeEvent } from '../lib/canonicalEvent.js';
import { CalendarOperationError } from '../lib/errors.js';
import type { CanonicalEvent } from '../types/event.js';
import type {
  CalendarService,
  CalendarSummary,
  DateWindow,
  FetchRemotePage,
  RemoteEventPage,
  RemoteEventRecord,
  WireEvent,
} from '../types/calendar.js';
import { projectEvent, startOfDayInZone } from './timezoneProjector.js';

/**
 * Calendar API caps a single events.list page at 2500
 */
export const MAX_EVENTS_PER_PAGE = 2500;

/**
 * Reduce an API event to what matching needs.
 * Timed events are dated in `timeZone`, not UTC, so a 7pm Pacific show stays on its own day.
 *
 * @returns undefined for items without an id or a start
 */
export function toRemoteEventRecord(
  item: calendar_v3.Schema$Event,
  timeZone: string
): RemoteEventRecord | undefined {
  if (!item.id) {
    return undefined;
  }

  const date =
    item.start?.date ??
    (item.start?.dateTime ? formatInTimeZone(item.start.dateTime, timeZone, 'yyyy-MM-dd') : undefined);
  if (!date) {
    return undefined;
  }

  return {
    id: item.id,
    title: item.summary ?? '',
    date,
    ...(item.location ? { location: item.location } : {}),
  };
}

/**
 * Google Calendar v3 behind the CalendarService interface
 */
export class GoogleCalendarService implements CalendarService {
  private readonly calendar: calendar_v3.Calendar;

  /**
   * @param auth - Authorized OAuth2 client
   * @param timeZone - Zone used for list windows and for dating timed events
   */
  constructor(
    auth: OAuth2Client,
    private readonly timeZone: string
  ) {
    this.calendar = google.calendar({ version: 'v3', auth });
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    const response = await this.calendar.calendarList.list();

    return (response.data.items ?? []).flatMap((item) =>
      item.id ? [{ id: item.id, summary: item.summary ?? '(No name)', primary: item.primary ?? false }] : []
    );
  }

  async createEvent(calendarId: string, event: WireEvent): Promise<string> {
    const response = await this.calendar.events.insert({ calendarId, requestBody: event }, { retry: true });

    if (!response.data.id) {
      throw new Error('Calendar API returned an event without an id');
    }
    return response.data.id;
  }

  async fetchEventPage(calendarId: string, window: DateWindow, pageToken?: string): Promise<RemoteEventPage> {
    const response = await this.calendar.events.list({
      calendarId,
      timeMin: startOfDayInZone(window.start, this.timeZone).toISOString(),
      timeMax: startOfDayInZone(window.endExclusive, this.timeZone).toISOString(),
      singleEvents: true,
      maxResults: MAX_EVENTS_PER_PAGE,
      timeZone: this.timeZone,
      pageToken,
    });

    const items = (response.data.items ?? []).flatMap((item) => {
      const record = toRemoteEventRecord(item, this.timeZone);
      return record ? [record] : [];
    });

    return response.data.nextPageToken ? { items, nextPageToken: response.data.nextPageToken } : { items };
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    await this.calendar.events.delete({ calendarId, eventId }, { retry: true });
  }
}

/**
 * Bind a service and calendar into the page fetcher used by event matching
 */
export function fetchPageFor(service: CalendarService, calendarId: string): FetchRemotePage {
  return async (window, pageToken) => {
    try {
      return await service.fetchEventPage(calendarId, window, pageToken);
    } catch (error) {
      throw new CalendarOperationError('list', calendarId, error);
    }
  };
}

/**
 * Create events one at a time, in order.
 * Stops at the first failure; events before it stay created.
 *
 * @returns Created event IDs
 * @throws CalendarOperationError naming the event that failed
 */
export async function createCalendarEvents(
  service: CalendarService,
  calendarId: string,
  events: readonly CanonicalEvent[],
  timeZone: string,
  log: Logger
): Promise<string[]> {
  const ids: string[] = [];

  for (const event of events) {
    log.debug({ calendarId }, `Creating ${describeEvent(event)}`);
    let id: string;
    try {
      id = await service.createEvent(calendarId, projectEvent(event, timeZone));
    } catch (error) {
      throw new CalendarOperationError('create', event.title, error);
    }
    ids.push(id);
    log.info({ eventId: id }, `Created event: ${event.title}`);
  }

  return ids;
}

/**
 * Delete events by id, in order, stopping at the first failure
 *
 * @returns Number of events deleted
 */
export async function deleteCalendarEvents(
  service: CalendarService,
  calendarId: string,
  eventIds: readonly string[],
  log: Logger
): Promise<number> {
  let deleted = 0;

  for (const eventId of eventIds) {
    try {
      await service.deleteEvent(calendarId, eventId);
    } catch (error) {
      throw new CalendarOperationError('delete', eventId, error);
    }
    deleted += 1;
    log.info({ eventId }, 'Deleted event');
  }

  return deleted;
}
