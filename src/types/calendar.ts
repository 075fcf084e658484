// src/types/calendar.ts

import type { CalendarDate, CanonicalEvent } from './event.js';

/**
 * Start or end of an event in the shape the Calendar API expects.
 * All-day boundaries carry a bare date, timed ones an instant plus its zone.
 * Aligned with calendar_v3.Schema$EventDateTime from googleapis.
 */
export type WireEventTime =
  | { date: CalendarDate }
  | {
      dateTime: string; // RFC 3339 instant (UTC)
      timeZone: string; // IANA zone the wall-clock times were read in
    };

/**
 * Request body for events.insert
 */
export interface WireEvent {
  summary: string;
  description?: string;
  location?: string;
  start: WireEventTime;
  end: WireEventTime; // Exclusive for all-day events
}

/**
 * Minimal view of an event already stored in the remote calendar
 */
export interface RemoteEventRecord {
  id: string;
  title: string;
  date: CalendarDate; // Local calendar date the event starts on
  location?: string;
}

/**
 * One remote event paired with the local event it matched
 */
export interface MatchPair {
  readonly local: CanonicalEvent;
  readonly remote: RemoteEventRecord;
}

/**
 * Half-open range of calendar dates: start <= date < endExclusive
 */
export interface DateWindow {
  start: CalendarDate;
  endExclusive: CalendarDate;
}

export interface RemoteEventPage {
  items: RemoteEventRecord[];
  nextPageToken?: string;
}

/**
 * Fetches one page of remote events inside a window
 */
export type FetchRemotePage = (window: DateWindow, pageToken?: string) => Promise<RemoteEventPage>;

export interface CalendarSummary {
  id: string;
  summary: string;
  primary: boolean;
}

/**
 * Remote calendar operations used by the sync commands.
 * GoogleCalendarService is the production implementation.
 */
export interface CalendarService {
  listCalendars(): Promise<CalendarSummary[]>;
  createEvent(calendarId: string, event: WireEvent): Promise<string>;
  fetchEventPage(calendarId: string, window: DateWindow, pageToken?: string): Promise<RemoteEventPage>;
  deleteEvent(calendarId: string, eventId: string): Promise<void>;
}
