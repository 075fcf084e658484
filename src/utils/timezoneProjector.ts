// src/utils/timezoneProjector.ts
import { formatInTimeZone, getTimezoneOffset } from 'date-fns-tz';
import { effectiveEnd, effectiveStart, isAllDay } from '../lib/canonicalEvent.js';
import { nextCalendarDate, toLocalDateTime } from '../lib/calendarDate.js';
import type { CalendarDate, CanonicalEvent, LocalDateTime } from '../types/event.js';
import type { WireEvent, WireEventTime } from '../types/calendar.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const LOCAL_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

/**
 * Resolve a wall-clock time in `timeZone` to an absolute instant.
 *
 * Offsets in force a day either side give the candidate instants. When the time
 * occurs twice (fall back) the later instant wins; when it does not occur at all
 * (spring forward) it is pushed forward by the length of the gap, so
 * 02:30 on a 02:00 -> 03:00 transition becomes 03:30.
 *
 * @param local - `yyyy-MM-ddTHH:mm:ss`, no offset
 * @param timeZone - IANA zone (e.g., 'America/Los_Angeles')
 */
export function resolveWallClock(local: LocalDateTime, timeZone: string): Date {
  const wallAsUtc = Date.parse(`${local}Z`);
  const offsets = new Set([
    getTimezoneOffset(timeZone, new Date(wallAsUtc - DAY_MS)),
    getTimezoneOffset(timeZone, new Date(wallAsUtc + DAY_MS)),
  ]);

  const candidates = [...offsets].map((offset) => wallAsUtc - offset);
  const existing = candidates.filter(
    (instant) => formatInTimeZone(instant, timeZone, LOCAL_FORMAT) === local
  );

  if (existing.length > 1) {
    // Ambiguous: fall-back transition
    return new Date(Math.max(...existing));
  }
  if (existing.length === 1) {
    return new Date(existing[0] ?? wallAsUtc);
  }
  // Nonexistent: spring-forward gap
  return new Date(Math.max(...candidates));
}

/**
 * Instant at which `date` begins in `timeZone`
 */
export function startOfDayInZone(date: CalendarDate, timeZone: string): Date {
  return resolveWallClock(toLocalDateTime(date, '00:00:00'), timeZone);
}

function projectTimed(local: LocalDateTime, timeZone: string): WireEventTime {
  return {
    dateTime: resolveWallClock(local, timeZone).toISOString(),
    timeZone,
  };
}

/**
 * Convert an event into the Calendar API insert body.
 *
 * All-day events become date ranges with an exclusive end (end_date + 1 day).
 * Timed events read their wall-clock times in `referenceZone`.
 */
export function projectEvent(event: CanonicalEvent, referenceZone: string): WireEvent {
  const wire: WireEvent = isAllDay(event)
    ? {
        summary: event.title,
        start: { date: event.start_date },
        end: { date: nextCalendarDate(event.end_date) },
      }
    : {
        summary: event.title,
        start: projectTimed(effectiveStart(event), referenceZone),
        end: projectTimed(effectiveEnd(event), referenceZone),
      };

  if (event.description !== undefined) {
    wire.description = event.description;
  }
  if (event.location !== undefined) {
    wire.location = event.location;
  }

  return wire;
}
