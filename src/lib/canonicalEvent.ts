// src/lib/canonicalEvent.ts
import { EventInvariantError } from './errors.js';
import { toLocalDateTime } from './calendarDate.js';
import type { CanonicalEvent, CanonicalEventInput, LocalDateTime } from '../types/event.js';

const START_OF_DAY = '00:00:00';
const END_OF_DAY = '23:59:59';

/**
 * Build a frozen CanonicalEvent, dropping absent optional fields.
 *
 * @throws EventInvariantError on a blank title, an end before the start,
 *   or only one of start_time / end_time
 */
export function createCanonicalEvent(input: CanonicalEventInput): CanonicalEvent {
  const title = input.title.trim();
  if (!title) {
    throw new EventInvariantError('Event title must not be empty');
  }
  if (input.end_date < input.start_date) {
    throw new EventInvariantError(
      `Event "${title}" ends (${input.end_date}) before it starts (${input.start_date})`
    );
  }
  if ((input.start_time === undefined) !== (input.end_time === undefined)) {
    throw new EventInvariantError(`Event "${title}" must have both a start and end time, or neither`);
  }

  const event: {
    -readonly [K in keyof CanonicalEvent]: CanonicalEvent[K];
  } = {
    title,
    purchased: input.purchased ?? false,
    start_date: input.start_date,
    end_date: input.end_date,
  };

  if (input.description !== undefined) event.description = input.description;
  if (input.location !== undefined) event.location = input.location;
  if (input.organization !== undefined) event.organization = input.organization;
  if (input.start_time !== undefined) event.start_time = input.start_time;
  if (input.end_time !== undefined) event.end_time = input.end_time;

  return Object.freeze(event);
}

export function isAllDay(event: CanonicalEvent): boolean {
  return event.start_time === undefined && event.end_time === undefined;
}

export function isTimed(event: CanonicalEvent): boolean {
  return event.start_time !== undefined && event.end_time !== undefined;
}

/**
 * Start as a zoneless date-time, midnight when the event has no start time
 */
export function effectiveStart(event: CanonicalEvent): LocalDateTime {
  return toLocalDateTime(event.start_date, event.start_time ?? START_OF_DAY);
}

/**
 * End as a zoneless date-time, 23:59:59 when the event has no end time
 */
export function effectiveEnd(event: CanonicalEvent): LocalDateTime {
  return toLocalDateTime(event.end_date, event.end_time ?? END_OF_DAY);
}

/**
 * One-line summary for logs
 */
export function describeEvent(event: CanonicalEvent): string {
  if (isAllDay(event)) {
    return `[ALL DAY] ${event.start_date} - ${event.end_date}: ${event.title}`;
  }
  return `${event.start_date} ${event.start_time ?? ''} - ${event.end_date} ${event.end_time ?? ''}: ${event.title}`;
}
