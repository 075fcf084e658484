// src/types/event.ts

/**
 * Calendar date without a zone, formatted `yyyy-MM-dd`.
 * Always zero-padded, so string order is chronological order.
 */
export type CalendarDate = string;

/**
 * Time of day without a zone, formatted `HH:mm:ss` (24-hour, zero-padded).
 */
export type WallClockTime = string;

/**
 * Date and wall-clock time joined as `yyyy-MM-ddTHH:mm:ss`, still zoneless
 */
export type LocalDateTime = string;

/**
 * Result of parsing a free-form temporal string.
 * `time` is absent when the input only carried a date.
 */
export interface ParsedTemporal {
  date: CalendarDate;
  time?: WallClockTime;
}

/**
 * Normalized event shared by every source.
 *
 * An event is all-day when both times are absent and timed when both are present;
 * mixed presence never leaves the record mappers.
 */
export interface CanonicalEvent {
  readonly title: string;
  readonly description?: string;
  readonly location?: string;
  readonly organization?: string; // Only sources with an organization column set this
  readonly purchased: boolean;
  readonly start_date: CalendarDate;
  readonly end_date: CalendarDate; // Inclusive; equals start_date for single-day events
  readonly start_time?: WallClockTime;
  readonly end_time?: WallClockTime;
}

/**
 * Fields accepted by createCanonicalEvent (purchased is optional there)
 */
export type CanonicalEventInput = Omit<CanonicalEvent, 'purchased'> & { purchased?: boolean };
