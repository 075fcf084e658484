// src/parsers/temporalParser.ts
import { UnparseableTemporalError } from '../lib/errors.js';
import { toCalendarDate, toWallClockTime } from '../lib/calendarDate.js';
import type { CalendarDate, ParsedTemporal, WallClockTime } from '../types/event.js';

/**
 * One parse attempt: returns the parsed value or undefined, never throws
 */
export type TemporalAttempt = (input: string) => ParsedTemporal | undefined;

/**
 * Meaning of each capture group, in order
 */
type Field = 'year' | 'month' | 'day' | 'hour' | 'hour12' | 'minute' | 'second' | 'meridiem';

/**
 * Format families, in priority order
 */
export type TemporalFamily = 'zoned' | 'naive-t' | 'naive-space' | 'us-meridiem' | 'date-only';

export interface TemporalFormat {
  readonly name: string; // date-fns style pattern, for logs and docs
  readonly family: TemporalFamily;
  readonly pattern: RegExp;
  readonly fields: readonly Field[];
}

const D1_2 = '(\\d{1,2})';
const YEAR = '(\\d{4})';
const OFFSET = '(?:[Zz]|[+-](?:[01]\\d|2[0-3]):[0-5]\\d)';
const FRACTION = '(?:\\.\\d+)';

function format(
  name: string,
  family: TemporalFamily,
  source: string,
  fields: readonly Field[],
  flags = ''
): TemporalFormat {
  return { name, family, pattern: new RegExp(`^${source}$`, flags), fields };
}

const YMD: readonly Field[] = ['year', 'month', 'day'];
const HM: readonly Field[] = ['hour', 'minute'];
const HMS: readonly Field[] = ['hour', 'minute', 'second'];

/**
 * Date-only formats. Month-first precedes day-first on purpose:
 * `03/04/2024` is March 4, and day-first only wins when month-first is impossible.
 */
export const DATE_FORMATS: readonly TemporalFormat[] = [
  format('yyyy-MM-dd', 'date-only', `${YEAR}-${D1_2}-${D1_2}`, YMD),
  format('MM/dd/yyyy', 'date-only', `${D1_2}/${D1_2}/${YEAR}`, ['month', 'day', 'year']),
  format('dd/MM/yyyy', 'date-only', `${D1_2}/${D1_2}/${YEAR}`, ['day', 'month', 'year']),
  format('yyyy/MM/dd', 'date-only', `${YEAR}/${D1_2}/${D1_2}`, YMD),
  format('MM-dd-yyyy', 'date-only', `${D1_2}-${D1_2}-${YEAR}`, ['month', 'day', 'year']),
];

/**
 * Every format understood by parseTemporal, most specific first
 */
export const TEMPORAL_FORMATS: readonly TemporalFormat[] = [
  // RFC 3339: wall-clock components are taken as written, the offset is not applied
  format(
    "yyyy-MM-dd'T'HH:mm:ss[.SSS]XXX",
    'zoned',
    `(\\d{4})-(\\d{2})-(\\d{2})[Tt ](\\d{2}):(\\d{2}):(\\d{2})${FRACTION}?${OFFSET}`,
    [...YMD, ...HMS]
  ),

  format("yyyy-MM-dd'T'HH:mm:ss", 'naive-t', `${YEAR}-${D1_2}-${D1_2}T${D1_2}:${D1_2}:${D1_2}`, [...YMD, ...HMS]),
  format("yyyy-MM-dd'T'HH:mm:ss.SSS", 'naive-t', `${YEAR}-${D1_2}-${D1_2}T${D1_2}:${D1_2}:${D1_2}${FRACTION}`, [
    ...YMD,
    ...HMS,
  ]),
  format("yyyy-MM-dd'T'HH:mm", 'naive-t', `${YEAR}-${D1_2}-${D1_2}T${D1_2}:${D1_2}`, [...YMD, ...HM]),

  format('yyyy-MM-dd HH:mm:ss', 'naive-space', `${YEAR}-${D1_2}-${D1_2}\\s+${D1_2}:${D1_2}:${D1_2}`, [...YMD, ...HMS]),
  format('yyyy-MM-dd HH:mm', 'naive-space', `${YEAR}-${D1_2}-${D1_2}\\s+${D1_2}:${D1_2}`, [...YMD, ...HM]),

  format(
    'MM/dd/yyyy hh:mm a',
    'us-meridiem',
    `${D1_2}/${D1_2}/${YEAR}\\s+${D1_2}:${D1_2}\\s*([AP]M)`,
    ['month', 'day', 'year', 'hour12', 'minute', 'meridiem'],
    'i'
  ),
  format(
    'MM/dd/yyyy hh:mm:ss a',
    'us-meridiem',
    `${D1_2}/${D1_2}/${YEAR}\\s+${D1_2}:${D1_2}:${D1_2}\\s*([AP]M)`,
    ['month', 'day', 'year', 'hour12', 'minute', 'second', 'meridiem'],
    'i'
  ),

  ...DATE_FORMATS,
];

/**
 * Time-of-day formats for sources that keep date and time in separate columns
 */
export const TIME_FORMATS: readonly TemporalFormat[] = [
  format('HH:mm:ss', 'naive-t', `${D1_2}:${D1_2}:${D1_2}`, HMS),
  format('HH:mm', 'naive-t', `${D1_2}:${D1_2}`, HM),
  format('hh:mm:ss a', 'us-meridiem', `${D1_2}:${D1_2}:${D1_2}\\s*([AP]M)`, ['hour12', 'minute', 'second', 'meridiem'], 'i'),
  format('hh:mm a', 'us-meridiem', `${D1_2}:${D1_2}\\s*([AP]M)`, ['hour12', 'minute', 'meridiem'], 'i'),
];

interface Captured {
  year?: number;
  month?: number;
  day?: number;
  hour?: number;
  minute?: number;
  second?: number;
}

function capture(fmt: TemporalFormat, input: string): Captured | undefined {
  const match = fmt.pattern.exec(input);
  if (!match) {
    return undefined;
  }

  const captured: Captured = {};
  let hour12: number | undefined;
  let meridiem: string | undefined;

  for (const [index, field] of fmt.fields.entries()) {
    const value = match[index + 1];
    if (value === undefined) {
      return undefined;
    }
    switch (field) {
      case 'meridiem':
        meridiem = value.toUpperCase();
        break;
      case 'hour12':
        hour12 = Number(value);
        break;
      default:
        captured[field] = Number(value);
    }
  }

  if (hour12 !== undefined) {
    if (hour12 < 1 || hour12 > 12) {
      return undefined;
    }
    captured.hour = (hour12 % 12) + (meridiem === 'PM' ? 12 : 0);
  }

  return captured;
}

function dateOf(captured: Captured): CalendarDate | undefined {
  if (captured.year === undefined || captured.month === undefined || captured.day === undefined) {
    return undefined;
  }
  return toCalendarDate(captured.year, captured.month, captured.day);
}

function timeOf(captured: Captured): WallClockTime | undefined {
  if (captured.hour === undefined || captured.minute === undefined) {
    return undefined;
  }
  return toWallClockTime(captured.hour, captured.minute, captured.second ?? 0);
}

/**
 * Turn a format description into a pure attempt
 */
export function attemptFor(fmt: TemporalFormat): TemporalAttempt {
  return (input) => {
    const captured = capture(fmt, input);
    if (!captured) {
      return undefined;
    }

    const date = dateOf(captured);
    if (!date) {
      return undefined;
    }

    if (fmt.family === 'date-only') {
      return { date };
    }

    const time = timeOf(captured);
    return time ? { date, time } : undefined;
  };
}

function firstMatch(attempts: readonly TemporalAttempt[], raw: string): ParsedTemporal | undefined {
  const input = raw.trim();
  return attempts.reduce<ParsedTemporal | undefined>((found, attempt) => found ?? attempt(input), undefined);
}

const TEMPORAL_ATTEMPTS = TEMPORAL_FORMATS.map(attemptFor);
const DATE_ATTEMPTS = DATE_FORMATS.map(attemptFor);

/**
 * Parse a free-form date or date-time string.
 * Zone offsets are recognized but not applied; the result is the wall clock as written.
 *
 * @throws UnparseableTemporalError when no format matches
 */
export function parseTemporal(raw: string): ParsedTemporal {
  const parsed = firstMatch(TEMPORAL_ATTEMPTS, raw);
  if (!parsed) {
    throw new UnparseableTemporalError(raw);
  }
  return parsed;
}

export function tryParseTemporal(raw: string): ParsedTemporal | undefined {
  return firstMatch(TEMPORAL_ATTEMPTS, raw);
}

/**
 * Parse a date-only column value
 *
 * @throws UnparseableTemporalError
 */
export function parseCalendarDate(raw: string): CalendarDate {
  const parsed = firstMatch(DATE_ATTEMPTS, raw);
  if (!parsed) {
    throw new UnparseableTemporalError(raw);
  }
  return parsed.date;
}

/**
 * Parse a time-of-day column value (24-hour or 12-hour with AM/PM)
 *
 * @throws UnparseableTemporalError
 */
export function parseTimeOfDay(raw: string): WallClockTime {
  const input = raw.trim();
  for (const fmt of TIME_FORMATS) {
    const captured = capture(fmt, input);
    const time = captured ? timeOf(captured) : undefined;
    if (time) {
      return time;
    }
  }
  throw new UnparseableTemporalError(raw);
}
