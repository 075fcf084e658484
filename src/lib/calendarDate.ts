// src/lib/calendarDate.ts
import { addDays, format } from 'date-fns';
import type { CalendarDate, LocalDateTime, WallClockTime } from '../types/event.js';

const SECONDS_PER_DAY = 24 * 60 * 60;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local midnight of a day. setFullYear keeps years 0-99 as written,
 * where the Date constructor would move them into the 1900s.
 */
function localDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setFullYear(year, monthIndex, day);
  date.setHours(0, 0, 0, 0);
  return date;
}

/**
 * Build a CalendarDate from 1-based month and day.
 * Returns undefined when the combination does not exist (e.g. Feb 30).
 */
export function toCalendarDate(year: number, month: number, day: number): CalendarDate | undefined {
  const date = localDate(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Build a WallClockTime, or undefined when a component is out of range
 */
export function toWallClockTime(hour: number, minute: number, second = 0): WallClockTime | undefined {
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 || second > 59) {
    return undefined;
  }
  return `${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

/**
 * Strict check for a `yyyy-MM-dd` string naming a real day
 */
export function isCalendarDate(value: string): value is CalendarDate {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3])) !== undefined;
}

/**
 * The following calendar day, rolling over month and year ends
 *
 * @example nextCalendarDate('2024-12-31') === '2025-01-01'
 */
export function nextCalendarDate(date: CalendarDate): CalendarDate {
  const [year = 0, month = 1, day = 1] = date.split('-').map(Number);
  return format(addDays(localDate(year, month - 1, day), 1), 'yyyy-MM-dd');
}

/**
 * Add minutes to a time of day, wrapping past midnight.
 * The date is not involved: 22:30 + 150 minutes is 01:00.
 */
export function addMinutesToWallClock(time: WallClockTime, minutes: number): WallClockTime {
  const [hours = 0, mins = 0, secs = 0] = time.split(':').map(Number);
  const total = hours * 3600 + mins * 60 + secs + Math.round(minutes * 60);
  const wrapped = ((total % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY;

  return `${pad(Math.floor(wrapped / 3600))}:${pad(Math.floor((wrapped % 3600) / 60))}:${pad(wrapped % 60)}`;
}

export function toLocalDateTime(date: CalendarDate, time: WallClockTime): LocalDateTime {
  return `${date}T${time}`;
}
