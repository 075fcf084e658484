// src/utils/eventFilter.ts
import type { CalendarDate, CanonicalEvent } from '../types/event.js';

export interface EventFilterOptions {
  startDate?: CalendarDate; // Inclusive lower bound on start_date
  endDate?: CalendarDate; // Inclusive upper bound on start_date
  purchasedOnly?: boolean;
}

/**
 * Order by start date, then start time; all-day events come first on their date
 */
export function compareEvents(a: CanonicalEvent, b: CanonicalEvent): number {
  if (a.start_date !== b.start_date) {
    return a.start_date < b.start_date ? -1 : 1;
  }
  if (a.start_time === b.start_time) {
    return 0;
  }
  if (a.start_time === undefined) {
    return -1;
  }
  if (b.start_time === undefined) {
    return 1;
  }
  return a.start_time < b.start_time ? -1 : 1;
}

export function matchesFilter(event: CanonicalEvent, options: EventFilterOptions): boolean {
  if (options.startDate !== undefined && event.start_date < options.startDate) {
    return false;
  }
  if (options.endDate !== undefined && event.start_date > options.endDate) {
    return false;
  }
  if (options.purchasedOnly && !event.purchased) {
    return false;
  }
  return true;
}

/**
 * Keep matching events and sort them. The input array is left untouched and
 * events with equal keys keep their relative order.
 */
export function filterEvents(events: readonly CanonicalEvent[], options: EventFilterOptions = {}): CanonicalEvent[] {
  return events.filter((event) => matchesFilter(event, options)).sort(compareEvents);
}

export function hasActiveFilter(options: EventFilterOptions): boolean {
  return options.startDate !== undefined || options.endDate !== undefined || Boolean(options.purchasedOnly);
}
