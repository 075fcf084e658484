// src/templates/consoleReport.ts

import type { CanonicalEvent, WallClockTime } from '../types/event.js';
import type { CalendarSummary, MatchPair } from '../types/calendar.js';
import type { CodaTable } from '../services/codaClient.js';

/**
 * Shorten `text` to at most `maxLength` characters, marking the cut with "..."
 */
export function truncate(text: string, maxLength: number): string {
  const chars = [...text];
  if (chars.length <= maxLength) {
    return text;
  }
  return `${chars.slice(0, Math.max(maxLength - 3, 0)).join('')}...`;
}

/**
 * Left-align each cell in its column; the last cell is never padded
 */
function columns(cells: ReadonlyArray<readonly [text: string, width: number]>): string {
  return cells
    .map(([text, width]) => text.padEnd(width))
    .join(' ')
    .trimEnd();
}

function displayTime(time: WallClockTime | undefined): string {
  return time === undefined ? 'all-day' : time.slice(0, 5);
}

/**
 * Table of events, one line each, with a description line underneath when present
 */
export function renderEventTable(events: readonly CanonicalEvent[]): string {
  const lines = [
    columns([
      ['summary', 40],
      ['start.date', 12],
      ['start', 8],
      ['end.date', 12],
      ['end', 8],
      ['location', 25],
    ]),
    '-'.repeat(105),
  ];

  for (const event of events) {
    lines.push(
      columns([
        [truncate(event.title, 38), 40],
        [event.start_date, 12],
        [displayTime(event.start_time), 8],
        [event.end_date, 12],
        [displayTime(event.end_time), 8],
        [event.location ? truncate(event.location, 23) : '', 25],
      ])
    );
    if (event.description) {
      lines.push(`  description: ${truncate(event.description.replaceAll('\n', ' | '), 100)}`);
    }
  }

  return lines.join('\n');
}

interface Tally {
  label: string;
  total: number;
  purchased: number;
}

/**
 * Count events per key, most frequent first. Ties keep first-seen order.
 */
function tally(events: readonly CanonicalEvent[], keyOf: (event: CanonicalEvent) => string): Tally[] {
  const counts = new Map<string, Tally>();

  for (const event of events) {
    const label = keyOf(event);
    const entry = counts.get(label) ?? { label, total: 0, purchased: 0 };
    entry.total += 1;
    if (event.purchased) {
      entry.purchased += 1;
    }
    counts.set(label, entry);
  }

  return [...counts.values()].sort((a, b) => b.total - a.total);
}

function renderTally(heading: string, rows: Tally[]): string[] {
  return [
    '',
    `Events by ${heading}:`,
    `Total  Purch  ${heading}`,
    '-'.repeat(50),
    ...rows.map((row) => `  ${String(row.total).padStart(4)} ${String(row.purchased).padStart(6)}  ${row.label}`),
  ];
}

/**
 * Totals plus per-venue and per-organization breakdowns
 */
export function renderStats(events: readonly CanonicalEvent[]): string {
  const purchased = events.filter((event) => event.purchased).length;

  return [
    '='.repeat(60),
    'STATISTICS',
    '='.repeat(60),
    '',
    `Total Events: ${events.length} (${purchased} purchased)`,
    ...renderTally('Venue', tally(events, (event) => event.location ?? '(No venue)')),
    ...renderTally('Organization', tally(events, (event) => event.organization ?? '(No organization)')),
  ].join('\n');
}

/**
 * Calendar events a delete run would remove
 */
export function renderDeletionPreview(matches: readonly MatchPair[]): string {
  const lines = [
    `${matches.length} events would be DELETED:`,
    '='.repeat(80),
    columns([
      ['TITLE', 40],
      ['DATE', 12],
      ['GCAL LOCATION', 30],
    ]),
    '-'.repeat(80),
  ];

  for (const { remote } of matches) {
    lines.push(
      columns([
        [truncate(remote.title, 38), 40],
        [remote.date, 12],
        [remote.location ? truncate(remote.location, 28) : '', 30],
      ])
    );
  }

  return lines.join('\n');
}

export function renderCodaTables(tables: readonly CodaTable[]): string {
  return [
    'Tables in Coda document:',
    '-'.repeat(60),
    ...tables.flatMap((table) => [`  ${table.name} (${table.tableType})`, `    ID: ${table.id}`]),
  ].join('\n');
}

export function renderCalendarList(calendars: readonly CalendarSummary[]): string {
  return [
    'Available Calendars:',
    '-'.repeat(60),
    ...calendars.flatMap((calendar) => [
      `  ${calendar.summary}${calendar.primary ? ' [PRIMARY]' : ''}`,
      `    ID: ${calendar.id}`,
    ]),
  ].join('\n');
}
