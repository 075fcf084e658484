// src/parsers/codaRecordMapper.ts
import { createCanonicalEvent } from '../lib/canonicalEvent.js';
import { addMinutesToWallClock } from '../lib/calendarDate.js';
import { InvalidTemporalError, UnparseableTemporalError } from '../lib/errors.js';
import { parseTemporal } from './temporalParser.js';
import { joinTextFields, readFlag, readText, requireText } from './sourceRow.js';
import { DEFAULT_EVENT_DURATION_MINUTES, type RecordMapper } from './recordMapper.js';
import type { CanonicalEvent, ParsedTemporal } from '../types/event.js';
import type { SourceRow } from '../types/row.js';

/**
 * Column names of the performances table (requested with useColumnNames=true)
 */
export const CODA_COLUMNS = {
  title: 'Display',
  performanceDate: 'performanceDate',
  organization: 'Organization',
  purchased: 'Purchased',
  venue: 'venue',
  description: ['kenticoUrl', 'artists', 'works'],
} as const;

export interface CodaRecordMapperOptions {
  defaultDurationMinutes?: number;
}

/**
 * Maps Coda performance rows. The table only stores a start, so timed events
 * get a fixed default length; an end past midnight wraps on the same date.
 */
export class CodaRecordMapper implements RecordMapper {
  readonly source = 'coda';
  private readonly defaultDurationMinutes: number;

  constructor(options: CodaRecordMapperOptions = {}) {
    this.defaultDurationMinutes = options.defaultDurationMinutes ?? DEFAULT_EVENT_DURATION_MINUTES;
  }

  map(row: SourceRow): CanonicalEvent {
    const title = requireText(row, CODA_COLUMNS.title);
    const performanceDate = requireText(row, CODA_COLUMNS.performanceDate);
    const start = parsePerformanceDate(performanceDate);

    const organization = readText(row, CODA_COLUMNS.organization);
    const location = readText(row, CODA_COLUMNS.venue);
    const description = joinTextFields(row, CODA_COLUMNS.description);

    return createCanonicalEvent({
      title,
      description,
      location,
      organization,
      purchased: readFlag(row, CODA_COLUMNS.purchased),
      start_date: start.date,
      end_date: start.date,
      start_time: start.time,
      end_time: start.time === undefined ? undefined : addMinutesToWallClock(start.time, this.defaultDurationMinutes),
    });
  }
}

function parsePerformanceDate(value: string): ParsedTemporal {
  try {
    return parseTemporal(value);
  } catch (error) {
    if (error instanceof UnparseableTemporalError) {
      throw new InvalidTemporalError(CODA_COLUMNS.performanceDate, value, error);
    }
    throw error;
  }
}
