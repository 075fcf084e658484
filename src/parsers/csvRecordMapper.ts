// src/parsers/csvRecordMapper.ts
import { createCanonicalEvent } from '../lib/canonicalEvent.js';
import { addMinutesToWallClock } from '../lib/calendarDate.js';
import { InvalidTemporalError, MissingFieldError, UnparseableTemporalError } from '../lib/errors.js';
import { parseCalendarDate, parseTimeOfDay } from './temporalParser.js';
import { readText, requireText } from './sourceRow.js';
import { DEFAULT_EVENT_DURATION_MINUTES, type RecordMapper } from './recordMapper.js';
import type { CanonicalEvent } from '../types/event.js';
import type { SourceRow } from '../types/row.js';

/**
 * Header names expected in an import CSV
 */
export const CSV_COLUMNS = {
  title: 'title',
  description: 'description',
  location: 'location',
  startDate: 'start_date',
  startTime: 'start_time',
  endDate: 'end_date',
  endTime: 'end_time',
} as const;

export interface CsvRecordMapperOptions {
  defaultDurationMinutes?: number;
}

/**
 * Run a column parser, reporting failures against the column they came from
 */
function parseColumn<T>(field: string, value: string, parse: (raw: string) => T): T {
  try {
    return parse(value);
  } catch (error) {
    if (error instanceof UnparseableTemporalError) {
      throw new InvalidTemporalError(field, value, error);
    }
    throw error;
  }
}

/**
 * Maps CSV rows with separate date and time columns.
 *
 * - end_date defaults to start_date
 * - a start_time without end_time gets the default duration (wrapping at midnight)
 * - an end_time without start_time is rejected
 */
export class CsvRecordMapper implements RecordMapper {
  readonly source = 'csv';
  private readonly defaultDurationMinutes: number;

  constructor(options: CsvRecordMapperOptions = {}) {
    this.defaultDurationMinutes = options.defaultDurationMinutes ?? DEFAULT_EVENT_DURATION_MINUTES;
  }

  map(row: SourceRow): CanonicalEvent {
    const title = requireText(row, CSV_COLUMNS.title);

    const rawStartDate = requireText(row, CSV_COLUMNS.startDate);
    const startDate = parseColumn(CSV_COLUMNS.startDate, rawStartDate, parseCalendarDate);

    const rawEndDate = readText(row, CSV_COLUMNS.endDate);
    const endDate = rawEndDate ? parseColumn(CSV_COLUMNS.endDate, rawEndDate, parseCalendarDate) : startDate;
    if (rawEndDate && endDate < startDate) {
      throw new InvalidTemporalError(CSV_COLUMNS.endDate, rawEndDate);
    }

    const rawStartTime = readText(row, CSV_COLUMNS.startTime);
    const rawEndTime = readText(row, CSV_COLUMNS.endTime);
    if (rawEndTime && !rawStartTime) {
      throw new MissingFieldError(CSV_COLUMNS.startTime);
    }

    const startTime = rawStartTime ? parseColumn(CSV_COLUMNS.startTime, rawStartTime, parseTimeOfDay) : undefined;
    let endTime = rawEndTime ? parseColumn(CSV_COLUMNS.endTime, rawEndTime, parseTimeOfDay) : undefined;
    if (startTime !== undefined && endTime === undefined) {
      endTime = addMinutesToWallClock(startTime, this.defaultDurationMinutes);
    }

    return createCanonicalEvent({
      title,
      description: readText(row, CSV_COLUMNS.description),
      location: readText(row, CSV_COLUMNS.location),
      purchased: false, // CSV has no purchased column
      start_date: startDate,
      end_date: endDate,
      start_time: startTime,
      end_time: endTime,
    });
  }
}
