// src/parsers/recordMapper.ts
import type { Logger } from 'pino';
import { RowMappingError } from '../lib/errors.js';
import type { CanonicalEvent } from '../types/event.js';
import type { SourceRow } from '../types/row.js';

/**
 * Length given to events whose source only provides a start time
 */
export const DEFAULT_EVENT_DURATION_MINUTES = 150; // 2.5 hours

/**
 * Converts one row of a specific source into a CanonicalEvent
 */
export interface RecordMapper {
  readonly source: string;
  /**
   * @throws MissingFieldError | InvalidTemporalError
   */
  map(row: SourceRow): CanonicalEvent;
}

export interface RowFailure {
  row: number; // 1-based, data rows only
  error: RowMappingError;
}

export interface MapRowsResult {
  events: CanonicalEvent[];
  failures: RowFailure[];
}

/**
 * Map every row, skipping (and logging) rows that fail with a row-scoped error.
 * Any other error propagates.
 *
 * @param rowOffset - Rows already mapped in earlier pages, for row numbering
 */
export function mapRows(
  rows: Iterable<SourceRow>,
  mapper: RecordMapper,
  log: Logger,
  rowOffset = 0
): MapRowsResult {
  const events: CanonicalEvent[] = [];
  const failures: RowFailure[] = [];
  let row = rowOffset;

  for (const sourceRow of rows) {
    row += 1;
    try {
      events.push(mapper.map(sourceRow));
    } catch (error) {
      if (!(error instanceof RowMappingError)) {
        throw error;
      }
      failures.push({ row, error });
      log.warn({ source: mapper.source, row, kind: error.kind }, `Skipping row due to parse error: ${error.message}`);
    }
  }

  return { events, failures };
}
