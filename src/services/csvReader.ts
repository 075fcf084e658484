// src/services/csvReader.ts
import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { Logger } from 'pino';
import { mapRows } from '../parsers/recordMapper.js';
import type { MapRowsResult, RecordMapper } from '../parsers/recordMapper.js';
import { sourceRowFromRecord } from '../parsers/sourceRow.js';
import type { SourceRow } from '../types/row.js';

const CsvRecordsSchema = z.array(z.record(z.string(), z.string()));

/**
 * Parse CSV text with a header row. Blank lines are skipped; a UTF-8 BOM is ignored.
 */
export function parseCsvRows(content: string): SourceRow[] {
  const records = CsvRecordsSchema.parse(
    parse(content, {
      columns: (header: string[]) => header.map((name) => name.trim()),
      skip_empty_lines: true,
      bom: true,
    })
  );

  return records.map((record) => sourceRowFromRecord(record));
}

/**
 * @throws Error naming the file when it cannot be read or is not valid CSV
 */
export async function readCsvRows(path: string): Promise<SourceRow[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new Error(`Failed to open CSV file: ${path}`, { cause: error });
  }

  try {
    return parseCsvRows(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse CSV file ${path}: ${detail}`, { cause: error });
  }
}

/**
 * Read a CSV file and map its rows to events
 */
export async function readCsvEvents(path: string, mapper: RecordMapper, log: Logger): Promise<MapRowsResult> {
  const rows = await readCsvRows(path);
  const result = mapRows(rows, mapper, log);
  log.info({ path, rows: rows.length, skipped: result.failures.length }, `Loaded ${result.events.length} events from CSV`);
  return result;
}
