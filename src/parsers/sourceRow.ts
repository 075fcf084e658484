// src/parsers/sourceRow.ts
import { MissingFieldError } from '../lib/errors.js';
import type { RowValue, SourceRow } from '../types/row.js';

function toRowValue(value: unknown): RowValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  // Structured Coda cells (people, lookups) keep their JSON text
  return JSON.stringify(value);
}

/**
 * Wrap a decoded record (CSV object or Coda `values` map) as a SourceRow
 */
export function sourceRowFromRecord(record: Readonly<Record<string, unknown>>): SourceRow {
  const values = new Map<string, RowValue>();
  for (const [name, raw] of Object.entries(record)) {
    const value = toRowValue(raw);
    if (value !== undefined) {
      values.set(name, value);
    }
  }

  return {
    get: (name) => values.get(name),
  };
}

/**
 * Read a column as trimmed text; null, missing and blank values are all absent
 */
export function readText(row: SourceRow, name: string): string | undefined {
  const value = row.get(name);
  if (value === undefined || value === null) {
    return undefined;
  }
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

/**
 * @throws MissingFieldError when the column is absent or blank
 */
export function requireText(row: SourceRow, name: string): string {
  const text = readText(row, name);
  if (text === undefined) {
    throw new MissingFieldError(name);
  }
  return text;
}

/**
 * Read a yes/no style column. `yes` and `true` (any case) are true, everything else false.
 */
export function readFlag(row: SourceRow, name: string): boolean {
  const text = readText(row, name)?.toLowerCase();
  return text === 'yes' || text === 'true';
}

/**
 * Join the present columns with newlines; undefined when none are present
 */
export function joinTextFields(row: SourceRow, names: readonly string[]): string | undefined {
  const parts = names.map((name) => readText(row, name)).filter((part): part is string => part !== undefined);
  return parts.length > 0 ? parts.join('\n') : undefined;
}
