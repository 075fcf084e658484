// src/types/row.ts

/**
 * Scalar cell value coming out of a tabular source.
 * Coda returns numbers and booleans for typed columns; CSV only strings.
 */
export type RowValue = string | number | boolean | null;

/**
 * Read-only access to one source row by column name
 */
export interface SourceRow {
  get(name: string): RowValue | undefined;
}
