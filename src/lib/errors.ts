// src/lib/errors.ts

/**
 * Base class for failures scoped to a single source row.
 * Batch mapping catches these, reports the row and moves on.
 */
export abstract class RowMappingError extends Error {
  abstract readonly kind: 'UnparseableTemporal' | 'MissingField' | 'InvalidTemporal';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * No known date/time format matched the input
 */
export class UnparseableTemporalError extends RowMappingError {
  readonly kind = 'UnparseableTemporal' as const;

  constructor(readonly raw: string) {
    super(`Could not parse date/time: '${raw}'`);
  }
}

/**
 * A required column was absent or blank
 */
export class MissingFieldError extends RowMappingError {
  readonly kind = 'MissingField' as const;

  constructor(readonly field: string) {
    super(`Missing or empty value for '${field}'`);
  }
}

/**
 * A column was present but its temporal value was unusable
 */
export class InvalidTemporalError extends RowMappingError {
  readonly kind = 'InvalidTemporal' as const;

  constructor(
    readonly field: string,
    readonly value: string,
    cause?: unknown
  ) {
    super(`Invalid ${field}: '${value}'`, cause === undefined ? undefined : { cause });
  }
}

/**
 * A CanonicalEvent was built with inconsistent fields (mapper bug, not bad input)
 */
export class EventInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventInvariantError';
  }
}

/**
 * A paged listing handed back a page token it had already returned
 */
export class PaginationStalledError extends Error {
  constructor(readonly pageToken: string, readonly pagesFetched: number) {
    super(`Pagination stalled: token '${pageToken}' repeated after ${pagesFetched} page(s)`);
    this.name = 'PaginationStalledError';
  }
}

export class CodaApiError extends Error {
  constructor(readonly status: number, readonly body: string) {
    super(`Coda API error (${status}): ${body}`);
    this.name = 'CodaApiError';
  }
}

/**
 * A Calendar API call failed; `target` is the event title or id, or the calendar id for a listing
 */
export class CalendarOperationError extends Error {
  constructor(
    readonly action: 'create' | 'delete' | 'list',
    readonly target: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const subject = action === 'list' ? `events in ${target}` : `event: ${target}`;
    super(`Failed to ${action} ${subject} (${detail})`, { cause });
    this.name = 'CalendarOperationError';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}
