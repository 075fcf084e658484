// src/services/codaClient.ts
import { z } from 'zod';
import type { Logger } from 'pino';
import { CodaApiError } from '../lib/errors.js';
import { paginate } from '../lib/pagination.js';
import type { Page } from '../lib/pagination.js';
import { mapRows } from '../parsers/recordMapper.js';
import type { MapRowsResult, RecordMapper, RowFailure } from '../parsers/recordMapper.js';
import { sourceRowFromRecord } from '../parsers/sourceRow.js';
import type { CanonicalEvent } from '../types/event.js';
import type { SourceRow } from '../types/row.js';

export const CODA_API_BASE = 'https://coda.io/apis/v1';
const DEFAULT_TIMEOUT_MS = 30_000;

const CodaRowsResponseSchema = z.object({
  items: z.array(z.object({ values: z.record(z.string(), z.unknown()) })),
  nextPageToken: z.string().nullish(),
});

const CodaTableSchema = z.object({
  id: z.string(),
  name: z.string(),
  tableType: z.string(),
});

const CodaTablesResponseSchema = z.object({
  items: z.array(CodaTableSchema),
  nextPageToken: z.string().nullish(),
});

export type CodaTable = z.infer<typeof CodaTableSchema>;

export interface CodaClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Read-only client for the Coda REST API (tables and rows of a doc)
 */
export class CodaClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly apiToken: string,
    options: CodaClientOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? CODA_API_BASE).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Tables and views in a doc, across all pages
   */
  async listTables(docId: string): Promise<CodaTable[]> {
    const tables: CodaTable[] = [];
    const base = `${this.baseUrl}/docs/${encodeURIComponent(docId)}/tables`;

    for await (const items of paginate((pageToken) => this.getPage(base, {}, pageToken, CodaTablesResponseSchema))) {
      tables.push(...items);
    }

    return tables;
  }

  /**
   * Yield the rows of a table one page at a time, keyed by column name
   */
  async *fetchRowPages(docId: string, tableId: string): AsyncGenerator<SourceRow[]> {
    const base = `${this.baseUrl}/docs/${encodeURIComponent(docId)}/tables/${encodeURIComponent(tableId)}/rows`;
    const query = { useColumnNames: 'true' };

    for await (const items of paginate((pageToken) => this.getPage(base, query, pageToken, CodaRowsResponseSchema))) {
      yield items.map((item) => sourceRowFromRecord(item.values));
    }
  }

  /**
   * Fetch every row of a table and map it to events.
   * Rows the mapper rejects are logged and reported in `failures`.
   */
  async fetchEvents(docId: string, tableId: string, mapper: RecordMapper, log: Logger): Promise<MapRowsResult> {
    const events: CanonicalEvent[] = [];
    const failures: RowFailure[] = [];
    let rowsSeen = 0;

    for await (const rows of this.fetchRowPages(docId, tableId)) {
      const result = mapRows(rows, mapper, log, rowsSeen);
      events.push(...result.events);
      failures.push(...result.failures);
      rowsSeen += rows.length;
    }

    log.info({ docId, tableId, rows: rowsSeen, skipped: failures.length }, `Fetched ${events.length} events from Coda`);
    return { events, failures };
  }

  private async getPage<T>(
    base: string,
    query: Record<string, string>,
    pageToken: string | undefined,
    schema: z.ZodType<{ items: T[]; nextPageToken?: string | null | undefined }, z.ZodTypeDef, unknown>
  ): Promise<Page<T>> {
    const params = new URLSearchParams(query);
    if (pageToken) {
      params.set('pageToken', pageToken);
    }
    const search = params.toString();
    const body = await this.getJson(search ? `${base}?${search}` : base);

    const parsed = schema.parse(body);
    return { items: parsed.items, nextPageToken: parsed.nextPageToken ?? undefined };
  }

  private async getJson(url: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          Authorization: `Bearer ${this.apiToken}`,
          Accept: 'application/json',
        },
      });

      if (!response.ok) {
        throw new CodaApiError(response.status, await response.text());
      }
      const json: unknown = await response.json();
      return json;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
