// src/lib/pagination.ts
import { PaginationStalledError } from './errors.js';

export interface Page<T> {
  items: T[];
  nextPageToken?: string | undefined;
}

/**
 * Walk a token-paged listing one page at a time.
 * A missing next token ends the walk; a token seen before throws instead of looping.
 *
 * @param fetchPage - Called with undefined for the first page
 */
export async function* paginate<T>(fetchPage: (pageToken?: string) => Promise<Page<T>>): AsyncGenerator<T[]> {
  const seenTokens = new Set<string>();
  let pageToken: string | undefined;
  let pages = 0;

  do {
    const page = await fetchPage(pageToken);
    pages += 1;
    yield page.items;

    pageToken = page.nextPageToken || undefined;
    if (pageToken !== undefined) {
      if (seenTokens.has(pageToken)) {
        throw new PaginationStalledError(pageToken, pages);
      }
      seenTokens.add(pageToken);
    }
  } while (pageToken !== undefined);
}
