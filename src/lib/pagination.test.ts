// src/lib/pagination.test.ts
import { describe, it, expect, vi } from 'vitest';
import { paginate } from './pagination.js';
import type { Page } from './pagination.js';
import { PaginationStalledError } from './errors.js';

async function collect<T>(pages: AsyncGenerator<T[]>): Promise<T[][]> {
  const collected: T[][] = [];
  for await (const items of pages) {
    collected.push(items);
  }
  return collected;
}

describe('paginate', () => {
  it('should yield each page until the token runs out', async () => {
    const fetchPage = vi
      .fn<(pageToken?: string) => Promise<Page<number>>>()
      .mockResolvedValueOnce({ items: [1, 2], nextPageToken: 'a' })
      .mockResolvedValueOnce({ items: [3], nextPageToken: 'b' })
      .mockResolvedValueOnce({ items: [] });

    await expect(collect(paginate(fetchPage))).resolves.toEqual([[1, 2], [3], []]);
    expect(fetchPage.mock.calls).toEqual([[undefined], ['a'], ['b']]);
  });

  it('should treat an empty token as the last page', async () => {
    const fetchPage = vi.fn<(pageToken?: string) => Promise<Page<string>>>().mockResolvedValue({
      items: ['only'],
      nextPageToken: '',
    });

    await expect(collect(paginate(fetchPage))).resolves.toEqual([['only']]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('should throw when a token comes back twice', async () => {
    const fetchPage = vi.fn<(pageToken?: string) => Promise<Page<number>>>().mockResolvedValue({
      items: [1],
      nextPageToken: 'same',
    });

    const error = await collect(paginate(fetchPage)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PaginationStalledError);
    expect(error).toMatchObject({ pageToken: 'same', pagesFetched: 2 });
  });
});
