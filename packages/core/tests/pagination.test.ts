/**
 * Tests for cursor pagination
 */

import { describe, it, expect, vi } from 'vitest';
import { Paginator, type Page } from '../src/pagination.js';
import { ApiError, ValidationError } from '../src/error-classes.js';

// ============================================================
// FAKE LISTING
// ============================================================

/** Serve ids 0..total-1; the cursor is the next offset */
function listing(total: number) {
  const ids = Array.from({ length: total }, (_, i) => `id-${i}`);
  return vi.fn(
    async (cursor: string | null, pageSize: number): Promise<Page<string>> => {
      const start = cursor === null ? 0 : Number(cursor);
      const items = ids.slice(start, start + pageSize);
      const next = start + pageSize;
      return { items, nextCursor: next < total ? String(next) : null };
    }
  );
}

describe('Paginator', () => {
  it('fetches nothing until iterated', () => {
    const fetchPage = listing(5);
    new Paginator(fetchPage, 2);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it.each([
    [10, 3, 4],
    [9, 3, 3],
    [1, 5, 1],
    [7, 1, 7],
  ])('yields ceil(%i / %i) = %i pages', async (total, pageSize, expected) => {
    const paginator = new Paginator(listing(total), pageSize);

    const pages: Page<string>[] = [];
    for await (const page of paginator.pages()) {
      pages.push(page);
    }
    const items = pages.flatMap((page) => [...page.items]);

    expect(pages).toHaveLength(expected);
    expect(items).toHaveLength(total);
    expect(new Set(items).size).toBe(total);
  });

  it('yields no pages for an empty listing', async () => {
    const fetchPage = listing(0);
    const paginator = new Paginator(fetchPage, 4);
    expect(await paginator.toArray()).toEqual([]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('stops at an empty page even when a cursor is returned', async () => {
    const fetchPage = vi
      .fn<(cursor: string | null) => Promise<Page<number>>>()
      .mockResolvedValueOnce({ items: [1, 2], nextCursor: 'c1' })
      .mockResolvedValueOnce({ items: [], nextCursor: 'c2' });

    const paginator = new Paginator(fetchPage, 2);
    expect(await paginator.toArray()).toEqual([1, 2]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('passes the previous cursor and the page size', async () => {
    const fetchPage = listing(5);
    await new Paginator(fetchPage, 2).toArray();
    expect(fetchPage.mock.calls).toEqual([
      [null, 2],
      ['2', 2],
      ['4', 2],
    ]);
  });

  it('restarts from the first page on every iteration', async () => {
    const fetchPage = listing(4);
    const paginator = new Paginator(fetchPage, 3);

    const first = await paginator.toArray();
    const second = await paginator.toArray();

    expect(second).toEqual(first);
    expect(fetchPage).toHaveBeenCalledTimes(4);
    expect(fetchPage.mock.calls[2]).toEqual([null, 3]);
  });

  it('first(n) fetches only the pages it needs', async () => {
    const fetchPage = listing(10);
    const paginator = new Paginator(fetchPage, 3);

    expect(await paginator.first(4)).toEqual(['id-0', 'id-1', 'id-2', 'id-3']);
    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(await paginator.first(0)).toEqual([]);
  });

  it('throws ApiError when the server repeats a cursor', async () => {
    const fetchPage = vi.fn(
      async (): Promise<Page<number>> => ({ items: [1], nextCursor: 'same' })
    );
    const paginator = new Paginator(fetchPage, 1);

    await expect(paginator.toArray()).rejects.toThrow(ApiError);
    await expect(paginator.toArray()).rejects.toThrow(
      'pagination: invalid response — cursor "same" repeated'
    );
  });

  it.each([0, -1, 1.5, Number.NaN])(
    'rejects page size %s with ValidationError',
    (pageSize) => {
      expect(() => new Paginator(listing(1), pageSize)).toThrow(
        ValidationError
      );
    }
  );
});
