/**
 * Cursor pagination.
 * Lazy, restartable sequences over server listings.
 */

import { createError } from './error-classes.js';

// ============================================================
// TYPE DEFINITIONS
// ============================================================

/** One page of a listing */
export interface Page<T> {
  readonly items: readonly T[];
  /** Opaque token for the next page; null on the last page */
  readonly nextCursor: string | null;
}

/**
 * Fetch one page.
 * Receives null for the first page and the previous page's nextCursor after.
 */
export type PageFetcher<T> = (
  cursor: string | null,
  pageSize: number
) => Promise<Page<T>>;

// ============================================================
// PAGINATOR
// ============================================================

/**
 * Lazy sequence that fetches pages on demand.
 *
 * Nothing is requested until iteration starts. Each iteration starts again
 * from the first page, so a Paginator can be iterated any number of times
 * and always reflects the server at the time of iteration. Iteration stops
 * when the server returns an empty page or no next cursor.
 *
 * @example
 * ```typescript
 * for await (const collection of client.listCollections({ pageSize: 50 })) {
 *   console.log(collection.name);
 * }
 * ```
 */
export class Paginator<T> implements AsyncIterable<T> {
  private readonly fetchPage: PageFetcher<T>;
  readonly pageSize: number;

  constructor(fetchPage: PageFetcher<T>, pageSize: number) {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw createError('VS-V001', {
        field: 'pageSize',
        reason: `must be a positive integer, got ${pageSize}`,
      });
    }
    this.fetchPage = fetchPage;
    this.pageSize = pageSize;
  }

  /**
   * Iterate page by page.
   *
   * @throws ApiError when the server hands back a cursor it already returned
   */
  async *pages(): AsyncGenerator<Page<T>, void, undefined> {
    const seen = new Set<string>();
    let cursor: string | null = null;

    for (;;) {
      const page: Page<T> = await this.fetchPage(cursor, this.pageSize);
      if (page.items.length === 0) {
        return;
      }

      yield page;

      if (page.nextCursor === null) {
        return;
      }
      if (seen.has(page.nextCursor)) {
        throw createError('VS-A006', {
          source: 'pagination',
          reason: `cursor "${page.nextCursor}" repeated`,
          cursor: page.nextCursor,
        });
      }
      seen.add(page.nextCursor);
      cursor = page.nextCursor;
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for await (const page of this.pages()) {
      yield* page.items;
    }
  }

  /** Drain every page into one array */
  async toArray(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  /** Collect at most `count` items, fetching no more pages than needed */
  async first(count: number): Promise<T[]> {
    const items: T[] = [];
    if (count <= 0) {
      return items;
    }
    for await (const item of this) {
      items.push(item);
      if (items.length >= count) {
        break;
      }
    }
    return items;
  }
}
