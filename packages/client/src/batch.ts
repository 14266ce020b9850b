/**
 * Batch mutation outcomes.
 * Turns the server's per-item statuses into a result or a BatchError.
 */

import { BatchError, createError, type BatchItemStatus } from '@vectorscope/core';
import type { BatchWriteResult, Item } from './types.js';

/**
 * Settle a batch mutation from the server's per-item statuses.
 *
 * Without statuses the server applied every item. With statuses, any item
 * that is not ok fails the call with BatchError carrying every status, so
 * callers can tell which items were applied.
 *
 * @param operation - Operation name for the error message (e.g. "upsertItems")
 * @param items - Items sent, in request order
 * @param statuses - Per-item statuses, or null
 * @throws BatchError when at least one item failed
 * @throws ApiError when statuses name an id that was not sent
 *
 * @example
 * ```typescript
 * const result = settleBatch('upsertItems', items, [
 *   { id: 'a', ok: true },
 *   { id: 'b', ok: false, error: 'dimension mismatch' },
 * ]);
 * // throws BatchError: "upsertItems: 1 of 2 items failed"
 * ```
 */
export function settleBatch(
  operation: string,
  items: readonly Item[],
  statuses: readonly BatchItemStatus[] | null
): BatchWriteResult {
  if (statuses === null) {
    return { succeeded: items.length };
  }

  const sent = new Set(items.map((item) => item.id));
  for (const status of statuses) {
    if (!sent.has(status.id)) {
      throw createError('VS-A006', {
        source: operation,
        operation,
        reason: `status for unknown id "${status.id}"`,
        id: status.id,
      });
    }
  }

  const failed = statuses.filter((status) => !status.ok);
  if (failed.length > 0) {
    throw new BatchError(operation, statuses);
  }
  return { succeeded: items.length };
}
