/**
 * Input validation for client operations.
 * Every check here runs before a request is built, so a failure means no
 * network traffic.
 */

import { createError, type VectorScopeError } from '@vectorscope/core';
import type { IncludeField, Item, Metadata } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Collection names: 1-63 chars, alphanumeric at both ends */
const COLLECTION_NAME_PATTERN =
  /^[A-Za-z0-9](?:[A-Za-z0-9_-]{0,61}[A-Za-z0-9])?$/;

// ============================================================
// PRIMITIVES
// ============================================================

function invalid(field: string, reason: string): VectorScopeError {
  return createError('VS-V001', { field, reason });
}

/**
 * Validate that a value is present and non-empty.
 *
 * Throws for undefined, null, or empty string.
 * Zero (0) passes validation as it is a valid value.
 *
 * @example
 * ```typescript
 * assertRequired(options.tenant, 'tenant');
 * assertRequired(0, 'maxRetries'); // passes (zero is valid)
 * ```
 */
export function assertRequired<T>(
  value: T | undefined | null,
  fieldName: string
): asserts value is T {
  if (value === undefined || value === null || value === '') {
    throw invalid(fieldName, 'is required');
  }
}

/**
 * Validate a positive integer (topK, dimension, pageSize).
 */
export function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw invalid(field, `must be a positive integer, got ${value}`);
  }
}

// ============================================================
// COLLECTIONS
// ============================================================

/**
 * Validate a collection name.
 * Names are 1-63 characters of letters, digits, `_` and `-`, and start and
 * end with a letter or digit.
 */
export function validateCollectionName(name: string, field = 'name'): void {
  assertRequired(name, field);
  if (!COLLECTION_NAME_PATTERN.test(name)) {
    throw invalid(
      field,
      `invalid collection name "${name}" (1-63 characters of [A-Za-z0-9_-], starting and ending alphanumeric)`
    );
  }
}

/** Validate tenant and database names */
export function validateResourceName(name: string, field: string): void {
  assertRequired(name, field);
  if (name.trim() !== name) {
    throw invalid(field, 'must not have leading or trailing whitespace');
  }
}

/**
 * Validate metadata values are scalars.
 * Numbers must be finite; nested objects and arrays are rejected.
 */
export function validateMetadata(
  metadata: Metadata | undefined,
  field: string
): void {
  if (metadata === undefined) {
    return;
  }
  if (
    typeof metadata !== 'object' ||
    metadata === null ||
    Array.isArray(metadata)
  ) {
    throw invalid(field, 'must be a mapping of string to scalar');
  }
  for (const [key, value] of Object.entries(metadata)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'boolean'
    ) {
      continue;
    }
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw invalid(
          `${field}.${key}`,
          `must be a finite number, got ${value}`
        );
      }
      continue;
    }
    throw invalid(`${field}.${key}`, `must be a scalar, got ${typeof value}`);
  }
}

// ============================================================
// VECTORS AND ITEMS
// ============================================================

/**
 * Validate a vector's numbers and, when known, its length.
 *
 * @param expected - Collection dimension; skipped when undefined
 */
export function validateVector(
  vector: readonly number[],
  field: string,
  expected?: number | undefined
): void {
  if (!Array.isArray(vector) || vector.length === 0) {
    throw invalid(field, 'must be a non-empty array of numbers');
  }
  vector.forEach((value, index) => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw invalid(
        `${field}[${index}]`,
        `must be a finite number, got ${String(value)}`
      );
    }
  });
  if (expected !== undefined) {
    assertDimension(vector, field, expected);
  }
}

/**
 * Check a vector's length against the collection dimension.
 */
export function assertDimension(
  vector: readonly number[],
  field: string,
  expected: number
): void {
  if (vector.length !== expected) {
    throw createError('VS-V002', { field, expected, actual: vector.length });
  }
}

/** Fields an include list may name */
const INCLUDE_FIELDS: readonly string[] = [
  'embeddings',
  'metadatas',
  'documents',
];

/**
 * Validate an include list.
 */
export function validateInclude(
  include: readonly IncludeField[] | undefined
): void {
  if (include === undefined) {
    return;
  }
  include.forEach((field, index) => {
    if (!INCLUDE_FIELDS.includes(field)) {
      throw invalid(
        `include[${index}]`,
        `must be one of ${INCLUDE_FIELDS.join(', ')}, got "${String(field)}"`
      );
    }
  });
}

/**
 * Validate a list of ids: non-empty strings, no duplicates.
 */
export function validateIds(ids: readonly string[], field = 'ids'): void {
  if (!Array.isArray(ids)) {
    throw invalid(field, 'must be an array of strings');
  }
  const seen = new Set<string>();
  ids.forEach((id, index) => {
    if (typeof id !== 'string' || id === '') {
      throw invalid(`${field}[${index}]`, 'must be a non-empty string');
    }
    if (seen.has(id)) {
      throw createError('VS-V004', { field, id });
    }
    seen.add(id);
  });
}

/**
 * Validate a batch of items for add, upsert and update.
 *
 * Without a dimension, only the batch's internal consistency is checked:
 * ids, numbers, scalars, and all vectors sharing one length. With a
 * dimension every vector must match it.
 *
 * @param maxBatchSize - Largest accepted batch
 * @param dimension - Collection dimension, when known
 * @throws ValidationError on the first invalid item
 */
export function validateItems(
  items: readonly Item[],
  maxBatchSize: number,
  dimension?: number | undefined
): void {
  if (!Array.isArray(items)) {
    throw invalid('items', 'must be an array');
  }
  if (items.length > maxBatchSize) {
    throw createError('VS-V003', {
      field: 'items',
      size: items.length,
      limit: maxBatchSize,
    });
  }

  validateIds(
    items.map((item) => item.id),
    'items.id'
  );

  let expected = dimension;
  items.forEach((item, index) => {
    const field = `items[${index}]`;
    validateVector(item.vector, `${field}.vector`, expected);
    // First vector fixes the length the rest must share
    expected ??= item.vector.length;
    validateMetadata(item.metadata, `${field}.metadata`);
    if (item.document !== undefined && typeof item.document !== 'string') {
      throw invalid(`${field}.document`, 'must be a string');
    }
  });
}
