/**
 * REST surface of the vector service.
 * Request paths, request bodies, and parsers that turn response JSON into
 * typed values. Parsers reject anything that does not match the schema with
 * ApiError VS-A006.
 */

import {
  createError,
  type BatchItemStatus,
  type Page,
  type VectorScopeError,
} from '@vectorscope/core';
import { normalizeDistance } from './distance.js';
import type {
  Collection,
  Database,
  Heartbeat,
  IncludeField,
  Item,
  Metadata,
  QueryMatch,
  Scalar,
  StoredItem,
  Tenant,
} from './types.js';

// ============================================================
// PATHS
// ============================================================

const API = '/api/v2';
const DATABASE = `${API}/tenants/:tenant/databases/:database`;
const COLLECTION = `${DATABASE}/collections/:collection`;

/** Path patterns; `:collection` is a name for GET/DELETE and an id elsewhere */
export const PATHS = {
  heartbeat: `${API}/heartbeat`,
  version: `${API}/version`,
  reset: `${API}/reset`,
  preFlightChecks: `${API}/pre-flight-checks`,
  tenants: `${API}/tenants`,
  tenant: `${API}/tenants/:tenant`,
  databases: `${API}/tenants/:tenant/databases`,
  database: DATABASE,
  collections: `${DATABASE}/collections`,
  collectionsCount: `${DATABASE}/collections_count`,
  collection: COLLECTION,
  itemCount: `${COLLECTION}/count`,
  add: `${COLLECTION}/add`,
  upsert: `${COLLECTION}/upsert`,
  update: `${COLLECTION}/update`,
  get: `${COLLECTION}/get`,
  delete: `${COLLECTION}/delete`,
  query: `${COLLECTION}/query`,
} as const;

/** Distance space assumed when a collection does not name one */
const DEFAULT_SPACE = 'l2';

/** Metadata key naming a collection's distance space */
export const SPACE_METADATA_KEY = 'hnsw:space';

// ============================================================
// REQUEST BODIES
// ============================================================

/** Column-oriented item batch as the server accepts it */
export interface ItemsPayload {
  readonly ids: string[];
  readonly embeddings: (readonly number[])[];
  readonly metadatas: (Metadata | null)[];
  readonly documents: (string | null)[];
}

/** Convert items to the column layout of add, upsert and update */
export function toItemsPayload(items: readonly Item[]): ItemsPayload {
  return {
    ids: items.map((item) => item.id),
    embeddings: items.map((item) => item.vector),
    metadatas: items.map((item) => item.metadata ?? null),
    documents: items.map((item) => item.document ?? null),
  };
}

/** Include list with duplicates removed, in a stable order */
export function toInclude(include: readonly IncludeField[]): IncludeField[] {
  const order: IncludeField[] = ['embeddings', 'metadatas', 'documents'];
  return order.filter((field) => include.includes(field));
}

// ============================================================
// PARSING PRIMITIVES
// ============================================================

function invalidResponse(what: string, reason: string): VectorScopeError {
  return createError('VS-A006', { source: what, operation: what, reason });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw invalidResponse(what, 'expected an object');
  }
  return value;
}

function readString(
  obj: Record<string, unknown>,
  key: string,
  what: string
): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw invalidResponse(what, `"${key}" must be a string`);
  }
  return value;
}

function readNumber(
  obj: Record<string, unknown>,
  key: string,
  what: string
): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalidResponse(what, `"${key}" must be a number`);
  }
  return value;
}

function readArray(
  obj: Record<string, unknown>,
  key: string,
  what: string
): unknown[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    throw invalidResponse(what, `"${key}" must be an array`);
  }
  return value;
}

function readStringArray(
  obj: Record<string, unknown>,
  key: string,
  what: string
): string[] {
  return readArray(obj, key, what).map((entry) => {
    if (typeof entry !== 'string') {
      throw invalidResponse(what, `"${key}" must hold strings`);
    }
    return entry;
  });
}

/** next_cursor: absent or null on the last page */
function readCursor(obj: Record<string, unknown>, what: string): string | null {
  const value = obj['next_cursor'];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string' || value === '') {
    throw invalidResponse(what, '"next_cursor" must be a string or null');
  }
  return value;
}

function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function parseMetadata(value: unknown, what: string): Metadata {
  if (value === undefined || value === null) {
    return {};
  }
  const record = expectRecord(value, what);
  const metadata: Record<string, Scalar> = {};
  for (const [key, entry] of Object.entries(record)) {
    if (!isScalar(entry)) {
      throw invalidResponse(what, `metadata "${key}" must be a scalar`);
    }
    metadata[key] = entry;
  }
  return metadata;
}

function parseVector(value: unknown, what: string): number[] {
  if (!Array.isArray(value)) {
    throw invalidResponse(what, 'embedding must be an array');
  }
  return value.map((entry: unknown) => {
    if (typeof entry !== 'number') {
      throw invalidResponse(what, 'embedding must hold numbers');
    }
    return entry;
  });
}

/**
 * Read an optional column of per-item values.
 * Returns null when the server omitted the column.
 */
function readColumn<T>(
  obj: Record<string, unknown>,
  key: string,
  length: number,
  what: string,
  parseEntry: (entry: unknown) => T
): T[] | null {
  const value = obj[key];
  if (value === undefined || value === null) {
    return null;
  }
  if (!Array.isArray(value) || value.length !== length) {
    throw invalidResponse(what, `"${key}" must have one entry per id`);
  }
  return value.map((entry: unknown) => parseEntry(entry));
}

function parseDocument(value: unknown, what: string): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string') {
    throw invalidResponse(what, 'document must be a string');
  }
  return value;
}

// ============================================================
// SERVER
// ============================================================

export function parseHeartbeat(body: unknown): Heartbeat {
  const record = expectRecord(body, 'heartbeat');
  return { nanoseconds: readNumber(record, 'nanosecond heartbeat', 'heartbeat') };
}

export function parseVersion(body: unknown): string {
  if (typeof body !== 'string') {
    throw invalidResponse('version', 'expected a string');
  }
  return body;
}

export function parseBoolean(body: unknown, what: string): boolean {
  if (typeof body !== 'boolean') {
    throw invalidResponse(what, 'expected a boolean');
  }
  return body;
}

export function parseCount(body: unknown, what: string): number {
  if (typeof body !== 'number' || !Number.isInteger(body) || body < 0) {
    throw invalidResponse(what, 'expected a non-negative integer');
  }
  return body;
}

export function parseRecord(
  body: unknown,
  what: string
): Readonly<Record<string, unknown>> {
  return expectRecord(body, what);
}

// ============================================================
// TENANTS AND DATABASES
// ============================================================

export function parseTenant(body: unknown): Tenant {
  const record = expectRecord(body, 'tenant');
  return { name: readString(record, 'name', 'tenant') };
}

export function parseDatabase(body: unknown, what = 'database'): Database {
  const record = expectRecord(body, what);
  return {
    id: readString(record, 'id', what),
    name: readString(record, 'name', what),
    tenant: readString(record, 'tenant', what),
  };
}

export function parseDatabasePage(body: unknown): Page<Database> {
  const record = expectRecord(body, 'listDatabases');
  return {
    items: readArray(record, 'databases', 'listDatabases').map((entry) =>
      parseDatabase(entry, 'listDatabases')
    ),
    nextCursor: readCursor(record, 'listDatabases'),
  };
}

// ============================================================
// COLLECTIONS
// ============================================================

export function parseCollection(body: unknown, what = 'collection'): Collection {
  const record = expectRecord(body, what);
  const dimension = readNumber(record, 'dimension', what);
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw invalidResponse(what, '"dimension" must be a positive integer');
  }
  const metadata = parseMetadata(record['metadata'], what);
  const space = metadata[SPACE_METADATA_KEY];
  return {
    id: readString(record, 'id', what),
    name: readString(record, 'name', what),
    metadata,
    dimension,
    metric: normalizeDistance(
      typeof space === 'string' ? space : DEFAULT_SPACE
    ),
    tenant: readString(record, 'tenant', what),
    database: readString(record, 'database', what),
  };
}

export function parseCollectionPage(body: unknown): Page<Collection> {
  const record = expectRecord(body, 'listCollections');
  return {
    items: readArray(record, 'collections', 'listCollections').map((entry) =>
      parseCollection(entry, 'listCollections')
    ),
    nextCursor: readCursor(record, 'listCollections'),
  };
}

// ============================================================
// ITEMS
// ============================================================

/**
 * Parse a page of items from the get endpoint.
 * Columns the request did not include come back null.
 */
export function parseItemsPage(body: unknown, what: string): Page<StoredItem> {
  const record = expectRecord(body, what);
  const ids = readStringArray(record, 'ids', what);
  const embeddings = readColumn(record, 'embeddings', ids.length, what, (v) =>
    v === null ? null : parseVector(v, what)
  );
  const metadatas = readColumn(record, 'metadatas', ids.length, what, (v) =>
    parseMetadata(v, what)
  );
  const documents = readColumn(record, 'documents', ids.length, what, (v) =>
    parseDocument(v, what)
  );

  return {
    items: ids.map((id, index) => ({
      id,
      vector: embeddings?.[index] ?? null,
      metadata: metadatas?.[index] ?? {},
      document: documents?.[index] ?? null,
    })),
    nextCursor: readCursor(record, what),
  };
}

/**
 * Read the first row of a column-of-rows query field.
 * Query responses hold one row per query vector; the client sends one.
 */
function firstRow(
  record: Record<string, unknown>,
  key: string,
  what: string
): Record<string, unknown> {
  const value = record[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!Array.isArray(value)) {
    throw invalidResponse(what, `"${key}" must be an array of rows`);
  }
  const row: unknown = value[0];
  return { [key]: row === undefined ? [] : row };
}

/**
 * Parse a nearest-neighbor response into unsorted matches.
 */
export function parseQueryMatches(body: unknown): QueryMatch[] {
  const what = 'query';
  const record = expectRecord(body, what);
  const row: Record<string, unknown> = {
    ...firstRow(record, 'ids', what),
    ...firstRow(record, 'distances', what),
    ...firstRow(record, 'embeddings', what),
    ...firstRow(record, 'metadatas', what),
    ...firstRow(record, 'documents', what),
  };

  const ids = readStringArray({ ids: row['ids'] ?? [] }, 'ids', what);
  const distances = readColumn(row, 'distances', ids.length, what, (v) => {
    if (typeof v !== 'number' || Number.isNaN(v)) {
      throw invalidResponse(what, 'distances must be numbers');
    }
    return v;
  });
  if (distances === null) {
    throw invalidResponse(what, '"distances" is required');
  }
  const page = parseItemsPage(
    {
      ids,
      embeddings: row['embeddings'],
      metadatas: row['metadatas'],
      documents: row['documents'],
    },
    what
  );

  return page.items.map((item, index) => ({
    item,
    distance: distances[index] ?? Number.POSITIVE_INFINITY,
  }));
}

/**
 * Parse per-item outcomes of add, upsert and update.
 * Returns null when the server reports no per-item detail.
 */
export function parseBatchStatuses(
  body: unknown,
  what: string
): BatchItemStatus[] | null {
  if (body === null || body === undefined) {
    return null;
  }
  const record = expectRecord(body, what);
  if (record['results'] === undefined || record['results'] === null) {
    return null;
  }
  return readArray(record, 'results', what).map((entry) => {
    const result = expectRecord(entry, what);
    const ok = result['ok'];
    if (typeof ok !== 'boolean') {
      throw invalidResponse(what, '"ok" must be a boolean');
    }
    const error = result['error'];
    return {
      id: readString(result, 'id', what),
      ok,
      ...(typeof error === 'string' ? { error } : {}),
    };
  });
}

/** Parse the ids a delete removed */
export function parseDeleted(body: unknown): string[] {
  const record = expectRecord(body, 'deleteItems');
  return readStringArray(record, 'deleted', 'deleteItems');
}
