/**
 * Type definitions for the vector service client.
 */

import type { ClientCallbacks } from '@vectorscope/core';

// ============================================================
// DATA MODEL
// ============================================================

/** Metadata value: string, finite number, boolean, or null */
export type Scalar = string | number | boolean | null;

/** Metadata mapping of string to scalar */
export type Metadata = Readonly<Record<string, Scalar>>;

/** Server-side collection handle */
export interface Collection {
  /** Server-assigned identity used in item paths */
  readonly id: string;
  /** Unique within a database */
  readonly name: string;
  readonly metadata: Metadata;
  /** Fixed vector length for every item */
  readonly dimension: number;
  /** Distance metric from the `hnsw:space` metadata key (default euclidean) */
  readonly metric: string;
  readonly tenant: string;
  readonly database: string;
}

/** A collection handle, or a collection name resolved per call */
export type CollectionRef = Collection | string;

/** Vector plus optional metadata and document, addressed by id */
export interface Item {
  readonly id: string;
  readonly vector: readonly number[];
  readonly metadata?: Metadata | undefined;
  readonly document?: string | undefined;
}

/** Item as returned by the server; vector absent when not requested */
export interface StoredItem {
  readonly id: string;
  readonly vector: readonly number[] | null;
  readonly metadata: Metadata;
  readonly document: string | null;
}

/** One nearest-neighbor match */
export interface QueryMatch {
  readonly item: StoredItem;
  readonly distance: number;
}

/** Matches ordered by ascending distance, ties by ascending id */
export type QueryResult = readonly QueryMatch[];

/** Tenant on the server */
export interface Tenant {
  readonly name: string;
}

/** Database within a tenant */
export interface Database {
  readonly id: string;
  readonly name: string;
  readonly tenant: string;
}

/** Server liveness token */
export interface Heartbeat {
  /**
   * Server clock in nanoseconds since epoch.
   * Current clock values exceed Number.MAX_SAFE_INTEGER, so the value is
   * rounded to the nearest double (within 256ns); use it for liveness and
   * coarse timing, not as an exact timestamp.
   */
  readonly nanoseconds: number;
}

// ============================================================
// OPERATION PARAMETERS AND RESULTS
// ============================================================

/** Metadata filter passed through to the server */
export type WhereFilter = Readonly<Record<string, unknown>>;

/** Document-content filter passed through to the server */
export type WhereDocumentFilter = Readonly<Record<string, unknown>>;

/** Fields the server may include in item responses */
export type IncludeField = 'embeddings' | 'metadatas' | 'documents';

/** Per-call options shared by every operation */
export interface CallOptions {
  /** Cancel the in-flight request */
  readonly signal?: AbortSignal | undefined;
}

/** Options for mutating calls that may be retried */
export interface MutationOptions extends CallOptions {
  /**
   * Key identifying this mutation across retries.
   * With a key, resets and timeouts are retried; without, they surface.
   */
  readonly idempotencyKey?: string | undefined;
}

export interface CreateCollectionParams {
  readonly name: string;
  readonly dimension: number;
  readonly metadata?: Metadata | undefined;
}

export interface UpdateCollectionParams {
  readonly newName?: string | undefined;
  readonly metadata?: Metadata | undefined;
}

export interface ListOptions {
  /** Items per request (default: config.pageSize) */
  readonly pageSize?: number | undefined;
}

export interface ListItemsOptions extends ListOptions {
  readonly where?: WhereFilter | undefined;
  readonly whereDocument?: WhereDocumentFilter | undefined;
  /** Default: all three fields */
  readonly include?: readonly IncludeField[] | undefined;
}

export interface QueryParams {
  readonly vector: readonly number[];
  /** Number of nearest neighbors; positive integer */
  readonly topK: number;
  readonly where?: WhereFilter | undefined;
  readonly whereDocument?: WhereDocumentFilter | undefined;
  /** Default: metadatas and documents */
  readonly include?: readonly IncludeField[] | undefined;
}

/** Result of getItems */
export interface ItemLookupResult {
  /** Found items in request order */
  readonly items: readonly StoredItem[];
  /** Requested ids the server does not hold, in request order */
  readonly missing: readonly string[];
}

/** Result of deleteItems */
export interface DeleteItemsResult {
  readonly deleted: readonly string[];
  readonly missing: readonly string[];
}

/** Result of a fully applied batch mutation */
export interface BatchWriteResult {
  readonly succeeded: number;
}

// ============================================================
// CONFIGURATION
// ============================================================

/** Connection protocol */
export type Protocol = 'http' | 'https';

/**
 * Client configuration as supplied by callers.
 * Every field is optional; missing values come from the config file,
 * VECTORSCOPE_* environment variables, then defaults.
 */
export interface ClientOptions {
  readonly host?: string | undefined;
  readonly port?: number | undefined;
  readonly protocol?: Protocol | undefined;
  /** Bearer token for the Authorization header */
  readonly apiKey?: string | undefined;
  readonly tenant?: string | undefined;
  readonly database?: string | undefined;
  /** Per-request timeout in milliseconds */
  readonly timeout?: number | undefined;
  /** Retries after the first attempt */
  readonly maxRetries?: number | undefined;
  /** Base backoff delay in milliseconds */
  readonly retryDelay?: number | undefined;
  /** Cap on in-flight requests; 0 means unlimited */
  readonly maxConcurrent?: number | undefined;
  /** Largest batch accepted by add/upsert/update */
  readonly maxBatchSize?: number | undefined;
  /** Default page size for listings */
  readonly pageSize?: number | undefined;
  /** Extra headers sent with every request */
  readonly headers?: Readonly<Record<string, string>> | undefined;
  /** YAML configuration file; read when given */
  readonly configFile?: string | undefined;
  /** Directory searched for vectorscope.yaml (default: process.cwd()) */
  readonly cwd?: string | undefined;
  /** Environment to read VECTORSCOPE_* from (default: process.env) */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  /** fetch implementation (default: global fetch) */
  readonly fetch?: typeof fetch | undefined;
  readonly callbacks?: ClientCallbacks | undefined;
}

/** Resolved, immutable connection configuration */
export interface ConnectionConfig {
  readonly host: string;
  readonly port: number;
  readonly protocol: Protocol;
  readonly apiKey: string | undefined;
  readonly tenant: string;
  readonly database: string;
  readonly timeout: number;
  readonly maxRetries: number;
  readonly retryDelay: number;
  readonly maxConcurrent: number;
  readonly maxBatchSize: number;
  readonly pageSize: number;
  readonly headers: Readonly<Record<string, string>>;
}
