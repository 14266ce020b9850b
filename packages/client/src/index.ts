/**
 * VectorScope Client
 * Typed client for a collection-oriented vector database REST service
 */

// ============================================================
// CLIENT
// ============================================================
export { VectorServiceClient } from './client.js';

// ============================================================
// TYPES
// ============================================================
export type {
  BatchWriteResult,
  CallOptions,
  ClientOptions,
  Collection,
  CollectionRef,
  ConnectionConfig,
  CreateCollectionParams,
  Database,
  DeleteItemsResult,
  Heartbeat,
  IncludeField,
  Item,
  ItemLookupResult,
  ListItemsOptions,
  ListOptions,
  Metadata,
  MutationOptions,
  Protocol,
  QueryMatch,
  QueryParams,
  QueryResult,
  Scalar,
  StoredItem,
  Tenant,
  UpdateCollectionParams,
  WhereDocumentFilter,
  WhereFilter,
} from './types.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  baseUrlOf,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfigFile,
  readEnvConfig,
  resolveClientConfig,
} from './config.js';

// ============================================================
// UTILITIES
// ============================================================
export {
  compareMatches,
  type DistanceMetric,
  normalizeDistance,
  sortMatches,
} from './distance.js';
export {
  assertRequired,
  validateCollectionName,
  validateItems,
} from './validation.js';

// ============================================================
// ERRORS (re-exported from core)
// ============================================================
export {
  ApiError,
  AuthenticationError,
  BatchError,
  type BatchItemStatus,
  ConflictError,
  ConnectionError,
  NotFoundError,
  Paginator,
  RateLimitError,
  TimeoutError,
  ValidationError,
  VectorScopeError,
  type ClientCallbacks,
  type ClientEvent,
  type Page,
} from '@vectorscope/core';
