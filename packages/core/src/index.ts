/**
 * VectorScope Core
 * Errors, transport, pagination and observability shared by the client
 */

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  ApiError,
  AuthenticationError,
  BatchError,
  type BatchItemStatus,
  ConflictError,
  ConnectionError,
  createError,
  formatErrorMessage,
  NotFoundError,
  RateLimitError,
  TimeoutError,
  ValidationError,
  VectorScopeError,
  type VectorScopeErrorData,
} from './error-classes.js';

// ============================================================
// OBSERVABILITY
// ============================================================
export {
  type ClientCallbacks,
  type ClientEvent,
  type ClientEventInput,
  emitClientEvent,
  type EventContext,
  withEventEmission,
} from './events.js';

// ============================================================
// PAGINATION
// ============================================================
export { type Page, type PageFetcher, Paginator } from './pagination.js';

// ============================================================
// TRANSPORT
// ============================================================
export {
  buildUrl,
  calculateBackoff,
  createSemaphore,
  executeRequest,
  extractErrorDetail,
  type FailureKind,
  type HttpMethod,
  interpolatePathParams,
  type QueryValue,
  type RequestSpec,
  Semaphore,
  shouldRetry,
  type TransportConfig,
} from './transport/request.js';
