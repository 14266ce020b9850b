/**
 * VectorScope Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface VectorScopeErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

/** Outcome of one item in a batch mutation */
export interface BatchItemStatus {
  readonly id: string;
  readonly ok: boolean;
  /** Server-reported reason; absent when ok */
  readonly error?: string | undefined;
}

/**
 * Render the registry message template for an error ID.
 *
 * @throws TypeError if errorId is not found in registry
 */
export function formatErrorMessage(
  errorId: string,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

/**
 * Look up an error definition and check it belongs to one of the
 * expected categories.
 */
function assertCategory(errorId: string, expected: ErrorCategory[]): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (!expected.includes(definition.category)) {
    throw new TypeError(
      `Expected ${expected.join(' or ')} error ID, got: ${errorId}`
    );
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all client errors.
 * Provides structured data for host applications to format as needed.
 */
export class VectorScopeError extends Error {
  readonly errorId: string;
  readonly context: Record<string, unknown>;

  constructor(data: VectorScopeErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'VectorScopeError';
    this.errorId = data.errorId;
    this.context = data.context ?? {};
  }

  /** Get structured error data for custom formatting */
  toData(): VectorScopeErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: VectorScopeErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `[${this.errorId}] ${this.message}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Client-side contract violations, raised before any request is sent */
export class ValidationError extends VectorScopeError {
  /** Argument or configuration key that failed validation */
  readonly field: string | undefined;

  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, ['validation', 'config']);
    super({ errorId, message, context });
    this.name = 'ValidationError';
    const field = context?.['field'];
    this.field = typeof field === 'string' ? field : undefined;
  }
}

/** Transport unreachable, aborted, or client closed */
export class ConnectionError extends VectorScopeError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, ['transport']);
    super({ errorId, message, context });
    this.name = 'ConnectionError';
  }
}

/** Request exceeded its per-request timeout */
export class TimeoutError extends ConnectionError {
  readonly timeoutMs: number;

  constructor(method: string, path: string, timeoutMs: number) {
    const context = { method, path, timeoutMs };
    super('VS-T002', formatErrorMessage('VS-T002', context), context);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Server answered with an error status or an unusable body */
export class ApiError extends VectorScopeError {
  /** HTTP status; undefined when the body, not the status, was the problem */
  readonly status: number | undefined;

  constructor(
    errorId: string,
    message: string,
    status: number | undefined,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, ['api']);
    super({ errorId, message, context });
    this.name = 'ApiError';
    this.status = status;
  }
}

/** Referenced entity absent */
export class NotFoundError extends ApiError {
  constructor(resource: string, name: string) {
    const context = { resource, name };
    super('VS-A001', formatErrorMessage('VS-A001', context), 404, context);
    this.name = 'NotFoundError';
  }
}

/** Duplicate creation */
export class ConflictError extends ApiError {
  constructor(resource: string, name: string) {
    const context = { resource, name };
    super('VS-A002', formatErrorMessage('VS-A002', context), 409, context);
    this.name = 'ConflictError';
  }
}

/** Token rejected (401) or not permitted (403) */
export class AuthenticationError extends ApiError {
  constructor(status: number) {
    super('VS-A003', formatErrorMessage('VS-A003', { status }), status, {
      status,
    });
    this.name = 'AuthenticationError';
  }
}

/** Server kept answering 429 through every retry */
export class RateLimitError extends ApiError {
  /** Delay the server asked for on its last answer, when it sent one */
  readonly retryAfterMs: number | undefined;

  constructor(retries: number, retryAfterMs: number | undefined) {
    const context = { retries, retryAfterMs };
    super('VS-A004', formatErrorMessage('VS-A004', context), 429, context);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/** Server applied part of a batch and rejected the rest */
export class BatchError extends ApiError {
  readonly items: readonly BatchItemStatus[];

  constructor(operation: string, items: readonly BatchItemStatus[]) {
    const context = {
      operation,
      failed: items.filter((item) => !item.ok).length,
      total: items.length,
    };
    super(
      'VS-A007',
      formatErrorMessage('VS-A007', context),
      undefined,
      context
    );
    this.name = 'BatchError';
    this.items = items;
  }

  /** Items the server rejected */
  get failedItems(): BatchItemStatus[] {
    return this.items.filter((item) => !item.ok);
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up error definition from registry, renders message template with
 * context, and creates the error class matching the definition's category.
 *
 * @param errorId - Error identifier (format: VS-{category}{3-digit})
 * @param context - Key-value pairs for template placeholder replacement
 * @returns Error instance with rendered message
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('VS-V002', { field: 'items[0].vector', expected: 3, actual: 4 })
 * // ValidationError: "items[0].vector: dimension mismatch (expected 3, got 4)"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): VectorScopeError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = formatErrorMessage(errorId, context);

  switch (definition.category) {
    case 'validation':
    case 'config':
      return new ValidationError(errorId, message, context);
    case 'transport':
      return new ConnectionError(errorId, message, context);
    case 'api': {
      const status = context['status'];
      return new ApiError(
        errorId,
        message,
        typeof status === 'number' ? status : undefined,
        context
      );
    }
  }
}
