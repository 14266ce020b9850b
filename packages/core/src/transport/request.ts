/**
 * HTTP Request Module
 * Handles URL building, retry logic, response parsing, and error handling
 */

import {
  createError,
  RateLimitError,
  TimeoutError,
  VectorScopeError,
} from '../error-classes.js';
import { emitClientEvent, type ClientCallbacks } from '../events.js';

// ============================================================
// TYPE DEFINITIONS
// ============================================================

/** HTTP methods used by the REST surface */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Query parameter value; undefined values are omitted */
export type QueryValue = string | number | boolean | null | undefined;

/** Transport configuration shared by every request of one client */
export interface TransportConfig {
  readonly baseUrl: string;
  readonly headers?: Record<string, string> | undefined;
  /** Per-request timeout in milliseconds */
  readonly timeout: number;
  /** Retries after the first attempt */
  readonly retryLimit: number;
  /** Base backoff delay in milliseconds, doubled per attempt */
  readonly retryDelay: number;
  /** fetch implementation; defaults to the global fetch */
  readonly fetch?: typeof fetch | undefined;
  readonly callbacks?: ClientCallbacks | undefined;
}

/** One logical request, possibly sent several times */
export interface RequestSpec {
  readonly method: HttpMethod;
  /** Path pattern with :param placeholders, relative to baseUrl */
  readonly path: string;
  readonly pathParams?: Record<string, string> | undefined;
  readonly query?: Record<string, QueryValue> | undefined;
  readonly body?: unknown;
  /**
   * Whether repeating the request cannot duplicate a side effect.
   * Non-idempotent requests are only retried when they provably never
   * reached the server.
   */
  readonly idempotent: boolean;
  /** Sent as Idempotency-Key; makes a mutating request safe to repeat */
  readonly idempotencyKey?: string | undefined;
  /** Caller cancellation */
  readonly signal?: AbortSignal | undefined;
}

/** Fetch request options (compatible with fetch API) */
export interface FetchOptions {
  readonly method: string;
  readonly headers: Record<string, string>;
  body?: string | undefined;
  signal?: AbortSignal | undefined;
}

/** Why an attempt failed, as far as retrying is concerned */
export type FailureKind =
  | { readonly kind: 'refused'; readonly message: string }
  | { readonly kind: 'reset'; readonly message: string }
  | { readonly kind: 'timeout' }
  | {
      readonly kind: 'status';
      readonly status: number;
      readonly retryAfterMs: number | null;
    };

// ============================================================
// CONCURRENCY SEMAPHORE
// ============================================================

/**
 * Simple semaphore for limiting concurrent requests.
 * Queues requests when limit is reached.
 */
export class Semaphore {
  private permits: number;
  private readonly queue: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  /**
   * Wait for a permit.
   * Resolves false, holding no permit, when the signal aborts first.
   */
  acquire(signal?: AbortSignal | undefined): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      const onAbort = (): void => {
        const index = this.queue.indexOf(grant);
        if (index !== -1) {
          this.queue.splice(index, 1);
        }
        resolve(false);
      };
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      };
      this.queue.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }
}

/**
 * Create semaphore for concurrency control.
 *
 * @param maxConcurrent - Maximum concurrent requests
 * @returns Semaphore instance or undefined if no limit
 */
export function createSemaphore(
  maxConcurrent: number | undefined
): Semaphore | undefined {
  if (maxConcurrent && maxConcurrent > 0) {
    return new Semaphore(maxConcurrent);
  }
  return undefined;
}

// ============================================================
// URL BUILDING
// ============================================================

/**
 * Interpolate path parameters in URL pattern.
 * Replaces `:param` placeholders with encoded values from pathParams.
 *
 * @example
 * interpolatePathParams('/collections/:id/query', { id: 'c-1' })
 * // Returns: '/collections/c-1/query'
 */
export function interpolatePathParams(
  pattern: string,
  pathParams: Record<string, string>
): string {
  return pattern.replace(
    /:([a-zA-Z_][a-zA-Z0-9_]*)/g,
    (_match, paramName: string) => {
      const value = pathParams[paramName];
      if (value === undefined) {
        throw new TypeError(`Missing path parameter: ${paramName}`);
      }
      return encodeURIComponent(value);
    }
  );
}

/**
 * Build full URL from base, path pattern, and arguments.
 * Any path prefix on baseUrl is preserved.
 *
 * @example
 * buildUrl('http://localhost:8000/', '/api/v2/collections', {}, { limit: 10 })
 * // Returns: 'http://localhost:8000/api/v2/collections?limit=10'
 */
export function buildUrl(
  baseUrl: string,
  pathPattern: string,
  pathParams: Record<string, string>,
  query: Record<string, QueryValue>
): string {
  const path = interpolatePathParams(pathPattern, pathParams);
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== null) {
      params.append(key, String(value));
    }
  }
  const queryString = params.toString();
  const base = baseUrl.replace(/\/+$/, '');
  return `${base}${path}${queryString ? `?${queryString}` : ''}`;
}

// ============================================================
// RETRY LOGIC
// ============================================================

/** Connection error codes that mean the request never left the client */
const NOT_DELIVERED_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Classify a fetch rejection.
 * Node's fetch rejects with TypeError("fetch failed") and puts the socket
 * error, carrying its errno code, in `cause`.
 */
function classifyNetworkError(error: unknown): FailureKind {
  const message = error instanceof Error ? error.message : String(error);
  const cause: unknown = error instanceof Error ? error.cause : undefined;
  const code =
    typeof cause === 'object' && cause !== null && 'code' in cause
      ? cause.code
      : undefined;

  if (typeof code === 'string' && NOT_DELIVERED_CODES.has(code)) {
    return { kind: 'refused', message: `${message} (${code})` };
  }
  return {
    kind: 'reset',
    message: typeof code === 'string' ? `${message} (${code})` : message,
  };
}

/**
 * Decide whether a failed attempt may be sent again.
 *
 * Refused connections and 429/503 answers never reached request handling,
 * so they are retried for every request. Resets, timeouts and 502/504 leave
 * the outcome unknown and are only retried for idempotent requests.
 */
export function shouldRetry(failure: FailureKind, idempotent: boolean): boolean {
  switch (failure.kind) {
    case 'refused':
      return true;
    case 'reset':
    case 'timeout':
      return idempotent;
    case 'status':
      if (failure.status === 429 || failure.status === 503) {
        return true;
      }
      return idempotent && (failure.status === 502 || failure.status === 504);
  }
}

/**
 * Extract Retry-After header value.
 * Supports both delay-seconds and HTTP-date formats.
 *
 * @returns Retry delay in milliseconds, or null if not present
 */
function getRetryAfterMs(response: Response): number | null {
  const retryAfter = response.headers.get('Retry-After');
  if (!retryAfter) return null;

  const seconds = parseInt(retryAfter, 10);
  if (!isNaN(seconds)) {
    return seconds * 1000;
  }

  const date = new Date(retryAfter);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return null;
}

/**
 * Calculate exponential backoff delay.
 *
 * @param baseDelay - Base delay in milliseconds
 * @param attempt - Attempt number (0-indexed)
 */
export function calculateBackoff(baseDelay: number, attempt: number): number {
  return baseDelay * Math.pow(2, attempt);
}

/** Wait for ms, ending early when the signal aborts */
function sleep(ms: number, signal?: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================
// RESPONSE PARSING
// ============================================================

/**
 * Parse response body as JSON. Empty bodies parse to null.
 * Throws ApiError on invalid JSON.
 */
async function parseJsonResponse(
  response: Response,
  method: string,
  path: string
): Promise<unknown> {
  const text = await response.text();
  if (text.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    throw createError('VS-A006', {
      source: `${method} ${path}`,
      method,
      path,
      status: response.status,
      reason: 'body is not JSON',
    });
  }
}

/**
 * Pull a human-readable message out of an error body.
 * Servers answer with {"error": ..., "message": ...} or {"detail": ...}.
 */
export function extractErrorDetail(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null) {
      for (const key of ['message', 'detail', 'error']) {
        const value: unknown = Reflect.get(parsed, key);
        if (typeof value === 'string' && value !== '') {
          return value;
        }
      }
    }
  } catch {
    // Not JSON: the raw text is the detail
  }
  return body;
}

// ============================================================
// REQUEST EXECUTION
// ============================================================

/**
 * Build fetch options for one attempt.
 */
export function buildFetchOptions(
  config: TransportConfig,
  spec: RequestSpec
): FetchOptions {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...(config.headers ?? {}),
  };
  if (spec.idempotencyKey !== undefined) {
    headers['Idempotency-Key'] = spec.idempotencyKey;
  }

  const options: FetchOptions = { method: spec.method, headers };
  if (spec.body !== undefined) {
    options.body = JSON.stringify(spec.body);
    headers['Content-Type'] = 'application/json';
  }
  return options;
}

/**
 * Execute HTTP request with retry logic.
 * Handles timeouts, cancellation, network errors, and retries.
 *
 * @param config - Transport configuration
 * @param spec - Request description
 * @param semaphore - Concurrency semaphore (optional)
 * @returns Parsed JSON body (null for empty bodies)
 * @throws ConnectionError on network failure, abort, or exhausted retries
 * @throws TimeoutError when the last attempt timed out
 * @throws ApiError for error statuses (status carried on the error)
 * @throws RateLimitError when 429 persists through every retry
 */
export async function executeRequest(
  config: TransportConfig,
  spec: RequestSpec,
  semaphore?: Semaphore | undefined
): Promise<unknown> {
  const fetchImpl = config.fetch ?? globalThis.fetch;
  const url = buildUrl(
    config.baseUrl,
    spec.path,
    spec.pathParams ?? {},
    spec.query ?? {}
  );
  const path = interpolatePathParams(spec.path, spec.pathParams ?? {});
  const method = spec.method;
  const idempotent = spec.idempotent || spec.idempotencyKey !== undefined;
  const options = buildFetchOptions(config, spec);

  const aborted = (): VectorScopeError =>
    createError('VS-T003', { method, path });

  let attempt = 0;

  for (;;) {
    if (spec.signal?.aborted) {
      throw aborted();
    }

    let failure: FailureKind;

    // A queued request leaves the queue when its signal aborts
    if (semaphore && !(await semaphore.acquire(spec.signal))) {
      throw aborted();
    }

    const startTime = Date.now();

    try {
      if (spec.signal?.aborted) {
        throw aborted();
      }

      // Timeout and caller cancellation share one controller
      const controller = new AbortController();
      const abort: { by: 'timeout' | 'caller' | null } = { by: null };
      const timeoutId = setTimeout(() => {
        abort.by = 'timeout';
        controller.abort();
      }, config.timeout);
      const onCallerAbort = (): void => {
        abort.by = 'caller';
        controller.abort();
      };
      spec.signal?.addEventListener('abort', onCallerAbort);

      try {
        const init: RequestInit = {
          method: options.method,
          headers: options.headers,
          signal: controller.signal,
        };
        if (options.body !== undefined) {
          init.body = options.body;
        }
        const response = await fetchImpl(url, init);

        emitClientEvent(config, {
          event: 'vectorscope:request',
          subsystem: 'transport',
          method,
          path,
          status: response.status,
          attempt,
          duration: Date.now() - startTime,
        });

        if (response.ok) {
          return await parseJsonResponse(response, method, path);
        }

        const status = response.status;
        const retryAfterMs = status === 429 ? getRetryAfterMs(response) : null;
        failure = { kind: 'status', status, retryAfterMs };

        if (!shouldRetry(failure, idempotent) || attempt >= config.retryLimit) {
          if (status === 429 && attempt > 0) {
            throw new RateLimitError(attempt, retryAfterMs ?? undefined);
          }
          const body = await response.text();
          throw createError('VS-A005', {
            method,
            path,
            status,
            body: extractErrorDetail(body),
          });
        }
      } catch (error: unknown) {
        if (error instanceof VectorScopeError) {
          throw error;
        }
        if (abort.by === 'caller') {
          throw aborted();
        }
        failure =
          abort.by === 'timeout'
            ? { kind: 'timeout' }
            : classifyNetworkError(error);

        if (!shouldRetry(failure, idempotent) || attempt >= config.retryLimit) {
          if (failure.kind === 'timeout') {
            throw new TimeoutError(method, path, config.timeout);
          }
          const message =
            failure.kind === 'refused' || failure.kind === 'reset'
              ? failure.message
              : 'unknown error';
          throw createError('VS-T001', {
            method,
            path,
            message,
            attempts: attempt + 1,
          });
        }
      } finally {
        clearTimeout(timeoutId);
        spec.signal?.removeEventListener('abort', onCallerAbort);
      }
    } finally {
      if (semaphore) {
        semaphore.release();
      }
    }

    // Retryable failure with attempts left
    let delay = calculateBackoff(config.retryDelay, attempt);
    if (failure.kind === 'status' && failure.retryAfterMs !== null) {
      delay = failure.retryAfterMs;
    }

    emitClientEvent(config, {
      event: 'vectorscope:retry',
      subsystem: 'transport',
      method,
      path,
      attempt: attempt + 1,
      delay,
      reason: failure.kind === 'status' ? `HTTP ${failure.status}` : failure.kind,
    });

    await sleep(delay, spec.signal);
    attempt++;
  }
}
