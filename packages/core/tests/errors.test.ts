/**
 * Tests for the error registry and error classes
 */

import { describe, it, expect } from 'vitest';
import { ERROR_REGISTRY, renderMessage } from '../src/error-registry.js';
import {
  ApiError,
  AuthenticationError,
  BatchError,
  ConflictError,
  ConnectionError,
  createError,
  formatErrorMessage,
  NotFoundError,
  RateLimitError,
  TimeoutError,
  ValidationError,
  VectorScopeError,
} from '../src/error-classes.js';

describe('ERROR_REGISTRY', () => {
  it('uses VS-{category}{3 digits} ids matching the category', () => {
    const prefixes = {
      validation: 'V',
      config: 'C',
      transport: 'T',
      api: 'A',
    } as const;

    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(id).toMatch(/^VS-[VCTA]\d{3}$/);
      expect(id).toBe(definition.errorId);
      expect(id.charAt(3)).toBe(prefixes[definition.category]);
    }
  });

  it('looks up definitions by id', () => {
    expect(ERROR_REGISTRY.has('VS-V002')).toBe(true);
    expect(ERROR_REGISTRY.get('VS-V002')?.category).toBe('validation');
    expect(ERROR_REGISTRY.has('VS-X999')).toBe(false);
    expect(ERROR_REGISTRY.get('VS-X999')).toBeUndefined();
  });
});

describe('renderMessage', () => {
  it('replaces placeholders with context values', () => {
    expect(
      renderMessage('{resource} not found: {name}', {
        resource: 'collection',
        name: 'docs',
      })
    ).toBe('collection not found: docs');
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('a{missing}b', {})).toBe('ab');
  });

  it('stringifies non-string values', () => {
    expect(renderMessage('{n} items, ok={ok}', { n: 3, ok: false })).toBe(
      '3 items, ok=false'
    );
  });

  it('returns the template unchanged when a brace is unclosed', () => {
    expect(renderMessage('broken {name', { name: 'x' })).toBe('broken {name');
  });
});

describe('VectorScopeError', () => {
  it('rejects unknown error ids', () => {
    expect(
      () => new VectorScopeError({ errorId: 'VS-X999', message: 'nope' })
    ).toThrow('Unknown error ID: VS-X999');
  });

  it('formats as [id] message', () => {
    const error = new VectorScopeError({
      errorId: 'VS-T004',
      message: 'client closed',
    });
    expect(error.format()).toBe('[VS-T004] client closed');
    expect(error.format((data) => data.message.toUpperCase())).toBe(
      'CLIENT CLOSED'
    );
    expect(error.toData()).toEqual({
      errorId: 'VS-T004',
      message: 'client closed',
      context: {},
    });
  });
});

describe('specialized errors', () => {
  it('ValidationError exposes the offending field', () => {
    const error = new ValidationError('VS-V001', 'topK: must be positive', {
      field: 'topK',
    });
    expect(error).toBeInstanceOf(VectorScopeError);
    expect(error.name).toBe('ValidationError');
    expect(error.field).toBe('topK');
  });

  it('ValidationError refuses ids of another category', () => {
    expect(() => new ValidationError('VS-T001', 'wrong')).toThrow(
      'Expected validation or config error ID, got: VS-T001'
    );
  });

  it('TimeoutError is a ConnectionError', () => {
    const error = new TimeoutError('GET', '/api/v2/heartbeat', 250);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error.errorId).toBe('VS-T002');
    expect(error.message).toBe('GET /api/v2/heartbeat: request timeout (250ms)');
    expect(error.timeoutMs).toBe(250);
  });

  it('NotFoundError and ConflictError carry status and entity', () => {
    const missing = new NotFoundError('collection', 'docs');
    expect(missing).toBeInstanceOf(ApiError);
    expect(missing.status).toBe(404);
    expect(missing.message).toBe('collection not found: docs');
    expect(missing.context).toEqual({ resource: 'collection', name: 'docs' });

    const duplicate = new ConflictError('collection', 'docs');
    expect(duplicate.status).toBe(409);
    expect(duplicate.message).toBe('collection already exists: docs');
  });

  it('AuthenticationError and RateLimitError describe the status', () => {
    expect(new AuthenticationError(403).message).toBe(
      'authentication failed (403)'
    );
    const limited = new RateLimitError(3, 1500);
    expect(limited.message).toBe('rate limit exceeded after 3 retries');
    expect(limited.retryAfterMs).toBe(1500);
    expect(limited.status).toBe(429);
  });

  it('BatchError lists failed items', () => {
    const error = new BatchError('upsertItems', [
      { id: 'a', ok: true },
      { id: 'b', ok: false, error: 'bad vector' },
      { id: 'c', ok: false },
    ]);
    expect(error.message).toBe('upsertItems: 2 of 3 items failed');
    expect(error.failedItems.map((item) => item.id)).toEqual(['b', 'c']);
    expect(error.items).toHaveLength(3);
  });
});

describe('formatErrorMessage', () => {
  it('renders the registered template', () => {
    expect(
      formatErrorMessage('VS-A006', {
        source: 'GET /api/v2/heartbeat',
        reason: 'body is not JSON',
      })
    ).toBe('GET /api/v2/heartbeat: invalid response — body is not JSON');
  });

  it('throws TypeError for unknown ids', () => {
    expect(() => formatErrorMessage('VS-Z000', {})).toThrow(
      'Unknown error ID: VS-Z000'
    );
  });

  it('is the message of every fixed-id error class', () => {
    const errors = [
      new TimeoutError('GET', '/x', 10),
      new NotFoundError('collection', 'docs'),
      new ConflictError('tenant', 'acme'),
      new AuthenticationError(401),
      new RateLimitError(2, undefined),
      new BatchError('addItems', [{ id: 'a', ok: false }]),
    ];
    for (const error of errors) {
      expect(error.message).toBe(
        formatErrorMessage(error.errorId, error.context)
      );
    }
  });
});

describe('createError', () => {
  it('renders the template and picks the class by category', () => {
    const error = createError('VS-V002', {
      field: 'items[0].vector',
      expected: 3,
      actual: 4,
    });
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe(
      'items[0].vector: dimension mismatch (expected 3, got 4)'
    );
  });

  it('creates ConnectionError for transport ids', () => {
    const error = createError('VS-T004', {});
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error.message).toBe('client closed');
  });

  it('creates ApiError with the status from context', () => {
    const error = createError('VS-A005', {
      method: 'GET',
      path: '/x',
      status: 500,
      body: 'boom',
    });
    expect(error).toBeInstanceOf(ApiError);
    expect(error instanceof ApiError ? error.status : undefined).toBe(500);
  });

  it('throws TypeError for unknown ids', () => {
    expect(() => createError('VS-Z000', {})).toThrow(TypeError);
  });
});
