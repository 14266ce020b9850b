/**
 * Tests for observability event emission
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  emitClientEvent,
  withEventEmission,
  type ClientEvent,
} from '../src/events.js';

interface Recorder {
  events: ClientEvent[];
  ctx: { callbacks: { onLogEvent: (event: ClientEvent) => void } };
}

function recorder(): Recorder {
  const events: ClientEvent[] = [];
  return {
    events,
    ctx: { callbacks: { onLogEvent: (event) => events.push(event) } },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

function throwingCtx(): {
  callbacks: { onLogEvent: (event: ClientEvent) => void };
} {
  return {
    callbacks: {
      onLogEvent: () => {
        throw new Error('sink offline');
      },
    },
  };
}

describe('emitClientEvent', () => {
  it('adds an ISO timestamp when absent', () => {
    const { events, ctx } = recorder();
    emitClientEvent(ctx, {
      event: 'vectorscope:retry',
      subsystem: 'transport',
    });

    expect(events).toHaveLength(1);
    expect(events[0]?.event).toBe('vectorscope:retry');
    expect(events[0]?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('keeps a supplied timestamp', () => {
    const { events, ctx } = recorder();
    emitClientEvent(ctx, {
      event: 'vectorscope:request',
      subsystem: 'transport',
      timestamp: '2024-01-01T00:00:00.000Z',
    });
    expect(events[0]?.timestamp).toBe('2024-01-01T00:00:00.000Z');
  });

  it('does nothing without callbacks', () => {
    expect(() =>
      emitClientEvent({}, { event: 'vectorscope:close', subsystem: 'client' })
    ).not.toThrow();
  });

  it('logs a throwing onLogEvent instead of propagating it', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(() =>
      emitClientEvent(throwingCtx(), {
        event: 'vectorscope:request',
        subsystem: 'transport',
      })
    ).not.toThrow();
    expect(warn).toHaveBeenCalledWith(
      'onLogEvent failed for vectorscope:request: sink offline'
    );
  });

  it('rejects empty event names', () => {
    const { ctx } = recorder();
    expect(() =>
      emitClientEvent(ctx, { event: ' ', subsystem: 'client' })
    ).toThrow('Event must include non-empty event field');
  });
});

describe('withEventEmission', () => {
  it('emits {prefix}:{operation} with metadata and duration on success', async () => {
    const { events, ctx } = recorder();
    const result = await withEventEmission(
      ctx,
      'vectorscope',
      'query',
      { collection: 'docs', topK: 5 },
      async () => 42
    );

    expect(result).toBe(42);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      event: 'vectorscope:query',
      subsystem: 'client',
      collection: 'docs',
      topK: 5,
    });
    expect(typeof events[0]?.['duration']).toBe('number');
  });

  it('emits {prefix}:error and rethrows the original error', async () => {
    const { events, ctx } = recorder();
    const failure = new Error('boom');
    const fn = vi.fn(async (): Promise<number> => {
      throw failure;
    });

    await expect(
      withEventEmission(ctx, 'vectorscope', 'upsertItems', {}, fn)
    ).rejects.toBe(failure);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      event: 'vectorscope:error',
      subsystem: 'client',
      operation: 'upsertItems',
      error: 'boom',
    });
  });

  it('returns the result when the success event callback throws', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    await expect(
      withEventEmission(throwingCtx(), 'vectorscope', 'count', {}, async () => 7)
    ).resolves.toBe(7);
  });
});
