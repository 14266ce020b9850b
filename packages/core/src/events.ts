/**
 * Observability events for the client.
 * Operations report timing and outcome through an optional onLogEvent callback.
 */

// ============================================================
// TYPE DEFINITIONS
// ============================================================

/** Event delivered to onLogEvent */
export interface ClientEvent {
  /** Event name, e.g. "vectorscope:query" */
  readonly event: string;
  /** Emitting subsystem, e.g. "client" or "transport" */
  readonly subsystem: string;
  /** ISO 8601 timestamp */
  readonly timestamp: string;
  readonly [key: string]: unknown;
}

/** Event as passed to emitClientEvent; timestamp is added when absent */
export interface ClientEventInput {
  readonly event: string;
  readonly subsystem: string;
  readonly timestamp?: string | undefined;
  readonly [key: string]: unknown;
}

/** Host callbacks for observability */
export interface ClientCallbacks {
  readonly onLogEvent?: ((event: ClientEvent) => void) | undefined;
}

/**
 * Minimal interface for event emission.
 * Allows emitClientEvent to accept any object with callbacks.
 */
export interface EventContext {
  readonly callbacks?: ClientCallbacks | undefined;
}

// ============================================================
// EMISSION
// ============================================================

/**
 * Emit a client event with auto-generated timestamp.
 * Adds ISO timestamp if event.timestamp is undefined, then calls onLogEvent.
 * An exception thrown by onLogEvent is logged with console.warn, not rethrown.
 *
 * @param ctx - Object carrying the host callbacks
 * @param event - Event to emit (timestamp auto-added if omitted)
 * @throws {Error} If event.event is empty
 *
 * @example
 * ```typescript
 * emitClientEvent(client, {
 *   event: 'vectorscope:retry',
 *   subsystem: 'transport',
 *   attempt: 1,
 * });
 * ```
 */
export function emitClientEvent(
  ctx: EventContext,
  event: ClientEventInput
): void {
  if (event.event.trim() === '') {
    throw new Error('Event must include non-empty event field');
  }

  const onLogEvent = ctx.callbacks?.onLogEvent;
  if (onLogEvent === undefined) {
    return;
  }

  // Observer failures never reach the caller
  try {
    onLogEvent({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    });
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`onLogEvent failed for ${event.event}: ${message}`);
  }
}

/**
 * Wrap async operation with start-time recording, success event emission,
 * and error event emission.
 *
 * Success emits `{prefix}:{operation}` with duration and metadata. Failure
 * emits `{prefix}:error` with the operation, error message and duration,
 * then rethrows the original error.
 *
 * @param ctx - Object carrying the host callbacks
 * @param prefix - Event name prefix (e.g., "vectorscope")
 * @param operation - Operation name (e.g., "upsert", "query")
 * @param metadata - Additional fields for the success event
 * @param fn - Async operation to execute
 *
 * @example
 * ```typescript
 * const result = await withEventEmission(
 *   client,
 *   'vectorscope',
 *   'query',
 *   { collection: 'docs', topK: 5 },
 *   async () => runQuery()
 * );
 * // Emits: { event: 'vectorscope:query', subsystem: 'client', duration: 12, collection: 'docs', topK: 5 }
 * ```
 */
export async function withEventEmission<T>(
  ctx: EventContext,
  prefix: string,
  operation: string,
  metadata: Record<string, unknown>,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await fn();

    emitClientEvent(ctx, {
      ...metadata,
      event: `${prefix}:${operation}`,
      subsystem: 'client',
      duration: Date.now() - startTime,
    });

    return result;
  } catch (error: unknown) {
    emitClientEvent(ctx, {
      event: `${prefix}:error`,
      subsystem: 'client',
      operation,
      error: error instanceof Error ? error.message : String(error),
      duration: Date.now() - startTime,
    });

    throw error;
  }
}
