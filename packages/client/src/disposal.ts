import { createError, type VectorScopeError } from '@vectorscope/core';

/** Lifecycle state of one client */
export interface DisposalState {
  isDisposed: boolean;
  /** Aborted on dispose; in-flight requests listen to it */
  readonly controller: AbortController;
}

/**
 * Create a disposal state tracker initialized to not-disposed.
 */
export function createDisposalState(): DisposalState {
  return { isDisposed: false, controller: new AbortController() };
}

/**
 * Error raised by calls made after close().
 */
export function closedError(): VectorScopeError {
  return createError('VS-T004', {});
}

/**
 * Throw ConnectionError if the client has been closed.
 * @throws ConnectionError (VS-T004) when state.isDisposed === true
 */
export function checkDisposed(state: DisposalState): void {
  if (state.isDisposed) {
    throw closedError();
  }
}

/**
 * Combine the disposal signal with a caller's signal.
 * Call release() once the request settles to detach the listeners.
 */
export function linkSignals(
  state: DisposalState,
  signal: AbortSignal | undefined
): { signal: AbortSignal; release: () => void } {
  const disposal = state.controller.signal;
  if (signal === undefined) {
    return { signal: disposal, release: () => {} };
  }

  const controller = new AbortController();
  const onAbort = (): void => controller.abort();
  if (disposal.aborted || signal.aborted) {
    controller.abort();
  } else {
    disposal.addEventListener('abort', onAbort);
    signal.addEventListener('abort', onAbort);
  }
  return {
    signal: controller.signal,
    release: () => {
      disposal.removeEventListener('abort', onAbort);
      signal.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Set disposal flag, abort in-flight requests, and invoke optional cleanup.
 * Idempotent: returns immediately if already disposed.
 * Cleanup errors are logged but do not propagate.
 *
 * @param state - DisposalState object to update
 * @param cleanup - Optional async cleanup callback
 */
export async function dispose(
  state: DisposalState,
  cleanup?: () => Promise<void>
): Promise<void> {
  if (state.isDisposed) {
    return;
  }
  state.isDisposed = true;
  state.controller.abort();

  if (cleanup) {
    try {
      await cleanup();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.warn(`Cleanup failed: ${message}`);
    }
  }
}
