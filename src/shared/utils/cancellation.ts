// Cancellation token primitives for long-running work such as AI search.
//
// Hosts create a source, hand its token to the worker, and cancel from a
// timeout or a shutdown signal. Work checks the token at safe points.

export type CancellationReason = unknown;

/**
 * Read-only view of a cancellation token.
 */
export interface CancellationToken {
  /** True once cancel() has been invoked on the associated source. */
  readonly isCanceled: boolean;
  /** Optional reason supplied by the canceller (for logging/diagnostics). */
  readonly reason?: CancellationReason;

  /**
   * Throws an OperationCanceledError if the token has been canceled.
   *
   *   token.throwIfCanceled('heuristic search');
   */
  throwIfCanceled(contextMessage?: string): void;
}

/**
 * Mutable source for a {@link CancellationToken}.
 *
 *   const source = createCancellationSource();
 *   const timer = setTimeout(() => source.cancel('think time exceeded'), 5000);
 *   chooseMove(state, depth, { cancellationToken: source.token });
 */
export interface CancellationSource {
  readonly token: CancellationToken;
  /**
   * Marks the token as canceled. Subsequent calls are no-ops.
   */
  cancel(reason?: CancellationReason): void;
}

export class OperationCanceledError extends Error {
  readonly cancellationReason: CancellationReason;

  constructor(message: string, reason: CancellationReason) {
    super(message);
    this.name = 'OperationCanceledError';
    this.cancellationReason = reason;
  }
}

export function isOperationCanceledError(error: unknown): error is OperationCanceledError {
  return error instanceof OperationCanceledError;
}

export function createCancellationSource(): CancellationSource {
  let canceled = false;
  let reason: CancellationReason | undefined;

  const token: CancellationToken = {
    get isCanceled() {
      return canceled;
    },
    get reason() {
      return reason;
    },
    throwIfCanceled(contextMessage?: string): void {
      if (!canceled) return;
      const detail = contextMessage ? ` (${contextMessage})` : '';
      throw new OperationCanceledError(`Operation canceled${detail}`, reason);
    },
  };

  return {
    token,
    cancel(nextReason?: CancellationReason): void {
      if (canceled) return;
      canceled = true;
      reason = nextReason;
    },
  };
}
