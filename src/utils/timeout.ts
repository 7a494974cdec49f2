import { CancelledError, TimeoutError } from '../errors/errors.js';

export interface TimeoutOptions {
  /** Upper bound for the whole operation */
  timeoutMs: number;
  /** Caller cancellation */
  signal?: AbortSignal;
  /** Label used in error messages */
  operation: string;
}

/**
 * Runs an abortable operation under a time bound.
 *
 * The operation receives a signal that fires on timeout or on caller
 * cancellation. The returned promise settles as soon as either happens,
 * whether or not the operation honours its signal:
 * - timeout rejects with TimeoutError
 * - caller abort rejects with CancelledError
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, signal, operation: label } = options;

  if (signal?.aborted) {
    return Promise.reject(new CancelledError(label));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      settle();
    };

    const onAbort = (): void => {
      controller.abort();
      finish(() => reject(new CancelledError(label)));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new TimeoutError(label, timeoutMs)));
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    Promise.resolve()
      .then(() => operation(controller.signal))
      .then(
        (value) => finish(() => resolve(value)),
        (error: unknown) => finish(() => reject(error))
      );
  });
}
