/**
 * @canopy/core - Retry & Timeout
 *
 * Bounded retry with exponential backoff, enforced timeouts and an
 * abortable delay. Every wait honours an AbortSignal so cancellation
 * reaches each suspension point of the bring-up pipeline.
 */

import {
  InitializationCancelledError,
  OperationTimeoutError,
} from '../../domain/exceptions';

/**
 * Retry policy configuration
 */
export interface RetryPolicyOptions {
  /**
   * Maximum number of attempts (including initial attempt).
   * @defaultValue 3
   */
  maxAttempts?: number;

  /**
   * Initial delay between retries in milliseconds.
   * @defaultValue 50
   */
  delay?: number;

  /**
   * Maximum delay between retries in milliseconds.
   * @defaultValue 1000
   */
  maxDelay?: number;

  /**
   * Multiplier for exponential backoff.
   * @defaultValue 2
   */
  backoffMultiplier?: number;

  /**
   * Whether to add random jitter to delay.
   * @defaultValue false
   */
  jitter?: boolean;

  /**
   * Jitter range as percentage of delay (0-1).
   * @defaultValue 0.2
   */
  jitterRange?: number;

  /**
   * Predicate deciding whether a failure is worth another attempt.
   */
  shouldRetry?: (error: unknown, attempt: number) => boolean;

  /**
   * Callback invoked before each retry.
   */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  /**
   * Cancels pending waits and further attempts.
   */
  signal?: AbortSignal;
}

/**
 * Outcome of a retried operation
 */
export type RetryOutcome<T> =
  | { success: true; value: T; attempts: number; errors: unknown[] }
  | { success: false; attempts: number; errors: unknown[] };

/**
 * Delay before the retry that follows `attempt` (1-based)
 */
export function computeBackoffDelay(
  attempt: number,
  options: RetryPolicyOptions = {},
  random: () => number = Math.random,
): number {
  const base = options.delay ?? 50;
  const multiplier = options.backoffMultiplier ?? 2;
  const maxDelay = options.maxDelay ?? 1000;

  let delayMs = Math.min(base * Math.pow(multiplier, attempt - 1), maxDelay);

  if (options.jitter) {
    const range = delayMs * (options.jitterRange ?? 0.2);
    delayMs += (random() * 2 - 1) * range;
  }

  return Math.max(0, Math.round(delayMs));
}

/**
 * Throw if the signal has been aborted
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new InitializationCancelledError(reasonOf(signal));
  }
}

/**
 * Wait for `ms` milliseconds, rejecting early when the signal aborts
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new InitializationCancelledError(reasonOf(signal)));
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      reject(new InitializationCancelledError(reasonOf(signal)));
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run an operation with an enforced timeout
 *
 * The operation receives a signal that aborts when the timeout elapses or
 * the outer signal aborts, so cooperative work can stop early.
 *
 * @param timeoutMs - Omitted or non-positive means no timeout
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T> | T,
  timeoutMs: number | undefined,
  label: string,
  signal?: AbortSignal,
): Promise<T> {
  throwIfAborted(signal);

  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', forwardAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const guards: Promise<never>[] = [
    new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => {
          if (!(controller.signal.reason instanceof OperationTimeoutError)) {
            reject(new InitializationCancelledError(reasonOf(signal)));
          }
        },
        { once: true },
      );
    }),
  ];

  if (timeoutMs !== undefined && timeoutMs > 0) {
    guards.push(
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = new OperationTimeoutError(label, timeoutMs);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      }),
    );
  }

  try {
    return await Promise.race([
      Promise.resolve().then(() => operation(controller.signal)),
      ...guards,
    ]);
  } finally {
    if (timer) clearTimeout(timer);
    signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Run an operation up to `maxAttempts` times with exponential backoff
 *
 * Never throws for operation failures; the outcome carries every error.
 * Cancellation is the exception: an aborted signal rejects with
 * InitializationCancelledError.
 *
 * @example
 * ```typescript
 * const outcome = await retry(() => manager.initialize(), {
 *   maxAttempts: 3,
 *   delay: 50,
 *   onRetry: (error, attempt) => log.warn(`attempt ${attempt} failed`),
 * });
 * ```
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T> | T,
  options: RetryPolicyOptions = {},
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const shouldRetry = options.shouldRetry ?? (() => true);
  const errors: unknown[] = [];

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    throwIfAborted(options.signal);

    try {
      const value = await operation(attempt);
      return { success: true, value, attempts: attempt, errors };
    } catch (error) {
      if (error instanceof InitializationCancelledError) throw error;
      errors.push(error);

      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        return { success: false, attempts: attempt, errors };
      }

      const delayMs = computeBackoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      await delay(delayMs, options.signal);
    }
  }

  return { success: false, attempts: maxAttempts, errors };
}

function reasonOf(signal?: AbortSignal): string | undefined {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === 'string' ? reason : undefined;
}
