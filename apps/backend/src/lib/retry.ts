import type { ILogger } from '@terminal-connector/types';
import { RequestAbortedError } from './errors.js';

export interface RetryPolicyOptions {
  /**
   * Retries after the first attempt. `2` means at most three attempts.
   */
  maxRetries: number;
  backoffMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxRetries: 2,
  backoffMs: 250,
  backoffMultiplier: 2
};

/**
 * Bounded exponential-backoff retry strategy.
 *
 * Subclasses decide which failures are worth another attempt for a given
 * operation context (for provider calls: only idempotent requests failing
 * with a transient error).
 */
export abstract class RetryPolicy<TContext> {
  readonly maxRetries: number;
  readonly backoffMs: number;
  readonly backoffMultiplier: number;

  protected constructor(options: RetryPolicyOptions) {
    this.maxRetries = options.maxRetries;
    this.backoffMs = options.backoffMs;
    this.backoffMultiplier = options.backoffMultiplier;
  }

  abstract shouldRetry(error: unknown, context: TContext): boolean;

  /**
   * Delay before retry number `retry` (1-based).
   */
  delayBeforeRetry(retry: number): number {
    return this.backoffMs * this.backoffMultiplier ** (retry - 1);
  }
}

export interface RetryOptions {
  logger?: ILogger;
  requestLabel?: string;

  /**
   * Aborts pending backoff sleeps and prevents further attempts.
   */
  signal?: AbortSignal;
}

/**
 * Resolves after `ms`, or rejects with RequestAbortedError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function executeWithRetry<T, TContext>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy<TContext>,
  context: TContext,
  options: RetryOptions = {}
): Promise<T> {
  const { logger, requestLabel, signal } = options;
  let attempt = 0;

  for (;;) {
    if (signal?.aborted) {
      throw new RequestAbortedError();
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.maxRetries || !policy.shouldRetry(error, context)) {
        throw error;
      }

      attempt += 1;
      const delay = policy.delayBeforeRetry(attempt);

      logger?.warn(
        {
          error: error instanceof Error ? error.message : String(error),
          attempt,
          maxRetries: policy.maxRetries,
          requestLabel,
          delay
        },
        'Retrying upstream request'
      );

      await sleep(delay, signal);
    }
  }
}
