/**
 * Retry helpers
 *
 * `withRetry` re-runs a failing async function with exponential backoff.
 * `repeatUntil` re-runs an operation that does not fail but may not yet have
 * produced the wanted state, with a fixed pause between attempts and an early
 * exit as soon as the stop condition holds.
 */

import { logger } from './logger.js';

const log = logger.create('Retry');

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /** @default 1000 */
  initialDelayMs?: number;

  /**
   * Caps the exponential backoff.
   * @default 30000
   */
  maxDelayMs?: number;

  /**
   * delay = min(initialDelayMs * backoffMultiplier^retryCount, maxDelayMs)
   * @default 2
   */
  backoffMultiplier?: number;

  /**
   * Return true to retry, false to throw immediately.
   * @default retries every error
   */
  retryOn?: (error: Error) => boolean;

  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryOn: () => true,
  onRetry: () => {},
};

/**
 * Execute an async function with automatic retry on failure.
 *
 * @example
 * ```typescript
 * const channels = await withRetry(() => gateway.loadAll(), {
 *   maxAttempts: 3,
 *   initialDelayMs: 500,
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error | null = null;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxAttempts || !opts.retryOn(lastError)) {
        throw lastError;
      }

      opts.onRetry(attempt, lastError, delay);

      log.warn('Retry attempt failed', {
        attempt,
        maxAttempts: opts.maxAttempts,
        error: lastError.message,
        retryDelayMs: delay,
      });

      await sleep(delay);

      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}

/**
 * Options for repeatUntil
 */
export interface RepeatOptions {
  /** Number of attempts to make */
  attempts: number;
  /** Fixed pause between attempts */
  delayMs: number;
  /** Checked before and after every attempt; true ends the loop */
  shouldStop: () => boolean;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  onAttempt?: (attempt: number) => void;
}

/**
 * Run `operation` up to `attempts` times, pausing `delayMs` between runs and
 * stopping as soon as `shouldStop()` returns true.
 *
 * @returns the number of attempts actually made
 */
export async function repeatUntil(
  operation: (attempt: number) => Promise<void>,
  options: RepeatOptions
): Promise<number> {
  const pause = options.sleep ?? sleep;
  let made = 0;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    if (options.shouldStop()) {
      break;
    }

    options.onAttempt?.(attempt);
    await operation(attempt);
    made++;

    if (options.shouldStop()) {
      break;
    }

    if (attempt < options.attempts) {
      await pause(options.delayMs);
    }
  }

  return made;
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
