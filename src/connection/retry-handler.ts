/**
 * RetryHandler - bounded retry loop with a fixed delay
 *
 * Runs an operation up to `maxAttempts` times, sleeping `delayMs` between
 * attempts. Attempts are counted in a loop variable so the call stack stays
 * flat however large the budget is.
 */

import type { RetryConfig } from '../types.js';
import { DEFAULT_CONFIG } from '../types.js';
import { toError } from '../errors.js';

/**
 * Result of a retried operation
 */
export interface RetryResult<T> {
  /** Value returned by the successful attempt */
  result: T;
  /** Number of attempts made, the successful one included */
  attempts: number;
  /** Total time spent in milliseconds */
  totalTimeMs: number;
}

/**
 * Thrown by `withRetry` once the operation cannot be retried any further
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    readonly attempts: number,
    /** Error raised by the last attempt */
    readonly lastError: Error,
    /** False when the loop stopped on a non-retryable error */
    readonly exhausted: boolean
  ) {
    super(lastError.message, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Options for a retry handler
 */
export interface RetryHandlerOptions extends Partial<RetryConfig> {
  /** Decide whether an error may be retried */
  isRetryable?: (error: Error) => boolean;
  /** Called before every attempt (1-indexed) */
  onAttempt?: (attempt: number, maxAttempts: number) => void;
  /** Called after a failed attempt; `delayMs` is null when no retry follows */
  onFailure?: (attempt: number, error: Error, delayMs: number | null) => void;
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Default function to determine if an error is retryable
 * Focuses on transient connection errors
 */
export function isRetryableError(error: Error): boolean {
  const message = error.message.toLowerCase();

  // Connection errors
  if (
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('etimedout') ||
    message.includes('enotfound') ||
    message.includes('eai_again') ||
    message.includes('connection refused') ||
    message.includes('connection reset') ||
    message.includes('connection terminated') ||
    message.includes('connection timed out') ||
    message.includes('timeout expired') ||
    message.includes('socket hang up')
  ) {
    return true;
  }

  // PostgreSQL specific transient errors
  if (
    message.includes('too many connections') ||
    message.includes('sorry, too many clients') ||
    message.includes('the database system is starting up') ||
    message.includes('the database system is shutting down') ||
    message.includes('the database system is in recovery mode') ||
    message.includes('server closed the connection unexpectedly') ||
    message.includes('could not connect to server')
  ) {
    return true;
  }

  // SSL/TLS errors that might be transient
  if (message.includes('ssl connection') || message.includes('ssl handshake')) {
    return true;
  }

  return false;
}

function retryAll(): boolean {
  return true;
}

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry handler with a fixed delay between attempts
 *
 * @example
 * ```typescript
 * const handler = new RetryHandler({ maxAttempts: 13, delayMs: 5000 });
 *
 * const { result, attempts } = await handler.withRetry(() => connectToDb());
 * console.log(`Connected after ${attempts} attempt(s)`);
 * ```
 */
export class RetryHandler {
  private readonly config: RetryConfig;
  private readonly isRetryable: (error: Error) => boolean;
  private readonly onAttempt?: (attempt: number, maxAttempts: number) => void;
  private readonly onFailure?: (attempt: number, error: Error, delayMs: number | null) => void;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryHandlerOptions = {}) {
    this.config = {
      maxAttempts: options.maxAttempts ?? DEFAULT_CONFIG.retry.maxAttempts,
      delayMs: options.delayMs ?? DEFAULT_CONFIG.retry.delayMs,
      transientOnly: options.transientOnly ?? DEFAULT_CONFIG.retry.transientOnly,
    };
    this.isRetryable =
      options.isRetryable ?? (this.config.transientOnly ? isRetryableError : retryAll);
    this.onAttempt = options.onAttempt;
    this.onFailure = options.onFailure;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Execute an operation with retry logic
   *
   * @param operation - The async operation to execute
   * @returns Result with metadata about attempts and timing
   * @throws RetryExhaustedError when the budget is used up or an error is not retryable
   */
  async withRetry<T>(operation: () => Promise<T>): Promise<RetryResult<T>> {
    const { maxAttempts, delayMs } = this.config;
    const startTime = Date.now();
    let attempt = 0;

    while (true) {
      attempt++;
      this.onAttempt?.(attempt, maxAttempts);

      try {
        const result = await operation();
        return {
          result,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      } catch (err) {
        const error = toError(err);
        const exhausted = attempt >= maxAttempts;
        const retryable = this.isRetryable(error);

        if (exhausted || !retryable) {
          this.onFailure?.(attempt, error, null);
          throw new RetryExhaustedError(attempt, error, exhausted);
        }

        this.onFailure?.(attempt, error, delayMs);
        await this.sleep(delayMs);
      }
    }
  }

  /**
   * Get the current configuration
   */
  getConfig(): RetryConfig {
    return { ...this.config };
  }

  /**
   * Get the maximum number of attempts
   */
  getMaxAttempts(): number {
    return this.config.maxAttempts;
  }
}

/**
 * Create a retry handler with pre-configured options
 */
export function createRetryHandler(options?: RetryHandlerOptions): RetryHandler {
  return new RetryHandler(options);
}
