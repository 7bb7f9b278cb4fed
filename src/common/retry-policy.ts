import { delay } from './delay';

export interface RetryPolicyOptions {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  /** Wait before the second attempt; later waits grow by `factor`. */
  baseDelayMs: number;
  factor?: number;
  /** Return false to fail fast on errors that retrying cannot fix. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Exponential backoff shared by timer start-up, timer cleanup and
 * presentation I/O.
 *
 * ```ts
 * const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100 });
 * await policy.execute((attempt) => registry.create(key, attempt));
 * ```
 */
export class RetryPolicy {
  private readonly factor: number;

  constructor(private readonly options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.factor = options.factor ?? 2;
  }

  /** Backoff before attempt `attempt + 1` (attempts are 1-based). */
  delayAfter(attempt: number): number {
    return this.options.baseDelayMs * this.factor ** (attempt - 1);
  }

  /**
   * Runs `operation` until it resolves or the attempts run out, then rethrows
   * the last error. An aborted `signal` stops further attempts.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T> | T,
    signal?: AbortSignal,
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const retryable = this.options.shouldRetry?.(error, attempt) ?? true;
        if (!retryable || attempt >= this.options.maxAttempts || signal?.aborted) {
          throw error;
        }

        const wait = this.delayAfter(attempt);
        this.options.onRetry?.(error, attempt, wait);
        await delay(wait, signal);
      }
    }
  }
}
