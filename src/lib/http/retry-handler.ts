/**
 * Retry Handler
 * Runs an operation with bounded attempts and a backoff schedule
 */

import { logger } from '../logger/structured-logger.js';
import { sleep } from '../reliability/timeout-guard.js';
import { HttpRequestError } from './http-errors.js';

/**
 * Error categorization result
 */
export interface ErrorCategory {
  type: 'timeout' | 'network' | 'http_status' | 'parse' | 'unknown';
  isRetriable: boolean;
  reason: string;
  statusCode?: number | undefined;
}

export interface RetryConfig {
  /** Total attempts, first try included */
  maxAttempts: number;
  /** Delay before attempt i; the last entry repeats for later attempts */
  backoffMs: number[];
}

export interface RetryOptions {
  label?: string | undefined;
  onError?: ((attempt: number, error: unknown, category: ErrorCategory) => void) | undefined;
}

/**
 * Reject schedules that could grow without bound or shrink between attempts.
 */
export function assertValidRetryConfig(config: RetryConfig, limits: { maxAttempts: number; maxBackoffMs: number }): void {
  const { maxAttempts, backoffMs } = config;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1 || maxAttempts > limits.maxAttempts) {
    throw new RangeError(`maxAttempts must be an integer between 1 and ${limits.maxAttempts}, got ${maxAttempts}`);
  }
  backoffMs.forEach((delay, i) => {
    if (!Number.isFinite(delay) || delay < 0 || delay > limits.maxBackoffMs) {
      throw new RangeError(`backoffMs[${i}] must be between 0 and ${limits.maxBackoffMs}, got ${delay}`);
    }
    const prev = backoffMs[i - 1];
    if (prev !== undefined && delay < prev) {
      throw new RangeError(`backoffMs must be non-decreasing (index ${i}: ${delay} < ${prev})`);
    }
  });
}

export class RetryHandler {
  constructor(
    private readonly config: RetryConfig,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Backoff applied before the given attempt (0-based). Never before the first.
   */
  delayBefore(attempt: number): number {
    if (attempt === 0) return 0;
    const { backoffMs } = this.config;
    if (backoffMs.length === 0) return 0;
    return backoffMs[Math.min(attempt, backoffMs.length - 1)] ?? 0;
  }

  /**
   * Execute fn, retrying retriable failures until attempts run out
   */
  async executeWithRetry<T>(fn: (attempt: number) => Promise<T>, opts?: RetryOptions): Promise<T> {
    const { maxAttempts } = this.config;
    let lastErr: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const backoff = this.delayBefore(attempt);
      if (backoff > 0) {
        await this.wait(backoff);
      }

      try {
        return await fn(attempt);
      } catch (e: unknown) {
        lastErr = e;
        const category = this.categorizeError(e);
        opts?.onError?.(attempt, e, category);

        if (!category.isRetriable) {
          logger.error({
            status: category.statusCode,
            label: opts?.label,
            errorType: category.type,
            reason: category.reason
          }, '[HTTP] Non-retriable error, failing fast');
          throw e;
        }

        if (attempt === maxAttempts - 1) {
          logger.error({
            attempts: attempt + 1,
            label: opts?.label,
            errorType: category.type,
            reason: category.reason
          }, '[HTTP] All retry attempts exhausted');
          throw e;
        }

        logger.warn({
          attempt: attempt + 1,
          maxAttempts,
          status: category.statusCode,
          label: opts?.label,
          errorType: category.type,
          nextDelayMs: this.delayBefore(attempt + 1)
        }, '[HTTP] Retriable error, will retry with backoff');
      }
    }

    throw lastErr ?? new Error('Request failed after all attempts');
  }

  /**
   * Categorize error for retry decision
   */
  categorizeError(e: unknown): ErrorCategory {
    if (e instanceof HttpRequestError) {
      return {
        type: e.kind,
        isRetriable: e.retryable,
        reason: e.message,
        statusCode: e.status
      };
    }

    return {
      type: 'unknown',
      isRetriable: false,
      reason: e instanceof Error ? e.message : String(e)
    };
  }
}
