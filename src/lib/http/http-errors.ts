export type HttpFailureKind = 'network' | 'timeout' | 'http_status' | 'parse';

/**
 * Failure of a single HTTP exchange, or the terminal failure surfaced after
 * the retry budget is spent (see `attempts`).
 */
export class HttpRequestError extends Error {
  constructor(
    message: string,
    public readonly kind: HttpFailureKind,
    public readonly retryable: boolean,
    public readonly status?: number | undefined,
    public readonly attempts: number = 1,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HttpRequestError';
  }

  withAttempts(attempts: number): HttpRequestError {
    return new HttpRequestError(this.message, this.kind, this.retryable, this.status, attempts, { cause: this.cause });
  }
}

/**
 * 429 and 5xx are worth another attempt; every other non-2xx status is final.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}
