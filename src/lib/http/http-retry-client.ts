/**
 * HTTP Retry Client
 *
 * One logical request = up to `maxAttempts` fetches. Each attempt is bounded
 * by `timeoutMs`; network errors, timeouts, 429 and 5xx are retried with the
 * configured backoff, everything else fails fast.
 */

import { logger } from '../logger/structured-logger.js';
import { isTimeoutError, withTimeout } from '../reliability/timeout-guard.js';
import {
  HTTP_MAX_BACKOFF_MS,
  HTTP_MAX_RETRY_ATTEMPTS,
  HTTP_RETRY_ATTEMPTS,
  HTTP_RETRY_BACKOFF_MS,
  HTTP_TIMEOUT_MS
} from '../../config/index.js';
import { HttpRequestError, isRetryableStatus } from './http-errors.js';
import { assertValidRetryConfig, RetryHandler } from './retry-handler.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpRetryClientConfig {
  maxAttempts?: number;
  backoffMs?: number[];
  timeoutMs?: number;
  fetchImpl?: FetchFn;
  /** Replaces the real timer between attempts (tests) */
  wait?: (ms: number) => Promise<void>;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  /** Serialized as JSON when present */
  body?: unknown;
}

export class HttpRetryClient {
  private readonly retry: RetryHandler;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(config: HttpRetryClientConfig = {}) {
    const retryConfig = {
      maxAttempts: config.maxAttempts ?? HTTP_RETRY_ATTEMPTS,
      backoffMs: config.backoffMs ?? HTTP_RETRY_BACKOFF_MS
    };
    assertValidRetryConfig(retryConfig, {
      maxAttempts: HTTP_MAX_RETRY_ATTEMPTS,
      maxBackoffMs: HTTP_MAX_BACKOFF_MS
    });

    this.retry = new RetryHandler(retryConfig, config.wait);
    this.timeoutMs = config.timeoutMs ?? HTTP_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get maxAttempts(): number {
    return this.retry.maxAttempts;
  }

  /**
   * Send the request and return the parsed JSON body (unvalidated).
   * @throws HttpRequestError once retries are exhausted or on a non-retryable failure
   */
  async request(method: HttpMethod, url: string, options: HttpRequestOptions = {}): Promise<unknown> {
    const host = safeHost(url);
    let attemptsMade = 0;

    try {
      return await this.retry.executeWithRetry(
        (attempt) => {
          attemptsMade = attempt + 1;
          return this.attempt(method, url, options, attempt);
        },
        { label: `${method} ${host}` }
      );
    } catch (err: unknown) {
      if (err instanceof HttpRequestError) {
        throw err.withAttempts(attemptsMade);
      }
      throw err;
    }
  }

  private async exchange(url: string, init: RequestInit): Promise<ResponseExchange> {
    const response = await this.fetchImpl(url, init);
    if (!response.ok) {
      // Error bodies are best effort; the status decides
      const text = await response.text().catch(() => '');
      return { response, text };
    }
    try {
      return { response, text: await response.text() };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new HttpRequestError(
        `Network error while reading body: ${message}`,
        'network',
        true,
        response.status,
        1,
        { cause: err }
      );
    }
  }

  private async attempt(method: HttpMethod, url: string, options: HttpRequestOptions, attempt: number): Promise<unknown> {
    const controller = new AbortController();
    const startTime = Date.now();
    const init: RequestInit = {
      method,
      headers: options.headers,
      signal: controller.signal
    };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    let exchange: ResponseExchange;
    try {
      // Headers and body share one deadline; a stalled body is aborted like a stalled connect
      exchange = await withTimeout(
        this.exchange(url, init),
        this.timeoutMs,
        `${method} ${safeHost(url)}`,
        () => controller.abort()
      );
    } catch (err: unknown) {
      if (err instanceof HttpRequestError) {
        throw err;
      }
      if (isTimeoutError(err)) {
        throw new HttpRequestError(err.message, 'timeout', true, undefined, 1, { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new HttpRequestError(`Network error: ${message}`, 'network', true, undefined, 1, { cause: err });
    }

    const { response, text } = exchange;
    logger.debug({
      method,
      host: safeHost(url),
      status: response.status,
      attempt: attempt + 1,
      durationMs: Date.now() - startTime
    }, '[HTTP] Response received');

    if (!response.ok) {
      throw new HttpRequestError(
        `HTTP ${response.status} from ${safeHost(url)}: ${text.substring(0, 200)}`,
        'http_status',
        isRetryableStatus(response.status),
        response.status
      );
    }

    try {
      return JSON.parse(text);
    } catch (err: unknown) {
      throw new HttpRequestError(
        `Malformed JSON body from ${safeHost(url)}`,
        'parse',
        false,
        response.status,
        1,
        { cause: err }
      );
    }
  }
}

interface ResponseExchange {
  response: Response;
  text: string;
}

function safeHost(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'invalid-url';
  }
}
