/**
 * HTTP Client Wrapper
 *
 * Thin layer over fetch used by the Places client. Applies a request
 * timeout and retries rate-limited (HTTP 429) responses according to an
 * injected retry policy. Every other non-2xx status is thrown as a
 * PlacesApiError.
 *
 * @module places/http
 */

import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

export type HttpMethod = 'GET' | 'POST';

/**
 * A single HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** JSON body, serialized before sending */
  body?: unknown;
  /** Query string parameters appended to the URL */
  params?: Record<string, string | number>;
}

/**
 * How rate-limited requests are retried.
 */
export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the given retry (1 = first retry) */
  delayMs(retry: number): number;
}

export type SleepFn = (ms: number) => Promise<void>;

type AttemptOutcome<T> = { done: true; value: T } | { done: false };

export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  fetchImpl?: typeof fetch;
  sleep?: SleepFn;
  logger?: Logger;
}

/**
 * Google Places API error with additional context
 */
export class PlacesApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly status: string,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'PlacesApiError';
  }
}

// ============================================================================
// Defaults
// ============================================================================

const DEFAULT_TIMEOUT_MS = 30000;

/** Delay before retrying a rate-limited request */
export const RATE_LIMIT_DELAY_MS = 5000;

/**
 * One retry after a fixed pause.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  delayMs: () => RATE_LIMIT_DELAY_MS,
};

/**
 * Retry policy without any pause, for tests.
 */
export function immediateRetryPolicy(maxAttempts = 2): RetryPolicy {
  return { maxAttempts, delayMs: () => 0 };
}

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Client
// ============================================================================

export class HttpClient {
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: SleepFn;
  private readonly logger?: Logger;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger;
  }

  /**
   * Perform a request and read its body, retrying on HTTP 429 while the
   * policy allows. The timeout covers the body read as well as the headers.
   *
   * @param read - Consumes the successful (2xx) response
   * @throws PlacesApiError on any other status or on timeout
   */
  async request<T>(request: HttpRequest, read: (response: Response) => Promise<T>): Promise<T> {
    const url = buildUrl(request.url, request.params);
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
    };

    const maxAttempts = Math.max(1, this.retryPolicy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      const canRetry = attempt < maxAttempts;
      const outcome = await this.withTimeout(async (signal): Promise<AttemptOutcome<T>> => {
        const response = await this.fetchImpl(url, { ...init, signal });

        if (response.ok) {
          return { done: true, value: await read(response) };
        }

        if (response.status === 429 && canRetry) {
          // Release the connection before waiting
          await response.body?.cancel();
          return { done: false };
        }

        return this.handleHttpError(response);
      });

      if (outcome.done) {
        return outcome.value;
      }

      const delay = this.retryPolicy.delayMs(attempt);
      this.logger?.warn(`Rate limited, retrying in ${delay}ms (${request.method} ${request.url})`);
      await this.sleep(delay);
    }
  }

  /**
   * Run one attempt under an AbortController deadline.
   *
   * The deadline rejects on its own even when the body stream ignores the
   * abort signal.
   */
  private async withTimeout<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(this.timeoutError());
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([run(controller.signal), deadline]);
    } catch (error) {
      if (isAbortError(error)) {
        throw this.timeoutError();
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private timeoutError(): PlacesApiError {
    return new PlacesApiError(`Request timed out after ${this.timeoutMs}ms`, 408, 'TIMEOUT', true);
  }

  /**
   * Convert a non-2xx response into a PlacesApiError.
   */
  private async handleHttpError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');

    const isRetryable = response.status === 429 || response.status >= 500;

    let message: string;
    if (response.status === 429) {
      message = `Quota exceeded: ${text}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${text}`;
    } else if (response.status === 401 || response.status === 403) {
      message = `Authentication failed: Invalid or unauthorized API key`;
    } else {
      message = `API error (${response.status}): ${text}`;
    }

    throw new PlacesApiError(message, response.status, 'HTTP_ERROR', isRetryable);
  }
}

/**
 * Append query parameters to a URL.
 */
export function buildUrl(base: string, params?: Record<string, string | number>): string {
  if (!params || Object.keys(params).length === 0) {
    return base;
  }
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  return `${base}${base.includes('?') ? '&' : '?'}${search.toString()}`;
}

/**
 * Abort errors from fetch are DOMExceptions, which may come from another
 * realm, so match on the name.
 */
function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError'
  );
}

/**
 * Check if an error is a Places API error
 */
export function isPlacesApiError(error: unknown): error is PlacesApiError {
  return error instanceof PlacesApiError;
}
