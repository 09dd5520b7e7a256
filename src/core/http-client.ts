/**
 * HTTP Client for MEPS Reader
 *
 * Wraps native fetch with:
 * - Exponential backoff with jitter
 * - Configurable timeouts via AbortController
 * - Error classification and retry logic
 *
 * Retries live here rather than in the retrieval pipeline, which makes
 * exactly one fetch attempt per request.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 3, timeoutMs: 120000 });
 *
 * const archive = await client.fetchBytes('https://meps.ahrq.gov/mepsweb/data_files/pufs/h171ssp.zip');
 * const table = await client.fetchJSON<unknown>('https://example.org/puf-names.json');
 * ```
 */

import { createLogger } from './utils/logger.js';

const logger = createLogger({ module: 'core/http-client' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts (default: 3) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 120000, full-year files are large) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor to prevent thundering herd (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
}

// ============================================================================
// Error Types
// ============================================================================

export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Connection failed, DNS resolution, etc.
 */
export class HTTPNetworkError extends Error {
  readonly url: string;
  readonly cause: Error;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
    this.url = url;
    this.cause = cause;
  }
}

export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;
  readonly cause: Error;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
    this.cause = cause;
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 3,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
      timeoutMs: 120000,
      userAgent: 'meps-reader/0.1',
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {HTTPError} For non-retryable or final HTTP error responses
   * @throws {HTTPTimeoutError} If the last attempt exceeds the timeout
   * @throws {HTTPNetworkError} For network failures on the last attempt
   * @throws {HTTPJSONParseError} If the body is not valid JSON
   */
  async fetchJSON<T = unknown>(url: string, options?: FetchOptions): Promise<T> {
    const response = await this.fetchWithRetry(url, options);
    const text = await response.text();

    try {
      return JSON.parse(text) as T;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch a binary response body
   */
  async fetchBytes(url: string, options?: FetchOptions): Promise<Uint8Array> {
    const response = await this.fetchWithRetry(url, options);
    return new Uint8Array(await response.arrayBuffer());
  }

  /**
   * Fetch raw response with retry logic
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxAttempts = (options?.retries ?? this.config.maxRetries) + 1;
    let attempt = 1;

    for (;;) {
      try {
        const response = await this.fetchWithTimeout(url, options);
        if (response.ok) {
          return response;
        }
        throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
      } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(String(caught));

        if (!this.isRetryableError(error) || attempt >= maxAttempts) {
          throw error;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts,
          error: error.message,
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
      attempt++;
    }
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * initialDelay * multiplier^(attempt - 1), capped, +/- jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 ||
      status === 429 ||
      status === 500 ||
      status === 502 ||
      status === 503 ||
      status === 504
    );
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }

    if (error instanceof HTTPError) {
      return this.isRetryableStatus(error.statusCode);
    }

    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

let defaultClient: HTTPClient | null = null;

export function getHTTPClient(): HTTPClient {
  if (!defaultClient) {
    defaultClient = new HTTPClient();
  }
  return defaultClient;
}

export function createHTTPClient(config?: Partial<HTTPClientConfig>): HTTPClient {
  return new HTTPClient(config);
}
