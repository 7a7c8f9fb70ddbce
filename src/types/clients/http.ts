/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request) */
  maxAttempts?: number;
  /** Base delay in ms for exponential backoff */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries */
  maxDelayMs?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  json?: unknown;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
}

/**
 * Injectable request function (real client or test double)
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;
