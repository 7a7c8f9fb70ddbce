/**
 * HTTP client constants — defaults and configuration
 */

/**
 * Default request timeout in milliseconds (30 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Single attempt by default: capability calls are POSTs and the callers
 * decide how to degrade on failure.
 */
export const DEFAULT_MAX_ATTEMPTS = 1;

export const DEFAULT_BASE_DELAY_MS = 1_000;

export const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * HTTP status codes that warrant a retry when retries are enabled
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [
  408, 429, 500, 502, 503, 504,
];
