/**
 * HTTP client wrapper — JSON client over native fetch
 *
 * Timeouts via AbortController, structured HttpError on non-2xx, and
 * optional exponential backoff. Retries are opt-in (maxAttempts defaults
 * to 1): the capability callers own their degrade-on-failure policy.
 */

import type { HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  RETRYABLE_STATUS_CODES,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Network errors, timeouts and retryable status codes
 */
function isErrorRetryable(error: unknown): boolean {
  if (error instanceof HttpError) {
    return RETRYABLE_STATUS_CODES.includes(error.status);
  }
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }
  return false;
}

/**
 * min(maxDelay, baseDelay * 2^(attempt-1)) scaled by a 0.5–1.0 jitter
 */
function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest<T>(req: HttpRequest, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
    };
    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(req.url, options);

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url: req.url,
        bodySnippet,
      });
    }

    // Caller declares T; the body is trusted to match it
    return (await response.json()) as T;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP request with timeout and optional retries
 *
 * @throws {HttpError} On non-2xx status codes (after all attempts)
 * @throws {Error} On network errors, timeouts (AbortError) or invalid JSON
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await performRequest<T>(req, timeoutMs);
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !isErrorRetryable(error)) {
        break;
      }

      const delayMs = computeBackoffDelay(attempt, baseDelayMs, maxDelayMs);
      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts,
        delayMs,
        reason:
          error instanceof HttpError
            ? `status ${error.status}`
            : error instanceof Error
              ? error.name
              : String(error),
      });
      await sleep(delayMs);
    }
  }

  throw lastError;
}
