/**
 * HTTP client wrapper: general-purpose client using native fetch
 * Supports timeouts, query params, external cancellation, JSON and text
 * responses, and structured error handling.
 *
 * One request, one attempt: retries belong to the aggregation orchestrator,
 * which owns the per-source budget.
 */

import type { HttpQueryValue, HttpRequest } from "@/types";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants";
import { HttpError } from "./httpError";

/**
 * Build URL with query parameters (supports arrays for repeated params)
 */
export function buildUrl(
  baseUrl: string,
  query?: Record<string, HttpQueryValue>,
): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      // Append each array element as a repeated query param
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  const text = await response.text().catch(() => "");
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
    : text;
}

/**
 * Parse Retry-After header value
 * Supports both delay-seconds (number) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
export function parseRetryAfter(
  retryAfterHeader: string | null | undefined,
  now: number = Date.now(),
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  // Try parsing as seconds (numeric)
  if (/^\d+$/.test(retryAfterHeader.trim())) {
    const seconds = parseInt(retryAfterHeader, 10);
    return seconds > 0 ? seconds * 1000 : null;
  }

  // Try parsing as HTTP date
  const date = new Date(retryAfterHeader);
  if (!isNaN(date.getTime())) {
    const delayMs = date.getTime() - now;
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Perform an HTTP request with timeout and error handling
 *
 * @param req - HTTP request configuration
 * @returns Parsed JSON (responseType "json", the default) or body text
 * @throws {HttpError} On non-2xx status codes
 * @throws {SyntaxError} When a JSON response body does not parse
 * @throws {Error} AbortError on timeout or external cancellation, TypeError on network failure
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);
  const responseType = req.responseType ?? "json";

  req.signal?.throwIfAborted();

  // Timeout and external cancellation share one controller
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onExternalAbort = (): void => controller.abort();
  req.signal?.addEventListener("abort", onExternalAbort, { once: true });

  try {
    // Build headers - defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined || responseType === "json") {
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

    const response = await fetch(url, options);

    // Check for HTTP errors (non-2xx)
    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet,
        headers: response.headers,
      });
    }

    const text = await response.text();

    if (responseType === "text") {
      return text;
    }

    // Handle 204 No Content / empty body
    if (!text) {
      return undefined;
    }

    return JSON.parse(text);
  } finally {
    clearTimeout(timeoutId);
    req.signal?.removeEventListener("abort", onExternalAbort);
  }
}
