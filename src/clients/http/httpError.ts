/**
 * HttpError class: structured error for HTTP failures
 *
 * Separated from types, which hold shapes only.
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Coarse status class consumed by the source error taxonomy
 */
export type HttpStatusClass = "auth" | "rate_limit" | "unavailable" | "client";

/**
 * Structured error class for HTTP failures
 * Contains status, URL, and optional response body snippet for debugging
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }

  /**
   * 401/403 -> auth, 429 -> rate_limit, 408 and 5xx -> unavailable,
   * any other non-2xx -> client
   */
  get statusClass(): HttpStatusClass {
    if (this.status === 401 || this.status === 403) return "auth";
    if (this.status === 429) return "rate_limit";
    if (this.status === 408 || this.status >= 500) return "unavailable";
    return "client";
  }

  get retryAfterHeader(): string | null {
    return this.headers?.get("retry-after") ?? null;
  }
}
