/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "HEAD";

/**
 * How the response body is read
 * - json: parsed JSON (a non-JSON body is rejected)
 * - text: raw body text (HTML pages)
 */
export type HttpResponseType = "json" | "text";

export type HttpQueryValue = string | number | boolean | Array<string | number | boolean>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, HttpQueryValue>;
  json?: unknown;
  /** Defaults to "json" */
  responseType?: HttpResponseType;
  timeoutMs?: number;
  /** External cancellation, combined with the request timeout */
  signal?: AbortSignal;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function type, injectable for tests
 *
 * Resolves to the parsed JSON value or the body text, depending on
 * responseType. Callers validate the shape.
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<unknown>;
