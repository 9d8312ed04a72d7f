/**
 * HTTP client public API
 */

export { httpRequest, buildUrl, parseRetryAfter } from "./httpClient";
export { HttpError } from "./httpError";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpResponseType,
  HttpErrorDetails,
} from "@/types";
