/**
 * Request helpers shared by the adapters
 *
 * JSON answers are validated with zod before any field is read; a shape
 * mismatch surfaces as a ZodError, which classifySourceError maps to
 * MalformedResponse.
 */

import type { z } from "zod";
import type { HttpRequest, HttpRequestFn } from "@/types";
import { DEFAULT_HTML_HEADERS } from "@/constants";
import { MalformedResponse } from "@/errors";

type GetRequest = Omit<HttpRequest, "method" | "responseType">;

/**
 * GET a JSON document and validate it
 */
export async function requestJson<T>(
  http: HttpRequestFn,
  req: GetRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const body = await http({ ...req, method: "GET", responseType: "json" });
  return schema.parse(body);
}

/**
 * GET an HTML page as text
 */
export async function requestHtml(http: HttpRequestFn, req: GetRequest): Promise<string> {
  const body = await http({
    ...req,
    method: "GET",
    responseType: "text",
    headers: { ...DEFAULT_HTML_HEADERS, ...req.headers },
  });
  if (typeof body !== "string") {
    throw new MalformedResponse(`Expected an HTML document from ${req.url}`);
  }
  return body;
}

/**
 * Resolve a possibly relative link against the site origin
 */
export function absoluteUrl(href: string | undefined, baseUrl: string): string | undefined {
  if (!href) return undefined;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}
