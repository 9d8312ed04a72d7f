/**
 * Drains a source adapter for one (category, city) request
 */

import type { SourceAdapter } from "@/interfaces";
import type { FetchRequest, RawListing } from "@/types";

export const FETCHED_AT = new Date("2026-01-01T00:00:00.000Z");

export async function collectListings(
  adapter: SourceAdapter,
  request: FetchRequest,
  signal: AbortSignal = new AbortController().signal,
): Promise<RawListing[]> {
  const listings: RawListing[] = [];
  for await (const listing of adapter.fetch(request, {
    signal,
    throttle: async () => {},
  })) {
    listings.push(listing);
  }
  return listings;
}
