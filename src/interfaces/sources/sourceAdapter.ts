/**
 * Source Adapter Interface
 *
 * Behavioral contract for every provider the aggregation pipeline reads.
 * The set of adapters is closed: one per SourceId.
 */

import type { FetchContext, FetchRequest, RawListing, SourceId, SourceTrust } from "@/types";

export interface SourceAdapter {
  /**
   * Provider identifier
   */
  readonly id: SourceId;

  /**
   * Field-completeness tier used by the merge engine
   */
  readonly trust: SourceTrust;

  /**
   * Lazily fetch listings for one (category, city) pair
   *
   * The sequence is finite and yields at most `request.limit` listings.
   * An unknown city or an empty provider answer yields nothing.
   * Failures are thrown as SourceError subclasses (or values that
   * classifySourceError maps). The adapter calls `context.throttle()`
   * before every request and passes `context.signal` to it.
   */
  fetch(request: FetchRequest, context: FetchContext): AsyncIterable<RawListing>;
}
