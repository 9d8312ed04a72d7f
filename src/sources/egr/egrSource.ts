/**
 * EGR source: state registry adapter
 *
 * Searches the registry by each OKED activity code mapped to the niche;
 * when the codes find nothing, falls back to name keyword searches.
 * Registrations are de-duplicated by UNP within one fetch.
 */

import type { SourceAdapter } from "@/interfaces";
import type {
  CatalogRuntime,
  EgrRawListing,
  FetchContext,
  FetchRequest,
  HttpRequestFn,
  Niche,
  RawListing,
  SourceId,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { EGR_BASE_URL, EGR_MAX_PAGE_SIZE, SOURCE_TRUST } from "@/constants";
import { findCity } from "@/catalog/loader";
import { requestJson } from "@/sources/shared/requests";
import { egrResponseSchema, type EgrItem } from "./schemas";
import * as logger from "@/logger";

export interface EgrSourceConfig {
  catalog: CatalogRuntime;
  httpRequest?: HttpRequestFn;
  now?: () => Date;
}

/**
 * Map one registry record to a raw listing
 */
export function mapEgrItem(
  item: EgrItem,
  hints: { category: Niche; city: string; fetchedAt: string },
): EgrRawListing {
  const oked = item.oked ?? [];

  return {
    source: "egr",
    categoryHint: hints.category,
    cityHint: hints.city,
    fetchedAt: hints.fetchedAt,
    sourceRecordId: item.vnp ?? item.ngrn,
    name: item.vnaim ?? item.naimk,
    address: item.address ?? item.vpadres,
    region: item.voblast ?? item.region,
    unp: item.vnp ?? item.ngrn,
    legalForm: item.vorgf,
    okedCodes: typeof oked === "string" ? [oked] : oked,
  };
}

type SearchFilter = { oked: string } | { name: string };

type SearchState = {
  seen: Set<string>;
  yielded: number;
};

export class EgrSource implements SourceAdapter {
  readonly id: SourceId = "egr";
  readonly trust = SOURCE_TRUST.egr;

  private readonly catalog: CatalogRuntime;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => Date;

  constructor(config: EgrSourceConfig) {
    this.catalog = config.catalog;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.now = config.now ?? (() => new Date());
  }

  async *fetch(request: FetchRequest, context: FetchContext): AsyncIterable<RawListing> {
    const city = findCity(this.catalog, request.city);
    if (!city) {
      logger.debug("EGR: unknown city, skipping", { city: request.city });
      return;
    }

    const { okedCodes, keywords } = this.catalog.providers.egr;
    const state: SearchState = { seen: new Set(), yielded: 0 };

    yield* this.search(
      okedCodes[request.category].map((oked) => ({ oked })),
      request,
      city.name,
      context,
      state,
    );

    if (state.yielded === 0) {
      logger.debug("EGR: no registrations by activity code, trying name keywords", {
        category: request.category,
        city: city.name,
      });
      yield* this.search(
        keywords[request.category].map((name) => ({ name })),
        request,
        city.name,
        context,
        state,
      );
    }
  }

  private async *search(
    filters: SearchFilter[],
    request: FetchRequest,
    cityName: string,
    context: FetchContext,
    state: SearchState,
  ): AsyncGenerator<EgrRawListing> {
    for (const filter of filters) {
      if (state.yielded >= request.limit) return;
      await context.throttle();

      const response = await requestJson(
        this.httpRequest,
        {
          url: `${EGR_BASE_URL}/registry/search`,
          query: {
            ...filter,
            region: cityName,
            limit: Math.min(EGR_MAX_PAGE_SIZE, request.limit - state.yielded),
            offset: 0,
          },
          signal: context.signal,
        },
        egrResponseSchema,
      );

      const fetchedAt = this.now().toISOString();
      for (const item of response.data.items) {
        if (state.yielded >= request.limit) return;
        const listing = mapEgrItem(item, { category: request.category, city: cityName, fetchedAt });
        const dedupeKey = listing.unp ?? listing.name ?? "";
        if (state.seen.has(dedupeKey)) continue;
        state.seen.add(dedupeKey);
        state.yielded++;
        yield listing;
      }
    }
  }
}
