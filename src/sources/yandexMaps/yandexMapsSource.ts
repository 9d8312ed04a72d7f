/**
 * Yandex Maps source: org-search API adapter
 *
 * One search per niche keyword around the city centre; organizations are
 * de-duplicated by their Yandex id within one fetch.
 */

import type { SourceAdapter } from "@/interfaces";
import type {
  CatalogRuntime,
  FetchContext,
  FetchRequest,
  HttpRequestFn,
  Niche,
  RawListing,
  SourceId,
  YandexRawListing,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { SOURCE_TRUST, YANDEX_BASE_URL, YANDEX_MAX_RESULTS, YANDEX_SEARCH_SPAN } from "@/constants";
import { findCity } from "@/catalog/loader";
import { requestJson } from "@/sources/shared/requests";
import { yandexResponseSchema, type YandexFeature } from "./schemas";
import * as logger from "@/logger";

export interface YandexMapsSourceConfig {
  apiKey: string;
  catalog: CatalogRuntime;
  httpRequest?: HttpRequestFn;
  now?: () => Date;
}

/**
 * Map one GeoJSON feature to a raw listing
 */
export function mapYandexFeature(
  feature: YandexFeature,
  hints: { category: Niche; city: string; query: string; fetchedAt: string },
): YandexRawListing {
  const meta = feature.properties.CompanyMetaData;

  return {
    source: "yandex_maps",
    categoryHint: hints.category,
    cityHint: hints.city,
    fetchedAt: hints.fetchedAt,
    sourceRecordId: meta?.id,
    name: feature.properties.name ?? meta?.name,
    address: meta?.address ?? feature.properties.description,
    coordinates: feature.geometry?.coordinates,
    phones: (meta?.Phones ?? []).flatMap((phone) => (phone.formatted ? [phone.formatted] : [])),
    url: meta?.url,
    categories: (meta?.Categories ?? []).flatMap((category) => (category.name ? [category.name] : [])),
    query: hints.query,
  };
}

export class YandexMapsSource implements SourceAdapter {
  readonly id: SourceId = "yandex_maps";
  readonly trust = SOURCE_TRUST.yandex_maps;

  private readonly apiKey: string;
  private readonly catalog: CatalogRuntime;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => Date;

  constructor(config: YandexMapsSourceConfig) {
    this.apiKey = config.apiKey;
    this.catalog = config.catalog;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.now = config.now ?? (() => new Date());
  }

  async *fetch(request: FetchRequest, context: FetchContext): AsyncIterable<RawListing> {
    const city = findCity(this.catalog, request.city);
    if (!city?.yandexCenter) {
      logger.debug("Yandex Maps: city has no search centre, skipping", { city: request.city });
      return;
    }

    const [lat, lon] = city.yandexCenter;
    const keywords = this.catalog.providers.yandex_maps.keywords[request.category];
    const seen = new Set<string>();
    let yielded = 0;

    for (const keyword of keywords) {
      if (yielded >= request.limit) break;
      await context.throttle();

      const response = await requestJson(
        this.httpRequest,
        {
          url: YANDEX_BASE_URL,
          query: {
            apikey: this.apiKey,
            text: keyword,
            ll: `${lon},${lat}`,
            spn: YANDEX_SEARCH_SPAN,
            lang: "ru_RU",
            type: "biz",
            results: Math.min(YANDEX_MAX_RESULTS, request.limit - yielded),
          },
          signal: context.signal,
        },
        yandexResponseSchema,
      );

      const fetchedAt = this.now().toISOString();
      for (const feature of response.features) {
        if (yielded >= request.limit) break;

        const listing = mapYandexFeature(feature, {
          category: request.category,
          city: city.name,
          query: keyword,
          fetchedAt,
        });
        const dedupeKey = listing.sourceRecordId ?? `${listing.name ?? ""}|${listing.address ?? ""}`;
        if (seen.has(dedupeKey)) continue;
        seen.add(dedupeKey);

        yielded++;
        yield listing;
      }
    }
  }
}
