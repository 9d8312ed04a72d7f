/**
 * Onliner source: baraholka classifieds adapter
 *
 * Searches the niche's board section once per keyword and reads the
 * listing cards. Cards whose location names a different catalog city are
 * dropped; cards without a location are kept.
 */

import type { SourceAdapter } from "@/interfaces";
import type {
  CatalogRuntime,
  ClassifiedRawListing,
  FetchContext,
  FetchRequest,
  HttpRequestFn,
  RawListing,
  SourceId,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { ONLINER_BASE_URL, ONLINER_ITEM_SELECTOR, SOURCE_TRUST } from "@/constants";
import { findCity } from "@/catalog/loader";
import { findCityInText } from "@/normalization/city";
import { parseClassifiedCards } from "@/sources/shared/classifiedParsing";
import { requestHtml } from "@/sources/shared/requests";
import * as logger from "@/logger";

export interface OnlinerSourceConfig {
  catalog: CatalogRuntime;
  httpRequest?: HttpRequestFn;
  now?: () => Date;
}

const ONLINER_SELECTORS = {
  item: ONLINER_ITEM_SELECTOR,
  title: ".classified__title, .board__title",
  description: ".classified__description, .board__description",
  location: ".classified__location, .board__location",
};

export class OnlinerSource implements SourceAdapter {
  readonly id: SourceId = "onliner";
  readonly trust = SOURCE_TRUST.onliner;

  private readonly catalog: CatalogRuntime;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => Date;

  constructor(config: OnlinerSourceConfig) {
    this.catalog = config.catalog;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.now = config.now ?? (() => new Date());
  }

  async *fetch(request: FetchRequest, context: FetchContext): AsyncIterable<RawListing> {
    const city = findCity(this.catalog, request.city);
    if (!city) {
      logger.debug("Onliner: unknown city, skipping", { city: request.city });
      return;
    }

    const sectionUrl = this.catalog.providers.onliner.sectionUrls[request.category];
    const keywords = this.catalog.providers.onliner.keywords[request.category];
    const seen = new Set<string>();
    let yielded = 0;

    for (const keyword of keywords) {
      if (yielded >= request.limit) break;
      await context.throttle();

      const html = await requestHtml(this.httpRequest, {
        url: sectionUrl,
        query: { query: keyword },
        signal: context.signal,
      });

      const fetchedAt = this.now().toISOString();
      for (const card of parseClassifiedCards(html, ONLINER_SELECTORS, ONLINER_BASE_URL)) {
        if (yielded >= request.limit) break;

        const cardCity = findCityInText(this.catalog, card.location);
        if (cardCity && cardCity.name !== city.name) continue;

        const dedupeKey = card.link ?? `${card.title ?? ""}|${card.description}`;
        if (seen.has(dedupeKey)) continue;
        seen.add(dedupeKey);

        const listing: ClassifiedRawListing = {
          source: "onliner",
          categoryHint: request.category,
          cityHint: city.name,
          fetchedAt,
          sourceUrl: card.link,
          title: card.title,
          description: card.description,
          location: card.location,
          link: card.link,
        };
        yielded++;
        yield listing;
      }
    }
  }
}
