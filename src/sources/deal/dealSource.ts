/**
 * Deal.by source: classifieds adapter
 *
 * Reads one section page per (niche, region). Cities without a Deal.by
 * region slug yield nothing.
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
import { DEAL_BASE_URL, DEAL_ITEM_SELECTOR, SOURCE_TRUST } from "@/constants";
import { findCity } from "@/catalog/loader";
import { parseClassifiedCards } from "@/sources/shared/classifiedParsing";
import { requestHtml } from "@/sources/shared/requests";

export interface DealSourceConfig {
  catalog: CatalogRuntime;
  httpRequest?: HttpRequestFn;
  now?: () => Date;
}

const DEAL_SELECTORS = {
  item: DEAL_ITEM_SELECTOR,
  title: ".listing__title, h3, .title",
  description: ".listing__text, .description, .text",
};

export class DealSource implements SourceAdapter {
  readonly id: SourceId = "deal";
  readonly trust = SOURCE_TRUST.deal;

  private readonly catalog: CatalogRuntime;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => Date;

  constructor(config: DealSourceConfig) {
    this.catalog = config.catalog;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.now = config.now ?? (() => new Date());
  }

  async *fetch(request: FetchRequest, context: FetchContext): AsyncIterable<RawListing> {
    const city = findCity(this.catalog, request.city);
    if (!city?.dealRegion) {
      return;
    }

    const section = this.catalog.providers.deal.sections[request.category];
    await context.throttle();

    const html = await requestHtml(this.httpRequest, {
      url: `${DEAL_BASE_URL}/${city.dealRegion}/${section}`,
      signal: context.signal,
    });

    const fetchedAt = this.now().toISOString();
    const cards = parseClassifiedCards(html, DEAL_SELECTORS, DEAL_BASE_URL).slice(0, request.limit);

    for (const card of cards) {
      const listing: ClassifiedRawListing = {
        source: "deal",
        categoryHint: request.category,
        cityHint: city.name,
        fetchedAt,
        sourceUrl: card.link,
        title: card.title,
        description: card.description,
        location: city.name,
        link: card.link,
      };
      yield listing;
    }
  }
}
