/**
 * 2GIS source: catalog API adapter
 *
 * Searches the items endpoint once per rubric of the niche within the
 * city's region, paging until the limit is met or a page comes back short.
 * Items located outside the catalog's Belarus cities are dropped.
 */

import type { SourceAdapter } from "@/interfaces";
import type {
  CatalogRuntime,
  FetchContext,
  FetchRequest,
  HttpRequestFn,
  RawListing,
  SourceId,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { SOURCE_TRUST, TWOGIS_BASE_URL, TWOGIS_ITEMS_FIELDS, TWOGIS_MAX_PAGE_SIZE } from "@/constants";
import { AuthRejected, MalformedResponse, RateLimited, SourceUnavailable } from "@/errors";
import { findCity } from "@/catalog/loader";
import { requestJson } from "@/sources/shared/requests";
import { mapTwoGisItem } from "./mappers";
import { twoGisResponseSchema, type TwoGisResponse } from "./schemas";
import * as logger from "@/logger";

export interface TwoGisSourceConfig {
  apiKey: string;
  catalog: CatalogRuntime;
  /**
   * Optional HTTP request function (for testing/mocking)
   */
  httpRequest?: HttpRequestFn;
  now?: () => Date;
}

/**
 * 2GIS reports some failures inside a 200 body; map them like HTTP codes.
 * meta.code 404 means "nothing found".
 */
function checkMeta(response: TwoGisResponse): void {
  const { code, error } = response.meta;
  if (code === 200 || code === 404) return;

  const message = `2GIS API error ${code}: ${error?.message ?? error?.type ?? "unknown"}`;
  if (code === 401 || code === 403) throw new AuthRejected(message, { sourceId: "twogis" });
  if (code === 429) throw new RateLimited(message, { sourceId: "twogis" });
  if (code >= 500) throw new SourceUnavailable(message, { sourceId: "twogis" });
  throw new MalformedResponse(message, { sourceId: "twogis" });
}

export class TwoGisSource implements SourceAdapter {
  readonly id: SourceId = "twogis";
  readonly trust = SOURCE_TRUST.twogis;

  private readonly apiKey: string;
  private readonly catalog: CatalogRuntime;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => Date;

  constructor(config: TwoGisSourceConfig) {
    this.apiKey = config.apiKey;
    this.catalog = config.catalog;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.now = config.now ?? (() => new Date());
  }

  async *fetch(request: FetchRequest, context: FetchContext): AsyncIterable<RawListing> {
    const city = findCity(this.catalog, request.city);
    if (!city?.twogisRegionId) {
      logger.debug("2GIS: city has no region id, skipping", { city: request.city });
      return;
    }

    const rubrics = this.catalog.providers.twogis.rubrics[request.category];
    const seen = new Set<string>();
    let yielded = 0;

    for (const rubric of rubrics) {
      let page = 1;

      while (yielded < request.limit) {
        const pageSize = Math.min(TWOGIS_MAX_PAGE_SIZE, request.limit - yielded);
        await context.throttle();

        const response = await requestJson(
          this.httpRequest,
          {
            url: `${TWOGIS_BASE_URL}/items`,
            query: {
              q: rubric,
              region_id: city.twogisRegionId,
              page,
              page_size: pageSize,
              fields: TWOGIS_ITEMS_FIELDS,
              key: this.apiKey,
            },
            signal: context.signal,
          },
          twoGisResponseSchema,
        );
        checkMeta(response);

        const items = response.result?.items ?? [];
        const fetchedAt = this.now().toISOString();

        for (const item of items) {
          if (seen.has(item.id) || yielded >= request.limit) continue;
          seen.add(item.id);

          const listing = mapTwoGisItem(item, {
            category: request.category,
            city: city.name,
            fetchedAt,
          });
          if (!listing.city || !findCity(this.catalog, listing.city)) {
            continue;
          }

          yielded++;
          yield listing;
        }

        if (items.length < pageSize) break;
        page++;
      }

      if (yielded >= request.limit) break;
    }

    logger.debug("2GIS fetch finished", {
      category: request.category,
      city: request.city,
      listings: yielded,
    });
  }
}
