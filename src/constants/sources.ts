/**
 * Source adapter constants: endpoints, trust tiers, page sizes
 */

import type { SourceId, SourceTrust } from "@/types";

/**
 * Trust tier per provider; feeds field priority in the merge engine
 */
export const SOURCE_TRUST: Record<SourceId, SourceTrust> = {
  twogis: "structured",
  yandex_maps: "structured",
  egr: "structured",
  onliner: "scraped",
  deal: "scraped",
  instagram: "scraped",
};

export const TWOGIS_BASE_URL = "https://catalog.api.2gis.com/3.0";
export const TWOGIS_ITEMS_FIELDS =
  "items.reviews,items.point,items.contact_groups,items.address,items.rubrics";
export const TWOGIS_MAX_PAGE_SIZE = 50;

export const YANDEX_BASE_URL = "https://search-maps.yandex.ru/v1/";
/** Search area span around the city centre ("lon,lat" degrees) */
export const YANDEX_SEARCH_SPAN = "0.5,0.5";
export const YANDEX_MAX_RESULTS = 50;

export const EGR_BASE_URL = "https://egr.gov.by/api/v2";
export const EGR_MAX_PAGE_SIZE = 50;

export const ONLINER_BASE_URL = "https://baraholka.onliner.by";
export const ONLINER_ITEM_SELECTOR = ".classified__item, .board__item";

export const DEAL_BASE_URL = "https://deal.by";
export const DEAL_ITEM_SELECTOR = ".listing__item, .classified, .advert-item";

export const INSTAGRAM_BASE_URL = "https://www.instagram.com";
/** Captions are cut to this length before normalization */
export const INSTAGRAM_CAPTION_MAX_LENGTH = 500;
