/**
 * Catalog type definitions
 *
 * The catalog is the static data describing niches, cities and how each
 * provider is searched for a niche. Loaded from data/catalog.json.
 */

import type { Niche } from "./lead";

export type NicheRaw = {
  id: Niche;
  nameRu: string;
  /** Keywords used to map free-text source categories onto this niche */
  keywords: string[];
};

export type CityRaw = {
  /** Display name used in config and on leads */
  name: string;
  /** Lowercase spellings that identify the city in free text */
  aliases: string[];
  twogisRegionId?: string;
  /** [lat, lon] search centre for the Yandex org-search API */
  yandexCenter?: [number, number];
  dealRegion?: string;
};

export type ProvidersRaw = {
  twogis: { rubrics: Record<Niche, string[]> };
  yandex_maps: { keywords: Record<Niche, string[]> };
  egr: {
    okedCodes: Record<Niche, string[]>;
    keywords: Record<Niche, string[]>;
  };
  onliner: {
    sectionUrls: Record<Niche, string>;
    keywords: Record<Niche, string[]>;
  };
  deal: { sections: Record<Niche, string> };
  instagram: { hashtags: Record<Niche, string[]> };
};

export type CatalogRaw = {
  version: string;
  niches: NicheRaw[];
  cities: CityRaw[];
  providers: ProvidersRaw;
};

/**
 * Runtime catalog with lookup maps built once at load time
 */
export type CatalogRuntime = CatalogRaw & {
  /** alias (lowercase, diacritics stripped) -> city */
  cityByAlias: Map<string, CityRaw>;
  /** normalized keyword -> niche, longest keywords first */
  nicheKeywords: Array<{ keyword: string; niche: Niche }>;
};
