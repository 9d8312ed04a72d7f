/**
 * City resolution against the catalog's city table
 */

import type { CatalogRuntime, CityRaw } from "@/types";
import { normalizeText } from "@/utils/text/textNormalization";

/**
 * Find the first catalog city mentioned in free text
 *
 * Matches whole words only, so "брестская" does not read as "брест".
 */
export function findCityInText(catalog: CatalogRuntime, text: string | undefined): CityRaw | undefined {
  if (!text) return undefined;
  const padded = ` ${normalizeText(text)} `;
  if (padded.trim().length === 0) return undefined;

  for (const [alias, city] of catalog.cityByAlias) {
    if (padded.includes(` ${alias} `)) {
      return city;
    }
  }
  return undefined;
}

/**
 * Resolve the city of a listing
 *
 * A known city in the provider's text maps to its catalog display name.
 * Anything else (street addresses, regions, unknown places) falls back to
 * the work unit's city.
 */
export function resolveCity(
  catalog: CatalogRuntime,
  providerText: string | undefined,
  cityHint: string,
): string {
  const known = findCityInText(catalog, providerText);
  if (known) return known.name;

  return findCityInText(catalog, cityHint)?.name ?? cityHint;
}
