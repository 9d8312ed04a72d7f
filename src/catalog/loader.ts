/**
 * Catalog loading and compilation
 *
 * Loads the catalog JSON, validates it, and compiles it into a runtime
 * structure with lookup maps for city resolution and keyword matching.
 */

import * as fs from "fs";
import * as path from "path";
import type { CatalogRaw, CatalogRuntime, CityRaw, Niche } from "@/types";
import { validateCatalogRaw } from "@/utils/catalogValidation";
import { normalizeText } from "@/utils/text/textNormalization";
import { CATALOG_PATH } from "@/constants";

/**
 * Error thrown when catalog compilation fails.
 */
export class CatalogCompilationError extends Error {
  constructor(message: string) {
    super(`Catalog compilation failed: ${message}`);
    this.name = "CatalogCompilationError";
  }
}

/**
 * Compiles a validated raw catalog into runtime form.
 *
 * Compilation steps:
 * 1. Index every city by its normalized name and aliases
 * 2. Normalize niche keywords, drop duplicates, sort longest first
 *
 * @param raw - Validated raw catalog
 * @returns Compiled runtime catalog
 * @throws {CatalogCompilationError} If a keyword or alias normalizes to nothing
 */
export function compileCatalog(raw: CatalogRaw): CatalogRuntime {
  const cityByAlias = new Map<string, CityRaw>();
  for (const city of raw.cities) {
    for (const alias of [city.name, ...city.aliases]) {
      const key = normalizeText(alias);
      if (key.length === 0) {
        throw new CatalogCompilationError(
          `City "${city.name}" has alias "${alias}" that normalizes to nothing`,
        );
      }
      cityByAlias.set(key, city);
    }
  }

  const seen = new Set<string>();
  const nicheKeywords: Array<{ keyword: string; niche: Niche }> = [];
  for (const niche of raw.niches) {
    for (const keyword of niche.keywords) {
      const normalized = normalizeText(keyword);
      if (normalized.length === 0) {
        throw new CatalogCompilationError(
          `Niche "${niche.id}" has keyword "${keyword}" that normalizes to nothing`,
        );
      }
      // First niche declaring a keyword owns it
      if (!seen.has(normalized)) {
        seen.add(normalized);
        nicheKeywords.push({ keyword: normalized, niche: niche.id });
      }
    }
  }

  // Longest keyword wins when several match the same text
  nicheKeywords.sort((a, b) => b.keyword.length - a.keyword.length);

  return { ...raw, cityByAlias, nicheKeywords };
}

/**
 * Finds a catalog city by display name or alias (case and diacritics
 * insensitive).
 */
export function findCity(catalog: CatalogRuntime, name: string): CityRaw | undefined {
  return catalog.cityByAlias.get(normalizeText(name));
}

/**
 * Loads and compiles the catalog.
 *
 * The function is fail-fast: any validation or compilation error will throw.
 *
 * @param catalogPath - Defaults to data/catalog.json under the working directory
 * @returns Compiled catalog
 * @throws {SyntaxError} If JSON is malformed
 * @throws {CatalogValidationError} If validation fails
 * @throws {CatalogCompilationError} If compilation fails
 *
 * @example
 * const catalog = loadCatalog();
 * console.log(`Loaded ${catalog.cities.length} cities`);
 */
export function loadCatalog(catalogPath: string = path.resolve(process.cwd(), CATALOG_PATH)): CatalogRuntime {
  const jsonContent = fs.readFileSync(catalogPath, "utf-8");
  const raw: unknown = JSON.parse(jsonContent);
  return compileCatalog(validateCatalogRaw(raw));
}
