/**
 * Catalog configuration constants
 */

/**
 * Path to the catalog JSON file (relative to the project root).
 *
 * Single source of truth for niches, cities and per-provider search terms.
 */
export const CATALOG_PATH = "data/catalog.json";
