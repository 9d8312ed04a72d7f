/**
 * Category mapping
 *
 * Resolves a lead category from the work unit's niche hint, falling back
 * to keyword matching over provider category names and free text.
 */

import type { CatalogRuntime, LeadCategory, Niche } from "@/types";
import { isNiche } from "@/utils/catalogValidation";
import { containsKeyword, normalizeText } from "@/utils/text/textNormalization";

/**
 * Map free text onto a niche via the catalog keyword lists
 *
 * Keywords are tried longest first, so "ремонт авто" beats "ремонт".
 *
 * @returns The matched niche, or undefined when no keyword occurs
 */
export function mapTextToNiche(catalog: CatalogRuntime, text: string): Niche | undefined {
  const normalized = normalizeText(text);
  if (normalized.length === 0) return undefined;

  for (const { keyword, niche } of catalog.nicheKeywords) {
    if (containsKeyword(normalized, keyword)) {
      return niche;
    }
  }
  return undefined;
}

/**
 * Resolve a lead category
 *
 * Order: the hint when it names a niche, then each provider category text
 * in order, then "unknown".
 */
export function resolveCategory(
  catalog: CatalogRuntime,
  hint: string | undefined,
  providerCategories: string[] = [],
): LeadCategory {
  if (isNiche(hint)) {
    return hint;
  }
  for (const text of providerCategories) {
    const niche = mapTextToNiche(catalog, text);
    if (niche) return niche;
  }
  return "unknown";
}
