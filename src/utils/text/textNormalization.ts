/**
 * Text normalization and tokenization utilities
 *
 * Deterministic text processing shared by identity hashing, catalog
 * compilation and keyword-based category mapping. No stemming, no
 * stopword removal: catalog keywords carry their own stems
 * ("грузоперевозк").
 */

import { NAME_PUNCTUATION_PATTERN } from "@/constants";
import { removeDiacritics } from "@/utils/text/removeDiacritics";

/**
 * Normalizes free text for comparison.
 *
 * Steps (applied in order):
 * 1. Lowercase
 * 2. Remove diacritics (ё → е, й → и, é → e)
 * 3. Replace punctuation and symbols with spaces
 * 4. Collapse whitespace and trim
 *
 * @example
 * normalizeText("  «Авто-Сервис»  Премиум! ") // "авто сервис премиум"
 */
export function normalizeText(text: string): string {
  return removeDiacritics(text.toLowerCase())
    .replace(NAME_PUNCTUATION_PATTERN, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Substring keyword test over already-normalized text
 */
export function containsKeyword(normalizedText: string, normalizedKeyword: string): boolean {
  return normalizedKeyword.length > 0 && normalizedText.includes(normalizedKeyword);
}
