/**
 * Phone normalization constants (Belarus numbering plan)
 */

export const COUNTRY_CODE = "375";

/**
 * Two-digit prefixes after the country code accepted as mobile operators
 * (25, 29, 33, 44) or regional area codes (15x, 16x, 17, 21x..24)
 */
export const VALID_PREFIXES = new Set([
  "15",
  "16",
  "17",
  "21",
  "22",
  "23",
  "24",
  "25",
  "29",
  "33",
  "44",
]);

/**
 * Candidate phone patterns searched in free text, most specific first
 */
export const PHONE_TEXT_PATTERNS: RegExp[] = [
  /\+?375[\s-]?\(?\d{2}\)?[\s-]?\d{3}[\s-]?\d{2}[\s-]?\d{2}/g,
  /\b8[\s-]?\(?0?\d{2}\)?[\s-]?\d{3}[\s-]?\d{2}[\s-]?\d{2}\b/g,
  /\(?\b\d{2}\)?[\s-]?\d{3}[\s-]?\d{2}[\s-]?\d{2}\b/g,
];
