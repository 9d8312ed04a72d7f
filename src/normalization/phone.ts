/**
 * Phone normalization (Belarus numbering plan)
 *
 * Canonical form: +375XXXXXXXXX (country code, two-digit operator or area
 * prefix, seven digits).
 */

import { COUNTRY_CODE, PHONE_TEXT_PATTERNS, VALID_PREFIXES } from "@/constants";

/**
 * Canonicalize one phone string
 *
 * - 375XXXXXXXXX (12 digits) -> +375XXXXXXXXX
 * - 80XXXXXXXXX (11 digits, domestic trunk prefix) -> +375 + last 9
 * - XXXXXXXXX (9 digits) -> +375 + digits
 *
 * @returns Canonical phone, or null when the digits fit none of the forms
 *          or the prefix is not a Belarus operator/area code
 *
 * @example
 * canonicalizePhone("+375 (29) 123-45-67") // "+375291234567"
 * canonicalizePhone("8 029 123 45 67")     // "+375291234567"
 * canonicalizePhone("123")                 // null
 */
export function canonicalizePhone(raw: string): string | null {
  const digits = raw.replace(/\D/g, "");

  let national: string | null = null;
  if (digits.length === 12 && digits.startsWith(COUNTRY_CODE)) {
    national = digits.slice(3);
  } else if (digits.length === 11 && digits.startsWith("80")) {
    national = digits.slice(2);
  } else if (digits.length === 9) {
    national = digits;
  }

  if (national === null || !VALID_PREFIXES.has(national.slice(0, 2))) {
    return null;
  }

  return `+${COUNTRY_CODE}${national}`;
}

/**
 * Canonicalize a list of phone strings; invalid entries are dropped
 *
 * @returns Sorted canonical phones without duplicates
 */
export function canonicalizePhones(raw: Iterable<string>): string[] {
  const phones = new Set<string>();
  for (const value of raw) {
    const phone = canonicalizePhone(value);
    if (phone) phones.add(phone);
  }
  return [...phones].sort();
}

/**
 * Find phone numbers in free text (descriptions, bios, captions)
 *
 * @returns Sorted canonical phones without duplicates
 */
export function extractPhones(text: string): string[] {
  const candidates: string[] = [];
  for (const pattern of PHONE_TEXT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      candidates.push(match[0]);
    }
  }
  return canonicalizePhones(candidates);
}
