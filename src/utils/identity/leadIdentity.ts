/**
 * Lead identity utilities: name normalization and identity keys
 *
 * The identity key is a pure function of a lead's content:
 * - `phone:<smallest canonical phone>` when the lead has phones
 * - otherwise sha256 of normalized name + city + category
 */

import { createHash } from "crypto";
import type { LeadCategory } from "@/types";
import { LEGAL_FORM_PATTERN } from "@/constants";
import { normalizeText } from "@/utils/text/textNormalization";

export const PHONE_KEY_PREFIX = "phone:";

export type IdentityInput = {
  name: string;
  city?: string;
  category: LeadCategory;
  phones: string[];
};

/**
 * Normalize a business name for identity matching
 *
 * Rules:
 * - lowercase, diacritics stripped
 * - punctuation and quotes removed, whitespace collapsed
 * - a leading legal-form token dropped (ООО, ЧУП, ИП, ...)
 *
 * @example
 * normalizeLeadName('ООО "АвтоСервис Премиум"') // "автосервис премиум"
 */
export function normalizeLeadName(raw: string): string {
  const normalized = normalizeText(raw);
  const withoutLegalForm = normalized.replace(LEGAL_FORM_PATTERN, "");
  // Keep the legal form when it is the whole name
  return withoutLegalForm.length > 0 ? withoutLegalForm : normalized;
}

/**
 * Hash of normalized name + city + category
 */
export function nameKey(name: string, city: string | undefined, category: LeadCategory): string {
  const material = [normalizeLeadName(name), normalizeText(city ?? ""), category].join("|");
  return createHash("sha256").update(material, "utf8").digest("hex");
}

/**
 * Identity key built from a canonical phone
 */
export function phoneKey(phone: string): string {
  return `${PHONE_KEY_PREFIX}${phone}`;
}

/**
 * Compute the identity key of a lead or partial lead
 *
 * Phone-bearing records key on their smallest canonical phone, which
 * is a stronger signal than the name.
 */
export function computeIdentityKey(input: IdentityInput): string {
  if (input.phones.length > 0) {
    const smallest = [...input.phones].sort()[0];
    return phoneKey(smallest);
  }
  return nameKey(input.name, input.city, input.category);
}

/**
 * Token-set Jaccard similarity of two names, in [0, 1]
 */
export function nameSimilarity(a: string, b: string): number {
  const left = new Set(normalizeLeadName(a).split(" ").filter(Boolean));
  const right = new Set(normalizeLeadName(b).split(" ").filter(Boolean));
  if (left.size === 0 && right.size === 0) {
    return 1;
  }
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}
