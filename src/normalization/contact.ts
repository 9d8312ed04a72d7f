/**
 * Contact field normalization: email, website, rating, review count
 */

const EMAIL_PATTERN = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/i;

const URL_PATTERN = /https?:\/\/[^\s"'<>()]+/gi;

/**
 * Hosts that are social profiles or the providers themselves, never a
 * business website
 */
const NON_WEBSITE_HOSTS = [
  "instagram.com",
  "facebook.com",
  "fb.com",
  "vk.com",
  "t.me",
  "telegram.me",
  "2gis.by",
  "2gis.ru",
  "yandex.by",
  "yandex.ru",
  "onliner.by",
  "deal.by",
];

/**
 * First email address in the text, lowercased
 */
export function extractEmail(text: string | undefined): string | undefined {
  if (!text) return undefined;
  const match = EMAIL_PATTERN.exec(text);
  return match ? match[0].toLowerCase() : undefined;
}

/**
 * Normalize an http(s) URL to a business website
 *
 * Adds https:// to bare hosts ("example.by"). Social and provider hosts
 * are rejected.
 *
 * @example
 * normalizeWebsite("Example.BY/contacts") // "https://example.by/contacts"
 * normalizeWebsite("https://vk.com/shop") // undefined
 */
export function normalizeWebsite(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const trimmed = raw.trim();
  if (trimmed.length === 0) return undefined;

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    return undefined;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return undefined;
  }

  const host = parsed.hostname.toLowerCase().replace(/^www\./, "");
  if (!host.includes(".")) {
    return undefined;
  }
  if (NON_WEBSITE_HOSTS.some((blocked) => host === blocked || host.endsWith(`.${blocked}`))) {
    return undefined;
  }

  return parsed.toString();
}

/**
 * First website URL found in free text
 */
export function extractWebsite(text: string | undefined): string | undefined {
  if (!text) return undefined;
  for (const match of text.matchAll(URL_PATTERN)) {
    const website = normalizeWebsite(match[0]);
    if (website) return website;
  }
  return undefined;
}

/**
 * Rating in [0, 5]; anything else is omitted
 */
export function normalizeRating(value: unknown): number | undefined {
  const rating = typeof value === "string" ? Number(value.replace(",", ".")) : value;
  if (typeof rating !== "number" || !Number.isFinite(rating)) {
    return undefined;
  }
  return rating >= 0 && rating <= 5 ? rating : undefined;
}

/**
 * Non-negative integer review count; anything else is omitted
 */
export function normalizeReviewCount(value: unknown): number | undefined {
  const count = typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value) : value;
  if (typeof count !== "number" || !Number.isInteger(count) || count < 0) {
    return undefined;
  }
  return count;
}
