/**
 * Classified-board HTML parsing
 *
 * Onliner and Deal.by render listings as repeated cards. Both are read
 * with the same routine, parameterized by CSS selectors.
 */

import { load } from "cheerio";
import { absoluteUrl } from "./requests";

export type ClassifiedSelectors = {
  item: string;
  title: string;
  description: string;
  location?: string;
};

export type ClassifiedCard = {
  title?: string;
  description: string;
  location?: string;
  link?: string;
};

function textOrUndefined(value: string): string | undefined {
  const trimmed = value.replace(/\s+/g, " ").trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse listing cards from a board page
 *
 * Cards without a title element are kept with `title` undefined; the
 * normalizer counts them as skipped.
 *
 * @param html - Page HTML
 * @param selectors - Card and field selectors
 * @param baseUrl - Origin used to absolutize relative links
 */
export function parseClassifiedCards(
  html: string,
  selectors: ClassifiedSelectors,
  baseUrl: string,
): ClassifiedCard[] {
  const $ = load(html);
  const cards: ClassifiedCard[] = [];

  $(selectors.item).each((_, element) => {
    const card = $(element);
    const titleElement = card.find(selectors.title).first();
    const href = card.find("a[href]").first().attr("href");

    cards.push({
      title: titleElement.length > 0 ? textOrUndefined(titleElement.text()) : undefined,
      description: textOrUndefined(card.find(selectors.description).first().text()) ?? "",
      location: selectors.location
        ? textOrUndefined(card.find(selectors.location).first().text())
        : undefined,
      link: absoluteUrl(href, baseUrl),
    });
  });

  return cards;
}
