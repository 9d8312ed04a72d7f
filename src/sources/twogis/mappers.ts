/**
 * 2GIS item -> raw listing mapping
 */

import type { Niche, TwoGisContact, TwoGisRawListing } from "@/types";
import type { TwoGisItem } from "./schemas";

function findDivision(item: TwoGisItem, type: string): string | undefined {
  const divisions = [...(item.adm_div ?? []), ...(item.address?.components ?? [])];
  return divisions.find((division) => division.type === type)?.name;
}

/**
 * Map one API item to a raw listing
 *
 * @param hints - Niche and city of the work unit, fetch timestamp
 */
export function mapTwoGisItem(
  item: TwoGisItem,
  hints: { category: Niche; city: string; fetchedAt: string },
): TwoGisRawListing {
  const contacts: TwoGisContact[] = (item.contact_groups ?? []).flatMap((group) =>
    group.contacts.map((contact) => ({
      type: contact.type,
      value: contact.value ?? contact.url,
      text: contact.text,
    })),
  );

  return {
    source: "twogis",
    categoryHint: hints.category,
    cityHint: hints.city,
    fetchedAt: hints.fetchedAt,
    sourceRecordId: item.id,
    sourceUrl: item.link,
    name: item.name,
    address: item.address_name ?? item.address?.name,
    city: findDivision(item, "city"),
    district: findDivision(item, "district"),
    lat: item.point?.lat,
    lon: item.point?.lon,
    contacts,
    rubrics: (item.rubrics ?? []).map((rubric) => rubric.name),
    rating: item.reviews?.general_rating ?? item.reviews?.rating,
    reviewCount: item.reviews?.general_review_count ?? item.reviews?.total,
  };
}
