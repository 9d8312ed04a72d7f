/**
 * Unit tests for category/city resolution and per-provider listing
 * normalization
 */

import { describe, it, expect } from "vitest";
import { loadCatalog } from "@/catalog/loader";
import { mapTextToNiche, resolveCategory } from "@/normalization/category";
import { findCityInText, resolveCity } from "@/normalization/city";
import { normalizeListing } from "@/normalization/normalizeListing";
import { nameKey } from "@/utils/identity/leadIdentity";
import type { RawListing, YandexRawListing } from "@/types";

const catalog = loadCatalog();
const FETCHED_AT = "2026-01-01T00:00:00.000Z";

describe("mapTextToNiche", () => {
  it("should map provider category text to a niche", () => {
    expect(mapTextToNiche(catalog, "Шиномонтаж и автомойка")).toBe(
      "auto_service",
    );
    expect(mapTextToNiche(catalog, "Ремонт квартир под ключ")).toBe(
      "handyman",
    );
    expect(mapTextToNiche(catalog, "Татуировка и пирсинг")).toBe("tattoo");
  });

  it("should return undefined when no keyword occurs", () => {
    expect(mapTextToNiche(catalog, "Кофейня")).toBeUndefined();
    expect(mapTextToNiche(catalog, "  ")).toBeUndefined();
  });
});

describe("resolveCategory", () => {
  it("should prefer the niche hint", () => {
    expect(resolveCategory(catalog, "legal", ["автосервис"])).toBe("legal");
  });

  it("should fall back to provider categories, then unknown", () => {
    expect(
      resolveCategory(catalog, undefined, ["Клининговая компания"]),
    ).toBe("cleaning");
    expect(resolveCategory(catalog, "bakery", [])).toBe("unknown");
  });
});

describe("city resolution", () => {
  it("should find a catalog city as a whole word", () => {
    expect(findCityInText(catalog, "г. Гомель, ул. Советская 1")?.name).toBe(
      "Гомель",
    );
    expect(findCityInText(catalog, "Брестская область")).toBeUndefined();
  });

  it("should map known cities to display names", () => {
    expect(resolveCity(catalog, "Minsk", "Гомель")).toBe("Минск");
    expect(resolveCity(catalog, "Минск, ул. Кальварийская, 25", "Гомель")).toBe("Минск");
  });

  it("should never take a street address or unknown place as the city", () => {
    expect(resolveCity(catalog, "ул. Кальварийская, 25", "Минск")).toBe("Минск");
    expect(resolveCity(catalog, "Лида", "Гродно")).toBe("Гродно");
  });

  it("should fall back to the work unit city", () => {
    expect(resolveCity(catalog, undefined, "минск")).toBe("Минск");
    expect(resolveCity(catalog, "  ", "Nowhere")).toBe("Nowhere");
  });
});

describe("normalizeListing", () => {
  it("should normalize a 2GIS listing with all contact kinds", () => {
    const listing: RawListing = {
      source: "twogis",
      categoryHint: "auto_service",
      cityHint: "Минск",
      fetchedAt: FETCHED_AT,
      sourceRecordId: "70000001",
      name: "  АвтоСервис «Премиум» ",
      address: "ул. Кальварийская, 25",
      city: "Минск",
      district: "Фрунзенский район",
      lat: 53.9,
      lon: 27.5,
      contacts: [
        { type: "phone", value: "+375291234567", text: "+375 (29) 123-45-67" },
        { type: "email", value: "INFO@premium.by" },
        { type: "website", value: "http://link.2gis.com/abc", text: "premium.by" },
        { type: "instagram", value: "https://instagram.com/autoservice_premium" },
      ],
      rubrics: ["Автосервисы"],
      rating: 4.7,
      reviewCount: 120,
    };

    expect(normalizeListing(listing, { catalog, seenOrder: 3 })).toEqual({
      kind: "lead",
      lead: {
        name: "АвтоСервис Премиум",
        category: "auto_service",
        address: "ул. Кальварийская, 25",
        city: "Минск",
        district: "Фрунзенский район",
        phones: ["+375291234567"],
        email: "info@premium.by",
        website: "https://premium.by/",
        social: { instagram: "@autoservice_premium" },
        rating: 4.7,
        reviewCount: 120,
        geo: { lat: 53.9, lon: 27.5 },
        source: "twogis",
        trust: "structured",
        seenOrder: 3,
        observedAt: FETCHED_AT,
      },
    });
  });

  it("should skip a listing without a usable name", () => {
    const listing: RawListing = {
      source: "twogis",
      categoryHint: "auto_service",
      cityHint: "Минск",
      fetchedAt: FETCHED_AT,
      name: " «» ",
      contacts: [],
      rubrics: [],
    };

    expect(normalizeListing(listing, { catalog, seenOrder: 0 })).toEqual({
      kind: "skip",
      reason: "missing_name",
    });
  });

  it("should read [lon, lat] coordinates and the city from a Yandex address", () => {
    const listing: RawListing = {
      source: "yandex_maps",
      categoryHint: "cleaning",
      cityHint: "Гомель",
      fetchedAt: FETCHED_AT,
      name: "Чистый дом",
      address: "Беларусь, Гомель, улица Советская, 10",
      coordinates: [30.98, 52.43],
      phones: ["+375 (232) 50-50-50"],
      url: "https://chisty-dom.by",
      categories: ["Клининговые услуги"],
      query: "клининг",
    };

    const result = normalizeListing(listing, { catalog, seenOrder: 0 });
    expect(result.kind).toBe("lead");
    if (result.kind !== "lead") return;
    expect(result.lead.city).toBe("Гомель");
    expect(result.lead.geo).toEqual({ lat: 52.43, lon: 30.98 });
    expect(result.lead.phones).toEqual(["+375232505050"]);
    expect(result.lead.website).toBe("https://chisty-dom.by/");
    expect(result.lead.social).toEqual({});
    expect(result.lead.trust).toBe("structured");
  });

  it("should keep the work unit city when the address names no city", () => {
    const streetOnly: YandexRawListing = {
      source: "yandex_maps",
      categoryHint: "cleaning",
      cityHint: "Гомель",
      fetchedAt: FETCHED_AT,
      name: "Чистый дом",
      address: "улица Советская, 10",
      phones: [],
      categories: ["Клининговые услуги"],
      query: "клининг",
    };
    const withCity: YandexRawListing = {
      ...streetOnly,
      address: "Беларусь, Гомель, улица Советская, 10",
    };

    const streetResult = normalizeListing(streetOnly, { catalog, seenOrder: 0 });
    const cityResult = normalizeListing(withCity, { catalog, seenOrder: 1 });

    expect(streetResult.kind).toBe("lead");
    expect(cityResult.kind).toBe("lead");
    if (streetResult.kind !== "lead" || cityResult.kind !== "lead") return;
    const [street, city] = [streetResult.lead, cityResult.lead];
    expect(street.city).toBe("Гомель");
    expect(street.address).toBe("улица Советская, 10");
    expect(nameKey(street.name, street.city, street.category)).toBe(
      nameKey(city.name, city.city, city.category),
    );
  });

  it("should strip registry quotes and resolve the city from an EGR address", () => {
    const listing: RawListing = {
      source: "egr",
      categoryHint: "legal",
      cityHint: "Брест",
      fetchedAt: FETCHED_AT,
      name: 'ООО "Правовой Партнер"',
      address: "г. Брест, ул. Ленина, 5",
      region: "Брестская область",
      unp: "190000001",
      legalForm: "ООО",
      okedCodes: ["69.10"],
    };

    const result = normalizeListing(listing, { catalog, seenOrder: 0 });
    expect(result.kind).toBe("lead");
    if (result.kind !== "lead") return;
    expect(result.lead.name).toBe("ООО Правовой Партнер");
    expect(result.lead.city).toBe("Брест");
    expect(result.lead.category).toBe("legal");
    expect(result.lead.phones).toEqual([]);
  });

  it("should pull contacts out of a classified description", () => {
    const listing: RawListing = {
      source: "onliner",
      categoryHint: "handyman",
      cityHint: "Минск",
      fetchedAt: FETCHED_AT,
      title: "Мастер на час. Любые работы",
      description:
        "Звоните +375 29 765-43-21, пишите t.me/master_minsk. Почта master@mail.by",
      location: "Минск",
      link: "https://baraholka.onliner.by/viewtopic.php?t=1",
    };

    const result = normalizeListing(listing, { catalog, seenOrder: 7 });
    expect(result.kind).toBe("lead");
    if (result.kind !== "lead") return;
    expect(result.lead).toEqual({
      name: "Мастер на час. Любые работы",
      category: "handyman",
      address: "Минск",
      city: "Минск",
      phones: ["+375297654321"],
      email: "master@mail.by",
      social: { telegram: "@master_minsk" },
      source: "onliner",
      trust: "scraped",
      seenOrder: 7,
      observedAt: FETCHED_AT,
    });
  });

  it("should use the username as name and instagram handle", () => {
    const listing: RawListing = {
      source: "instagram",
      categoryHint: "tattoo",
      cityHint: "Минск",
      fetchedAt: FETCHED_AT,
      username: "ink_studio_minsk",
      caption: "Тату в Минске. Запись: +375 33 111-22-33",
      profileUrl: "https://www.instagram.com/ink_studio_minsk/",
    };

    const result = normalizeListing(listing, { catalog, seenOrder: 0 });
    expect(result.kind).toBe("lead");
    if (result.kind !== "lead") return;
    expect(result.lead.name).toBe("ink_studio_minsk");
    expect(result.lead.social).toEqual({ instagram: "@ink_studio_minsk" });
    expect(result.lead.phones).toEqual(["+375331112233"]);
    expect(result.lead.city).toBe("Минск");
    expect(result.lead.category).toBe("tattoo");
  });
});
