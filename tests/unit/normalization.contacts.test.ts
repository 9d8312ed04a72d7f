/**
 * Unit tests for contact, social and coordinate normalization
 */

import { describe, it, expect } from "vitest";
import {
  extractSocialLinks,
  normalizeInstagramHandle,
} from "@/normalization/social";
import {
  extractEmail,
  extractWebsite,
  normalizeRating,
  normalizeReviewCount,
  normalizeWebsite,
} from "@/normalization/contact";
import { toGeoPoint } from "@/normalization/geo";

describe("extractSocialLinks", () => {
  it("should read profile links and lowercase handles", () => {
    expect(
      extractSocialLinks(
        "Мы в Instagram: https://www.instagram.com/AutoService_Premium/ и VK vk.com/autoservice",
      ),
    ).toEqual({
      instagram: "@autoservice_premium",
      vk: "vk.com/autoservice",
    });
  });

  it("should read telegram links as handles", () => {
    expect(extractSocialLinks("Пишите: t.me/masterdom_by")).toEqual({
      telegram: "@masterdom_by",
    });
  });

  it("should skip reserved instagram paths", () => {
    expect(
      extractSocialLinks("https://instagram.com/explore/tags/remont"),
    ).toEqual({});
  });

  it("should read a bare @mention as instagram", () => {
    expect(extractSocialLinks("Пишите в директ @Tattoo.Minsk.")).toEqual({
      instagram: "@tattoo.minsk",
    });
  });

  it("should not read an email address as a mention", () => {
    expect(extractSocialLinks("mail: info@example.by")).toEqual({});
  });

  it("should return an empty object for missing text", () => {
    expect(extractSocialLinks(undefined)).toEqual({});
  });
});

describe("normalizeInstagramHandle", () => {
  it("should normalize urls, bare handles and @handles", () => {
    expect(
      normalizeInstagramHandle("https://instagram.com/AutoService_Premium/"),
    ).toBe("@autoservice_premium");
    expect(normalizeInstagramHandle("autoservice_premium")).toBe(
      "@autoservice_premium",
    );
    expect(normalizeInstagramHandle("@Foo_Bar")).toBe("@foo_bar");
  });

  it("should reject values that are not handles", () => {
    expect(normalizeInstagramHandle("not a handle!")).toBeUndefined();
  });
});

describe("normalizeWebsite", () => {
  it("should add a scheme to bare hosts and lowercase the host", () => {
    expect(normalizeWebsite("Example.BY/contacts")).toBe(
      "https://example.by/contacts",
    );
    expect(normalizeWebsite("https://autoservice.by")).toBe(
      "https://autoservice.by/",
    );
  });

  it("should reject social and provider hosts", () => {
    expect(normalizeWebsite("https://vk.com/shop")).toBeUndefined();
    expect(normalizeWebsite("www.instagram.com/shop")).toBeUndefined();
    expect(normalizeWebsite("https://baraholka.onliner.by/x")).toBeUndefined();
  });

  it("should reject hosts without a dot and non-http schemes", () => {
    expect(normalizeWebsite("localhost")).toBeUndefined();
    expect(normalizeWebsite("ftp://files.by")).toBeUndefined();
    expect(normalizeWebsite("   ")).toBeUndefined();
  });
});

describe("extractWebsite", () => {
  it("should return the first business website in the text", () => {
    expect(
      extractWebsite(
        "Инста https://instagram.com/x и сайт https://premium-auto.by",
      ),
    ).toBe("https://premium-auto.by/");
  });

  it("should ignore bare hosts in free text", () => {
    expect(extractWebsite("сайт premium-auto.by")).toBeUndefined();
  });
});

describe("extractEmail", () => {
  it("should return the first address lowercased", () => {
    expect(extractEmail("Почта: Info@Premium-Auto.BY")).toBe(
      "info@premium-auto.by",
    );
    expect(extractEmail("нет почты")).toBeUndefined();
  });
});

describe("normalizeRating / normalizeReviewCount", () => {
  it("should accept ratings in [0, 5] from numbers and decimal-comma strings", () => {
    expect(normalizeRating(4.8)).toBe(4.8);
    expect(normalizeRating("4,5")).toBe(4.5);
    expect(normalizeRating(6)).toBeUndefined();
    expect(normalizeRating("abc")).toBeUndefined();
  });

  it("should accept non-negative integer review counts", () => {
    expect(normalizeReviewCount(120)).toBe(120);
    expect(normalizeReviewCount("12")).toBe(12);
    expect(normalizeReviewCount(-1)).toBeUndefined();
    expect(normalizeReviewCount(3.5)).toBeUndefined();
  });
});

describe("toGeoPoint", () => {
  it("should build a point from numbers or numeric strings", () => {
    expect(toGeoPoint("53.9", 27.56)).toEqual({ lat: 53.9, lon: 27.56 });
  });

  it("should reject out-of-range or missing coordinates", () => {
    expect(toGeoPoint(91, 0)).toBeUndefined();
    expect(toGeoPoint(0, 181)).toBeUndefined();
    expect(toGeoPoint(undefined, 27.5)).toBeUndefined();
  });
});
