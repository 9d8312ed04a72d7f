/**
 * Unit tests for the merge/dedup engine
 *
 * Covers field priority, union fields, idempotence and the guarantee that
 * a populated field never becomes empty.
 */

import { describe, it, expect } from "vitest";
import { mergeLeads } from "@/merge";
import { clusterPartials } from "@/matching";
import { makeLead, makePartial } from "../helpers/leadFactory";

const NOW = new Date("2026-02-01T03:00:00.000Z");

describe("mergeLeads", () => {
  it("should merge a structured and a scraped record of the same business", () => {
    const clusters = clusterPartials([
      makePartial({
        name: "AutoService Premium",
        phones: ["+375291234567"],
        source: "twogis",
        trust: "structured",
        seenOrder: 0,
      }),
      makePartial({
        name: "Автосервис Премиум",
        phones: ["+375291234567"],
        social: { instagram: "@autoservice_premium" },
        source: "instagram",
        trust: "scraped",
        seenOrder: 1,
      }),
    ]);
    expect(clusters).toHaveLength(1);

    const { lead, conflicts } = mergeLeads({
      partials: clusters[0].partials,
      now: NOW,
    });

    expect(lead).toEqual({
      name: "AutoService Premium",
      category: "auto_service",
      address: "",
      city: "Минск",
      district: "",
      phones: ["+375291234567"],
      social: { instagram: "@autoservice_premium" },
      source: "merged",
      sources: ["instagram", "twogis"],
      updatedAt: "2026-02-01T03:00:00.000Z",
      identityKey: "phone:+375291234567",
    });
    expect(conflicts).toEqual([]);
  });

  it("should pick the longest name and break ties by trust", () => {
    const { lead } = mergeLeads({
      partials: [
        makePartial({ name: "Studio A", trust: "scraped", seenOrder: 0 }),
        makePartial({ name: "Studio B", trust: "structured", seenOrder: 1 }),
        makePartial({ name: "Studio", trust: "structured", seenOrder: 2 }),
      ],
      now: NOW,
    });

    expect(lead.name).toBe("Studio B");
  });

  it("should take scalars from the highest-priority record that has them", () => {
    const { lead } = mergeLeads({
      partials: [
        makePartial({
          source: "onliner",
          trust: "scraped",
          seenOrder: 0,
          email: "scraped@example.by",
          address: "Минск",
        }),
        makePartial({
          source: "twogis",
          trust: "structured",
          seenOrder: 1,
          address: "ул. Кальварийская, 25",
          rating: 4.7,
        }),
      ],
      now: NOW,
    });

    expect(lead.address).toBe("ул. Кальварийская, 25");
    expect(lead.email).toBe("scraped@example.by");
    expect(lead.rating).toBe(4.7);
    expect(lead.source).toBe("merged");
    expect(lead.sources).toEqual(["onliner", "twogis"]);
  });

  it("should union phones and social handles without duplicates", () => {
    const { lead } = mergeLeads({
      partials: [
        makePartial({
          phones: ["+375447654321"],
          social: { vk: "vk.com/premium" },
          seenOrder: 0,
        }),
        makePartial({
          phones: ["+375291234567", "+375447654321"],
          social: { instagram: "@premium", vk: "vk.com/other" },
          seenOrder: 1,
        }),
      ],
      now: NOW,
    });

    expect(lead.phones).toEqual(["+375291234567", "+375447654321"]);
    expect(lead.social).toEqual({
      instagram: "@premium",
      vk: "vk.com/premium",
    });
    expect(Object.keys(lead.social)).toEqual(["instagram", "vk"]);
  });

  it("should never clear a field the persisted lead already has", () => {
    const persisted = makeLead({
      email: "info@premium.by",
      website: "https://premium.by/",
      rating: 4.5,
      geo: { lat: 53.9, lon: 27.5 },
      social: { instagram: "@premium" },
    });

    const { lead } = mergeLeads({
      partials: [makePartial({ phones: ["+375291234567"] })],
      persisted,
      now: NOW,
    });

    expect(lead.email).toBe("info@premium.by");
    expect(lead.website).toBe("https://premium.by/");
    expect(lead.rating).toBe(4.5);
    expect(lead.geo).toEqual({ lat: 53.9, lon: 27.5 });
    expect(lead.social).toEqual({ instagram: "@premium" });
    expect(lead.address).toBe("ул. Кальварийская, 25");
  });

  it("should let fresh values supersede persisted ones", () => {
    const persisted = makeLead({ email: "old@premium.by", rating: 4.1 });

    const { lead } = mergeLeads({
      partials: [
        makePartial({
          phones: ["+375291234567"],
          email: "new@premium.by",
          rating: 4.6,
        }),
      ],
      persisted,
      now: NOW,
    });

    expect(lead.email).toBe("new@premium.by");
    expect(lead.rating).toBe(4.6);
  });

  it("should keep the persisted identity key", () => {
    const persisted = makeLead({ identityKey: "phone:+375251111111" });

    const { lead } = mergeLeads({
      partials: [makePartial({ phones: ["+375171234567"] })],
      persisted,
      now: NOW,
    });

    expect(lead.identityKey).toBe("phone:+375251111111");
    expect(lead.phones).toEqual(["+375171234567", "+375291234567"]);
  });

  it("should be idempotent when the same records are merged again", () => {
    const partials = [
      makePartial({
        phones: ["+375291234567"],
        email: "info@premium.by",
        seenOrder: 0,
      }),
      makePartial({
        name: "Автосервис Премиум Минск",
        source: "deal",
        trust: "scraped",
        seenOrder: 1,
        social: { telegram: "@premium" },
      }),
    ];

    const first = mergeLeads({ partials, now: NOW });
    const second = mergeLeads({ partials, persisted: first.lead, now: NOW });

    expect(second.lead).toEqual(first.lead);
  });

  it("should report a conflict between equal-priority records and keep the newer value", () => {
    const { lead, conflicts } = mergeLeads({
      partials: [
        makePartial({
          email: "old@premium.by",
          observedAt: "2026-01-01T00:00:00.000Z",
        }),
        makePartial({
          email: "new@premium.by",
          observedAt: "2026-01-05T00:00:00.000Z",
        }),
      ],
      now: NOW,
    });

    expect(lead.email).toBe("new@premium.by");
    expect(conflicts).toEqual([
      {
        field: "email",
        kept: "new@premium.by",
        dropped: "old@premium.by",
        keptSource: ["twogis"],
        droppedSource: ["twogis"],
      },
    ]);
  });

  it("should reject an empty cluster", () => {
    expect(() => mergeLeads({ partials: [], now: NOW })).toThrow(
      "Cannot merge an empty cluster",
    );
  });
});
