/**
 * Unit tests for text normalization and tokenization
 *
 * Pure helpers used by identity hashing and category mapping.
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import {
  containsKeyword,
  normalizeText,
} from "@/utils/text/textNormalization";
import { removeDiacritics } from "@/utils/text/removeDiacritics";

describe("removeDiacritics", () => {
  it("should fold ё and й into their base letters", () => {
    expect(removeDiacritics("Могилёв")).toBe("Могилев");
    expect(removeDiacritics("Бобруйск")).toBe("Бобруиск");
  });

  it("should strip Latin accents", () => {
    expect(removeDiacritics("café")).toBe("cafe");
  });
});

describe("normalizeText", () => {
  it("should lowercase, drop quotes and punctuation and collapse spaces", () => {
    expect(normalizeText("  «Авто-Сервис»  Премиум! ")).toBe("авто сервис премиум");
  });

  it("should return an empty string for punctuation-only input", () => {
    expect(normalizeText(" «»!? ")).toBe("");
  });

  it("should keep digits", () => {
    expect(normalizeText("Шиномонтаж 24/7")).toBe("шиномонтаж 24 7");
  });
});

describe("containsKeyword", () => {
  it("should match a keyword stem inside normalized text", () => {
    expect(containsKeyword(normalizeText("Грузоперевозки по городу"), "грузоперевозк")).toBe(
      true,
    );
  });

  it("should never match an empty keyword", () => {
    expect(containsKeyword("автосервис", "")).toBe(false);
  });
});
