/**
 * Catalog validation module
 *
 * Validates catalog JSON structure and enforces invariants:
 * - Every niche appears exactly once
 * - Every provider mapping covers every niche
 * - No duplicate city names or aliases
 * - No empty strings in required fields
 *
 * Validation is fail-fast: throws on first error with actionable message.
 */

import type {
  CatalogRaw,
  CityRaw,
  Niche,
  NicheRaw,
  ProvidersRaw,
} from "@/types";
import { NICHES } from "@/types";

/**
 * Error thrown when catalog validation fails.
 */
export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(`Catalog validation failed: ${message}`);
    this.name = "CatalogValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isNiche(value: unknown): value is Niche {
  return typeof value === "string" && NICHES.some((niche) => niche === value);
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param fieldPath - Field path for error messages (e.g., "niches[0].id")
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new CatalogValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new CatalogValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

function validateObject(
  value: unknown,
  fieldPath: string,
): asserts value is Record<string, unknown> {
  if (!isRecord(value)) {
    throw new CatalogValidationError(`${fieldPath} must be an object`);
  }
}

/**
 * Validates a non-empty array of non-empty strings.
 */
function validateStringList(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new CatalogValidationError(
      `${fieldPath} must be an array, got ${typeof value}`,
    );
  }
  if (value.length === 0) {
    throw new CatalogValidationError(`${fieldPath} cannot be empty`);
  }
  return value.map((item: unknown, index: number) => {
    validateNonEmptyString(item, `${fieldPath}[${index}]`);
    return item;
  });
}

function validateNiche(value: unknown, index: number): NicheRaw {
  const prefix = `niches[${index}]`;
  validateObject(value, prefix);

  if (!isNiche(value.id)) {
    throw new CatalogValidationError(
      `${prefix}.id must be one of ${NICHES.join(", ")}, got "${String(value.id)}"`,
    );
  }
  validateNonEmptyString(value.nameRu, `${prefix}.nameRu`);

  return {
    id: value.id,
    nameRu: value.nameRu,
    keywords: validateStringList(value.keywords, `${prefix}.keywords`),
  };
}

function validateCity(value: unknown, index: number): CityRaw {
  const prefix = `cities[${index}]`;
  validateObject(value, prefix);
  validateNonEmptyString(value.name, `${prefix}.name`);

  const city: CityRaw = {
    name: value.name,
    aliases: validateStringList(value.aliases, `${prefix}.aliases`),
  };

  if (value.twogisRegionId !== undefined) {
    validateNonEmptyString(value.twogisRegionId, `${prefix}.twogisRegionId`);
    city.twogisRegionId = value.twogisRegionId;
  }

  if (value.yandexCenter !== undefined) {
    const center = value.yandexCenter;
    if (
      !Array.isArray(center) ||
      center.length !== 2 ||
      typeof center[0] !== "number" ||
      typeof center[1] !== "number"
    ) {
      throw new CatalogValidationError(
        `${prefix}.yandexCenter must be a [lat, lon] pair of numbers`,
      );
    }
    city.yandexCenter = [center[0], center[1]];
  }

  if (value.dealRegion !== undefined) {
    validateNonEmptyString(value.dealRegion, `${prefix}.dealRegion`);
    city.dealRegion = value.dealRegion;
  }

  return city;
}

/**
 * Validates a per-niche mapping and returns it keyed by every niche.
 *
 * @param read - Validator for one niche's entry
 */
function validateNicheMap<T>(
  value: unknown,
  fieldPath: string,
  read: (entry: unknown, entryPath: string) => T,
): Record<Niche, T> {
  validateObject(value, fieldPath);

  for (const key of Object.keys(value)) {
    if (!isNiche(key)) {
      throw new CatalogValidationError(
        `${fieldPath} references unknown niche "${key}"`,
      );
    }
  }

  const entries = NICHES.map((niche): [Niche, T] => {
    if (!(niche in value)) {
      throw new CatalogValidationError(`${fieldPath} is missing niche "${niche}"`);
    }
    return [niche, read(value[niche], `${fieldPath}.${niche}`)];
  });

  return {
    auto_service: lookup(entries, "auto_service"),
    handyman: lookup(entries, "handyman"),
    cleaning: lookup(entries, "cleaning"),
    moving: lookup(entries, "moving"),
    education: lookup(entries, "education"),
    fitness: lookup(entries, "fitness"),
    photo_video: lookup(entries, "photo_video"),
    legal: lookup(entries, "legal"),
    psychology: lookup(entries, "psychology"),
    tattoo: lookup(entries, "tattoo"),
  };
}

function lookup<T>(entries: Array<[Niche, T]>, niche: Niche): T {
  const entry = entries.find(([key]) => key === niche);
  if (!entry) {
    throw new CatalogValidationError(`missing niche "${niche}"`);
  }
  return entry[1];
}

function readString(entry: unknown, entryPath: string): string {
  validateNonEmptyString(entry, entryPath);
  return entry;
}

function validateProviders(value: unknown): ProvidersRaw {
  validateObject(value, "providers");
  const { twogis, yandex_maps, egr, onliner, deal, instagram } = value;

  validateObject(twogis, "providers.twogis");
  validateObject(yandex_maps, "providers.yandex_maps");
  validateObject(egr, "providers.egr");
  validateObject(onliner, "providers.onliner");
  validateObject(deal, "providers.deal");
  validateObject(instagram, "providers.instagram");

  return {
    twogis: {
      rubrics: validateNicheMap(twogis.rubrics, "providers.twogis.rubrics", validateStringList),
    },
    yandex_maps: {
      keywords: validateNicheMap(
        yandex_maps.keywords,
        "providers.yandex_maps.keywords",
        validateStringList,
      ),
    },
    egr: {
      okedCodes: validateNicheMap(egr.okedCodes, "providers.egr.okedCodes", validateStringList),
      keywords: validateNicheMap(egr.keywords, "providers.egr.keywords", validateStringList),
    },
    onliner: {
      sectionUrls: validateNicheMap(
        onliner.sectionUrls,
        "providers.onliner.sectionUrls",
        readString,
      ),
      keywords: validateNicheMap(onliner.keywords, "providers.onliner.keywords", validateStringList),
    },
    deal: {
      sections: validateNicheMap(deal.sections, "providers.deal.sections", readString),
    },
    instagram: {
      hashtags: validateNicheMap(
        instagram.hashtags,
        "providers.instagram.hashtags",
        validateStringList,
      ),
    },
  };
}

/**
 * Checks for duplicate values in a list.
 *
 * @param itemType - Type name for error messages (e.g., "niche")
 * @throws {CatalogValidationError} If duplicates are found
 */
function checkDuplicates(values: string[], itemType: string): void {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new CatalogValidationError(`Duplicate ${itemType}: "${value}"`);
    }
    seen.add(value);
  }
}

/**
 * Validates raw catalog data from JSON.
 *
 * Performs comprehensive validation:
 * 1. Schema shape and types
 * 2. Non-empty required fields
 * 3. Every niche declared once and mapped by every provider
 * 4. No duplicate city names or aliases
 *
 * @param raw - Parsed catalog JSON
 * @returns The validated catalog
 * @throws {CatalogValidationError} With actionable error message on validation failure
 *
 * @example
 * const catalog = validateCatalogRaw(JSON.parse(jsonString));
 * // catalog is now typed as CatalogRaw and guaranteed valid
 */
export function validateCatalogRaw(raw: unknown): CatalogRaw {
  validateObject(raw, "catalog");
  validateNonEmptyString(raw.version, "version");

  if (!Array.isArray(raw.niches) || raw.niches.length === 0) {
    throw new CatalogValidationError("niches must be a non-empty array");
  }
  if (!Array.isArray(raw.cities) || raw.cities.length === 0) {
    throw new CatalogValidationError("cities must be a non-empty array");
  }

  const niches = raw.niches.map((niche: unknown, index: number) =>
    validateNiche(niche, index),
  );
  const cities = raw.cities.map((city: unknown, index: number) =>
    validateCity(city, index),
  );

  checkDuplicates(
    niches.map((n) => n.id),
    "niche",
  );
  for (const niche of NICHES) {
    if (!niches.some((n) => n.id === niche)) {
      throw new CatalogValidationError(`niches is missing "${niche}"`);
    }
  }

  checkDuplicates(
    cities.map((c) => c.name),
    "city",
  );
  checkDuplicates(
    cities.flatMap((c) => c.aliases.map((alias) => alias.toLowerCase())),
    "city alias",
  );

  return {
    version: raw.version,
    niches,
    cities,
    providers: validateProviders(raw.providers),
  };
}
