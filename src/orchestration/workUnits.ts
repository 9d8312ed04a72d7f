/**
 * Work unit expansion
 */

import type { Niche, SourceId, WorkUnit } from "@/types";

/**
 * Cartesian product sources × niches × cities, grouped by source
 */
export function buildWorkUnits(
  sourceIds: readonly SourceId[],
  niches: readonly Niche[],
  cities: readonly string[],
): WorkUnit[] {
  const units: WorkUnit[] = [];
  for (const sourceId of sourceIds) {
    for (const category of niches) {
      for (const city of cities) {
        units.push({ sourceId, category, city });
      }
    }
  }
  return units;
}

export function describeUnit(unit: WorkUnit): string {
  return `${unit.sourceId}/${unit.category}/${unit.city}`;
}
