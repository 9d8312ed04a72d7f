/**
 * Coordinate validation
 */

import type { GeoPoint } from "@/types";

/**
 * Build a geo point when both coordinates are finite and in range
 * (lat in [-90, 90], lon in [-180, 180]); otherwise undefined.
 */
export function toGeoPoint(lat: unknown, lon: unknown): GeoPoint | undefined {
  const latitude = toNumber(lat);
  const longitude = toNumber(lon);
  if (latitude === undefined || longitude === undefined) {
    return undefined;
  }
  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) {
    return undefined;
  }
  return { lat: latitude, lon: longitude };
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}
