/**
 * Proximity predicates
 *
 * Pairwise adjacency for the time (T') and location (L') graphs. Both
 * boundaries are inclusive: a difference exactly equal to the threshold is an
 * edge.
 */

import { differenceInMilliseconds } from "date-fns";
import type { FileRecord, Geotag, ProximityThresholds } from "@/types";

export const EARTH_RADIUS_KM = 6371;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Great-circle distance between two points, in kilometers. */
export function haversineKm(a: Geotag, b: Geotag): number {
  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);
  const deltaLat = toRadians(b.latitude - a.latitude);
  const deltaLon = toRadians(b.longitude - a.longitude);

  const h =
    Math.sin(deltaLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(deltaLon / 2) ** 2;
  // Rounding can push h a hair above 1 for antipodal points
  const c = 2 * Math.asin(Math.sqrt(Math.min(1, h)));

  return EARTH_RADIUS_KM * c;
}

/** Absolute capture-time difference in seconds. */
export function secondsApart(a: Date, b: Date): number {
  return Math.abs(differenceInMilliseconds(a, b)) / 1000;
}

export function timeEdge(
  a: FileRecord,
  b: FileRecord,
  thresholds: ProximityThresholds,
): boolean {
  if (a.timestamp === null || b.timestamp === null) {
    return false;
  }
  return secondsApart(a.timestamp, b.timestamp) <= thresholds.timeThresholdSeconds;
}

export function locationEdge(
  a: FileRecord,
  b: FileRecord,
  thresholds: ProximityThresholds,
): boolean {
  if (a.geotag === null || b.geotag === null) {
    return false;
  }
  return haversineKm(a.geotag, b.geotag) <= thresholds.locationThresholdKm;
}
