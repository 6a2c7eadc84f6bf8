/**
 * Event Composer
 *
 * E' classes are the intersections of whole T' and L' classes that keep at
 * least two members. This is coarser than requiring each pair inside an E'
 * class to be both time- and location-adjacent: two files can share an E'
 * class while only being linked through other files in each graph.
 */

import type { EquivalenceClass } from "@/types";
import { canonicalizeClasses, intersect } from "./classes";

export function composeEvents(
  tPrime: readonly EquivalenceClass[],
  lPrime: readonly EquivalenceClass[],
): EquivalenceClass[] {
  const candidates: number[][] = [];

  for (const timeClass of tPrime) {
    for (const locationClass of lPrime) {
      const intersection = intersect(timeClass, locationClass);
      if (intersection.length > 1) {
        candidates.push(intersection);
      }
    }
  }

  // Deduplicated by member set, not by reference
  return canonicalizeClasses(candidates);
}
