import type { EquivalenceClass } from "@/types";

export function classKey(members: readonly number[]): string {
  return members.join(",");
}

function compareClasses(a: EquivalenceClass, b: EquivalenceClass): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}

/**
 * Canonical form of a class list: members distinct and ascending, classes
 * with fewer than two members dropped, duplicates (same member set) removed,
 * classes ordered by first member (then lexicographically).
 */
export function canonicalizeClasses(
  classes: Iterable<readonly number[]>,
): EquivalenceClass[] {
  const seen = new Set<string>();
  const result: EquivalenceClass[] = [];

  for (const members of classes) {
    const sorted = [...new Set(members)].sort((a, b) => a - b);
    if (sorted.length < 2) continue;

    const key = classKey(sorted);
    if (seen.has(key)) continue;

    seen.add(key);
    result.push(sorted);
  }

  return result.sort(compareClasses);
}

export function isSubset(
  subset: readonly number[],
  superset: readonly number[],
): boolean {
  const members = new Set(superset);
  return subset.every((key) => members.has(key));
}

export function intersect(
  a: readonly number[],
  b: readonly number[],
): number[] {
  const members = new Set(b);
  return a.filter((key) => members.has(key));
}
