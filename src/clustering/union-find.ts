/**
 * Disjoint-set forest over the keys 0..size-1.
 *
 * Stored as two flat typed arrays indexed by key: `parent` links each key
 * towards its root, `rank` bounds tree height for union by rank. `find`
 * compresses paths as it walks.
 */

import { canonicalizeClasses } from "./classes";
import type { EquivalenceClass } from "@/types";

export class UnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;

  constructor(readonly size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
  }

  find(key: number): number {
    this.assertKey(key);

    let root = key;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }

    // Path compression: point every node on the walk at the root
    let node = key;
    while (this.parent[node] !== root) {
      const next = this.parent[node];
      this.parent[node] = root;
      node = next;
    }

    return root;
  }

  /** Merge the sets of `a` and `b`. Returns false when already joined. */
  union(a: number, b: number): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return false;
    }

    if (this.rank[rootA] < this.rank[rootB]) {
      this.parent[rootA] = rootB;
    } else if (this.rank[rootA] > this.rank[rootB]) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootB] = rootA;
      this.rank[rootA]++;
    }
    return true;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /**
   * Sets with at least two members, each sorted ascending, ordered by their
   * first member.
   */
  classes(): EquivalenceClass[] {
    const groups = new Map<number, number[]>();
    for (let key = 0; key < this.size; key++) {
      const root = this.find(key);
      const group = groups.get(root);
      if (group) {
        group.push(key);
      } else {
        groups.set(root, [key]);
      }
    }

    return canonicalizeClasses(
      [...groups.values()].filter((group) => group.length > 1),
    );
  }

  private assertKey(key: number): void {
    if (!Number.isInteger(key) || key < 0 || key >= this.size) {
      throw new RangeError(`Key ${key} is outside 0..${this.size - 1}`);
    }
  }
}
