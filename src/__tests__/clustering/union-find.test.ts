import { describe, expect, test } from "vitest";
import { UnionFind } from "@/clustering/union-find";

describe("UnionFind", () => {
  test("every key starts as its own root", () => {
    const uf = new UnionFind(4);
    for (let key = 0; key < 4; key++) {
      expect(uf.find(key)).toBe(key);
    }
    expect(uf.classes()).toEqual([]);
  });

  test("union joins two keys", () => {
    const uf = new UnionFind(3);
    expect(uf.union(0, 2)).toBe(true);
    expect(uf.connected(0, 2)).toBe(true);
    expect(uf.connected(0, 1)).toBe(false);
  });

  test("union of already joined keys reports false", () => {
    const uf = new UnionFind(3);
    uf.union(0, 1);
    uf.union(1, 2);
    expect(uf.union(0, 2)).toBe(false);
  });

  test("is transitive across chained unions", () => {
    const uf = new UnionFind(5);
    uf.union(0, 1);
    uf.union(1, 2);
    uf.union(3, 4);
    expect(uf.connected(0, 2)).toBe(true);
    expect(uf.connected(2, 3)).toBe(false);
    expect(uf.classes()).toEqual([
      [0, 1, 2],
      [3, 4],
    ]);
  });

  test("classes drop singletons and sort members and classes", () => {
    const uf = new UnionFind(7);
    uf.union(6, 3);
    uf.union(5, 0);
    uf.union(4, 0);
    expect(uf.classes()).toEqual([
      [0, 4, 5],
      [3, 6],
    ]);
  });

  test("merging two large sets keeps a single root", () => {
    const uf = new UnionFind(8);
    uf.union(0, 1);
    uf.union(2, 3);
    uf.union(0, 2);
    uf.union(4, 5);
    uf.union(6, 7);
    uf.union(4, 6);
    uf.union(3, 7);
    const root = uf.find(0);
    for (let key = 1; key < 8; key++) {
      expect(uf.find(key)).toBe(root);
    }
    expect(uf.classes()).toEqual([[0, 1, 2, 3, 4, 5, 6, 7]]);
  });

  test("rejects keys outside the range", () => {
    const uf = new UnionFind(2);
    expect(() => uf.find(2)).toThrow(RangeError);
    expect(() => uf.find(-1)).toThrow(RangeError);
    expect(() => uf.union(0, 1.5)).toThrow(RangeError);
  });

  test("an empty forest has no classes", () => {
    expect(new UnionFind(0).classes()).toEqual([]);
  });
});
