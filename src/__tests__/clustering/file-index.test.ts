import { describe, expect, test } from "vitest";
import { activePaths, buildFileIndex, FileIndex } from "@/clustering/file-index";

describe("FileIndex", () => {
  test("assigns dense keys in insertion order", () => {
    const index = new FileIndex();
    expect(index.add("/b.jpg")).toBe(0);
    expect(index.add("/a.jpg")).toBe(1);
    expect(index.size).toBe(2);
  });

  test("returns the existing key for a repeated path", () => {
    const index = buildFileIndex(["/a.jpg", "/b.jpg", "/a.jpg"]);
    expect(index.add("/b.jpg")).toBe(1);
    expect(index.entries()).toEqual([
      [0, "/a.jpg"],
      [1, "/b.jpg"],
    ]);
  });

  test("converts to a key to path map", () => {
    const map = buildFileIndex(["/x.mov", "/y.mov"]).toMap();
    expect([...map.entries()]).toEqual([
      [0, "/x.mov"],
      [1, "/y.mov"],
    ]);
  });
});

describe("activePaths", () => {
  test("keeps document order and skips files marked for deletion", () => {
    expect(
      activePaths({
        "/c.jpg": {},
        "/a.jpg": { marked_for_deletion: true },
        "/b.jpg": { marked_for_deletion: false },
      }),
    ).toEqual(["/c.jpg", "/b.jpg"]);
  });
});
