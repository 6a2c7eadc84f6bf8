/**
 * File Index
 *
 * Bijection between file paths and dense integer keys. Keys start at 0, follow
 * insertion order and are never reused, so every later stage can address a
 * file by key alone.
 */

import type { MetadataDocument } from "@/types";

export class FileIndex {
  private readonly paths: string[] = [];
  private readonly keys = new Map<string, number>();

  /** Key for `path`, assigning the next free key on first sight. */
  add(path: string): number {
    const existing = this.keys.get(path);
    if (existing !== undefined) {
      return existing;
    }
    const key = this.paths.length;
    this.paths.push(path);
    this.keys.set(path, key);
    return key;
  }

  get size(): number {
    return this.paths.length;
  }

  /** [key, path] pairs in key order */
  entries(): Array<[number, string]> {
    return this.paths.map((path, key) => [key, path]);
  }

  toMap(): Map<number, string> {
    return new Map(this.entries());
  }
}

export function buildFileIndex(paths: Iterable<string>): FileIndex {
  const index = new FileIndex();
  for (const path of paths) {
    index.add(path);
  }
  return index;
}

/**
 * Paths of the snapshot that take part in clustering, in document order.
 * Files a review stage marked for deletion are left out.
 */
export function activePaths(document: MetadataDocument): string[] {
  return Object.entries(document)
    .filter(([, metadata]) => metadata.marked_for_deletion !== true)
    .map(([path]) => path);
}
