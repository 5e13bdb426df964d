/**
 * Batch building: folder listing and stable index assignment.
 */

import { lstatSync, readdirSync } from "node:fs";
import { extname, join, resolve } from "node:path";

/** A selected file and its position in the batch. */
export interface FileEntry {
  readonly originalPath: string;
  readonly index: number;
}

export type IndexBy = "selection" | "listing";

export interface BatchOptions {
  /** Which ordering the numbering index follows. Defaults to "selection". */
  indexBy?: IndexBy;
  /** Full folder listing, required when indexBy is "listing". */
  listing?: readonly string[];
}

export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".bmp", ".tiff"] as const;

export interface ListOptions {
  /** Keep only these extensions (with or without the dot, any case). */
  extensions?: readonly string[];
}

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/** Regular files in `dir`, as full paths, sorted by name. */
export function listFiles(dir: string, options: ListOptions = {}): string[] {
  const wanted =
    options.extensions && options.extensions.length > 0
      ? new Set(options.extensions.map(normalizeExtension))
      : undefined;
  const files: string[] = [];
  for (const name of readdirSync(dir)) {
    if (wanted && !wanted.has(extname(name).toLowerCase())) continue;
    try {
      if (lstatSync(join(dir, name)).isFile()) files.push(join(dir, name));
    } catch {
      // Skip entries we can't stat (e.g. permission denied)
    }
  }
  return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function dedupe(paths: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const p of paths) {
    const key = resolve(p);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(p);
  }
  return out;
}

/**
 * Assign each selected path its batch index. Call once per batch and reuse
 * the result for preview, validation and apply.
 */
export function createBatch(selected: readonly string[], options: BatchOptions = {}): FileEntry[] {
  const paths = dedupe(selected);
  const indexBy = options.indexBy ?? "selection";

  if (indexBy === "selection") {
    return paths.map((originalPath, index) => Object.freeze({ originalPath, index }));
  }

  if (!options.listing) {
    throw new Error('indexBy "listing" requires the folder listing.');
  }
  const positions = new Map<string, number>();
  options.listing.forEach((p, i) => {
    const key = resolve(p);
    if (!positions.has(key)) positions.set(key, i);
  });

  const entries = paths.map((originalPath) => {
    const index = positions.get(resolve(originalPath));
    if (index === undefined) {
      throw new Error(`Selected file is not in the folder listing: ${originalPath}`);
    }
    return Object.freeze({ originalPath, index });
  });
  return entries.sort((a, b) => a.index - b.index);
}
