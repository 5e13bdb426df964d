/**
 * Live preview: the first few (original, new) name pairs of a batch.
 */

import { basename } from "node:path";
import type { FileEntry } from "./batch.js";
import { generateName } from "./name-generator.js";
import type { SchemeParams } from "./scheme.js";

export const DEFAULT_PREVIEW_COUNT = 5;

export interface PreviewPair {
  readonly originalName: string;
  readonly newName: string;
}

/**
 * Restartable: every iteration recomputes from the inputs. Scheme errors
 * surface when iteration starts.
 */
export function samplePreview(
  entries: readonly FileEntry[],
  params: SchemeParams,
  count: number = DEFAULT_PREVIEW_COUNT,
): Iterable<PreviewPair> {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`Preview count must be a non-negative integer, got ${count}`);
  }
  const take = Math.min(count, entries.length);
  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < take; i++) {
        const { originalPath, index } = entries[i];
        yield { originalName: basename(originalPath), newName: generateName(originalPath, index, params) };
      }
    },
  };
}
