/**
 * Shared utilities for script and interactive commands.
 */

import { basename } from "node:path";
import type { ApplyResult, ApplySummary } from "../apply.js";
import type { PreviewPair } from "../preview.js";
import { findPreset, readSchemeFile } from "../presets.js";
import type { SchemeInput, SchemeParams } from "../scheme.js";
import { createScheme, mergeSchemeInput } from "../scheme.js";
import type { ConflictReport } from "../validator.js";

export const PREVIEW_MAX_LINES = 20;

export function formatPreview(pairs: readonly PreviewPair[], total: number): string {
  const lines = pairs.map((p) => `${p.originalName} → ${p.newName}`);
  if (total > pairs.length) {
    lines.push(`… and ${total - pairs.length} more`);
  }
  return lines.join("\n");
}

/** One line per conflict, grouped by category. Empty string for an empty report. */
export function formatReport(report: ConflictReport): string {
  const lines: string[] = [];
  for (const d of report.duplicates) {
    lines.push(`duplicate ${d.newName}: ${d.originalPaths.map((p) => basename(p)).join(", ")}`);
  }
  for (const c of report.invalidChars) {
    lines.push(`invalid ${basename(c.originalPath)} → ${JSON.stringify(c.newName)}: ${c.reason}`);
  }
  for (const e of report.existingFiles) {
    lines.push(`exists ${basename(e.originalPath)} → ${e.newPath}`);
  }
  return lines.join("\n");
}

export function formatSummary(summary: ApplySummary): string {
  let line = `Renamed ${summary.succeeded} of ${summary.total} file(s)`;
  if (summary.failed > 0) {
    const kinds = Object.entries(summary.errorsByKind)
      .map(([kind, count]) => `${kind}: ${count}`)
      .join(", ");
    line += `, ${summary.failed} failed (${kinds})`;
  }
  if (summary.skipped > 0) {
    line += `, ${summary.skipped} skipped`;
  }
  return `${line}.`;
}

export function formatFailures(results: readonly ApplyResult[]): string {
  const lines: string[] = [];
  for (const r of results) {
    if (r.outcome.status !== "error") continue;
    lines.push(`${basename(r.originalPath)}: [${r.outcome.kind}] ${r.outcome.message}`);
  }
  return lines.join("\n");
}

export interface SchemeSources {
  preset?: string;
  schemeFile?: string;
  flags?: SchemeInput;
}

/** Preset, then scheme file, then individual flags; later sources win. */
export async function resolveScheme(sources: SchemeSources): Promise<SchemeParams> {
  let input: SchemeInput = {};
  if (sources.preset !== undefined) {
    const preset = findPreset(sources.preset);
    if (!preset) throw new Error(`Unknown preset: ${sources.preset}`);
    input = mergeSchemeInput(input, preset.scheme);
  }
  if (sources.schemeFile !== undefined) {
    input = mergeSchemeInput(input, await readSchemeFile(sources.schemeFile));
  }
  if (sources.flags) {
    input = mergeSchemeInput(input, sources.flags);
  }
  return createScheme(input);
}
