/**
 * Scheme presets: built-in schemes and scheme files passed with --scheme.
 */

import { readFile } from "node:fs/promises";
import type { NumberingOptions, SchemeInput } from "./scheme.js";
import { isCaseOption, isNumberPosition } from "./scheme.js";

export interface SchemePreset {
  name: string;
  scheme: SchemeInput;
}

/**
 * Built-in presets for common photo and document clean-ups.
 */
export const BUILT_IN_PRESETS: SchemePreset[] = [
  { name: "Lowercase", scheme: { caseOption: "lower" } },
  { name: "Title case", scheme: { caseOption: "title" } },
  { name: "Spaces to underscores", scheme: { find: " ", replace: "_" } },
  { name: "Spaces to hyphens", scheme: { find: " ", replace: "-" } },
  {
    name: "Numbered photos",
    scheme: { nameTemplate: "photo", numbering: { enabled: true, padding: 3, start: 1, step: 1 } },
  },
  {
    name: "Number first",
    scheme: { numbering: { enabled: true, padding: 2, position: "prefix", separator: "-" } },
  },
];

export function findPreset(name: string): SchemePreset | undefined {
  const wanted = name.toLowerCase();
  return BUILT_IN_PRESETS.find((p) => p.name.toLowerCase() === wanted);
}

const STRING_FIELDS = ["prefix", "suffix", "find", "replace", "nameTemplate"] as const;
const COUNT_FIELDS = ["padding", "start", "step"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parseNumbering(raw: unknown, problems: string[]): Partial<NumberingOptions> | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    problems.push("numbering must be an object");
    return undefined;
  }
  const numbering: { -readonly [K in keyof NumberingOptions]?: NumberingOptions[K] } = {};
  if (raw.enabled !== undefined) {
    if (typeof raw.enabled === "boolean") numbering.enabled = raw.enabled;
    else problems.push("numbering.enabled must be a boolean");
  }
  for (const field of COUNT_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value === "number") numbering[field] = value;
    else problems.push(`numbering.${field} must be a number`);
  }
  if (raw.position !== undefined) {
    if (isNumberPosition(raw.position)) numbering.position = raw.position;
    else problems.push('numbering.position must be "prefix" or "suffix"');
  }
  if (raw.separator !== undefined) {
    if (typeof raw.separator === "string") numbering.separator = raw.separator;
    else problems.push("numbering.separator must be a string");
  }
  return numbering;
}

/**
 * Check an untyped value (parsed JSON) against the scheme shape. Ranges are
 * left to createScheme.
 */
export function parseSchemeInput(data: unknown): SchemeInput {
  if (!isRecord(data)) throw new Error("Scheme must be a JSON object.");
  const problems: string[] = [];
  const scheme: { -readonly [K in keyof SchemeInput]?: SchemeInput[K] } = {};
  for (const field of STRING_FIELDS) {
    const value = data[field];
    if (value === undefined) continue;
    if (typeof value === "string") scheme[field] = value;
    else problems.push(`${field} must be a string`);
  }
  if (data.caseOption !== undefined) {
    if (isCaseOption(data.caseOption)) scheme.caseOption = data.caseOption;
    else problems.push("caseOption must be one of preserve, lower, upper, title");
  }
  const numbering = parseNumbering(data.numbering, problems);
  if (numbering) scheme.numbering = numbering;
  if (problems.length > 0) {
    throw new Error(`Invalid scheme: ${problems.join("; ")}`);
  }
  return scheme;
}

/**
 * Load a scheme from a JSON file. Throws on a missing, unreadable or invalid file.
 */
export async function readSchemeFile(path: string): Promise<SchemeInput> {
  const raw = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new Error(`Scheme file is not valid JSON: ${path}`);
  }
  return parseSchemeInput(data);
}
