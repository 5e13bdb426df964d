/**
 * Plan building and batch-wide conflict detection. Read-only: nothing here
 * touches the filesystem except to stat.
 */

import { lstatSync, type Stats } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { FileEntry } from "./batch.js";
import { generateName } from "./name-generator.js";
import type { SchemeParams } from "./scheme.js";

export interface RenamePlanItem {
  readonly originalPath: string;
  readonly newName: string;
  readonly newPath: string;
  readonly index: number;
}

export interface RenamePlan {
  readonly items: readonly RenamePlanItem[];
  readonly destination?: string;
}

export interface DuplicateConflict {
  readonly newName: string;
  readonly newPath: string;
  readonly originalPaths: readonly string[];
}

export interface InvalidNameConflict {
  readonly originalPath: string;
  readonly newName: string;
  readonly newPath: string;
  readonly reason: string;
}

export interface ExistingFileConflict {
  readonly originalPath: string;
  readonly newName: string;
  readonly newPath: string;
}

export interface ConflictReport {
  readonly duplicates: readonly DuplicateConflict[];
  readonly invalidChars: readonly InvalidNameConflict[];
  readonly existingFiles: readonly ExistingFileConflict[];
}

export type FilenamePlatform = "posix" | "darwin" | "win32";

export interface ValidatedPlan {
  readonly plan: RenamePlan;
  readonly report: ConflictReport;
  /** Filename rules the plan was checked against; apply compares paths the same way. */
  readonly platform: FilenamePlatform;
}

export interface CheckOptions {
  destination?: string;
  /** Filename rules to check against. Defaults to the running platform. */
  platform?: FilenamePlatform;
}

export const MAX_NAME_BYTES = 255;

const WIN32_RESERVED = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

export function currentPlatform(): FilenamePlatform {
  if (process.platform === "win32") return "win32";
  if (process.platform === "darwin") return "darwin";
  return "posix";
}

function disallowedCharacters(platform: FilenamePlatform): RegExp {
  switch (platform) {
    case "win32":
      return /[<>:"/\\|?*\u0000-\u001f]/;
    case "darwin":
      return /[/:\u0000]/;
    case "posix":
      return /[/\u0000]/;
  }
}

/** Why `name` is not a valid file name on `platform`, or undefined if it is. */
export function invalidNameReason(name: string, platform: FilenamePlatform): string | undefined {
  if (name === "") return "empty file name";
  if (name === "." || name === "..") return `"${name}" is reserved`;
  const bad = disallowedCharacters(platform).exec(name);
  if (bad) {
    const ch = bad[0];
    const shown = ch.charCodeAt(0) < 0x20 ? `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}` : ch;
    return `contains disallowed character "${shown}"`;
  }
  if (platform === "win32") {
    if (WIN32_RESERVED.test(name)) return "reserved device name";
    if (/[. ]$/.test(name)) return "ends with a dot or space";
  }
  if (Buffer.byteLength(name, "utf8") > MAX_NAME_BYTES) {
    return `longer than ${MAX_NAME_BYTES} bytes`;
  }
  return undefined;
}

export function buildPlan(
  entries: readonly FileEntry[],
  params: SchemeParams,
  destination?: string,
): RenamePlan {
  const items = entries.map(({ originalPath, index }) => {
    const newName = generateName(originalPath, index, params);
    const newPath = join(destination ?? dirname(originalPath), newName);
    return Object.freeze({ originalPath, newName, newPath, index });
  });
  return Object.freeze(destination !== undefined ? { items, destination } : { items });
}

/** Resolved path, case-folded where the platform's filesystems usually ignore case. */
export function pathKey(p: string, platform: FilenamePlatform): string {
  const full = resolve(p);
  return platform === "posix" ? full : full.toLowerCase();
}

function statOrUndefined(p: string): Stats | undefined {
  try {
    return lstatSync(p);
  } catch {
    return undefined;
  }
}

function findDuplicates(plan: RenamePlan, platform: FilenamePlatform): DuplicateConflict[] {
  const groups = new Map<string, RenamePlanItem[]>();
  for (const item of plan.items) {
    const key = pathKey(item.newPath, platform);
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  const duplicates: DuplicateConflict[] = [];
  for (const group of groups.values()) {
    if (group.length < 2) continue;
    duplicates.push({
      newName: group[0].newName,
      newPath: group[0].newPath,
      originalPaths: group.map((item) => item.originalPath),
    });
  }
  return duplicates;
}

function findExistingFiles(plan: RenamePlan, platform: FilenamePlatform): ExistingFileConflict[] {
  const sources = new Set(plan.items.map((item) => pathKey(item.originalPath, platform)));
  const sourceInodes = new Set<string>();
  for (const item of plan.items) {
    const st = statOrUndefined(item.originalPath);
    if (st) sourceInodes.add(`${st.dev}:${st.ino}`);
  }

  const existing: ExistingFileConflict[] = [];
  for (const item of plan.items) {
    if (resolve(item.newPath) === resolve(item.originalPath)) continue;
    const target = statOrUndefined(item.newPath);
    if (!target) continue;
    if (sources.has(pathKey(item.newPath, platform))) continue;
    // case-only rename on a case-insensitive filesystem resolves to the source itself
    if (sourceInodes.has(`${target.dev}:${target.ino}`)) continue;
    existing.push({ originalPath: item.originalPath, newName: item.newName, newPath: item.newPath });
  }
  return existing;
}

function findInvalidNames(plan: RenamePlan, platform: FilenamePlatform): InvalidNameConflict[] {
  const invalid: InvalidNameConflict[] = [];
  for (const item of plan.items) {
    const reason = invalidNameReason(item.newName, platform);
    if (reason === undefined) continue;
    invalid.push({ originalPath: item.originalPath, newName: item.newName, newPath: item.newPath, reason });
  }
  return invalid;
}

export function validatePlan(
  entries: readonly FileEntry[],
  params: SchemeParams,
  options: CheckOptions = {},
): ValidatedPlan {
  const platform = options.platform ?? currentPlatform();
  const plan = buildPlan(entries, params, options.destination);
  const report: ConflictReport = {
    duplicates: findDuplicates(plan, platform),
    invalidChars: findInvalidNames(plan, platform),
    existingFiles: findExistingFiles(plan, platform),
  };
  return Object.freeze({ plan, report, platform });
}

export function checkConflicts(
  entries: readonly FileEntry[],
  params: SchemeParams,
  options: CheckOptions = {},
): ConflictReport {
  return validatePlan(entries, params, options).report;
}

export function countConflicts(report: ConflictReport): number {
  return report.duplicates.length + report.invalidChars.length + report.existingFiles.length;
}

export function isReportEmpty(report: ConflictReport): boolean {
  return countConflicts(report) === 0;
}
