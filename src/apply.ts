/**
 * Apply a validated plan to the filesystem. Every item yields exactly one
 * result; failures are captured per item and never abort the batch.
 */

import { constants } from "node:fs";
import { copyFile, link, lstat, mkdir, mkdtemp, rename, rmdir, unlink } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import type { ApplyErrorKind } from "./errors.js";
import { errorMessage, PlanRejectedError } from "./errors.js";
import type { ConflictReport, FilenamePlatform, RenamePlanItem, ValidatedPlan } from "./validator.js";
import { pathKey } from "./validator.js";

export type ApplyOutcome =
  | { readonly status: "success" }
  | {
      readonly status: "error";
      readonly kind: ApplyErrorKind;
      readonly message: string;
      readonly timestamp: Date;
    }
  | { readonly status: "skipped" };

export interface ApplyResult {
  readonly originalPath: string;
  readonly newPath: string;
  readonly index: number;
  readonly outcome: ApplyOutcome;
}

export interface ApplyProgress {
  readonly completed: number;
  readonly total: number;
  readonly result: ApplyResult;
}

export interface ApplyOptions {
  /** Moves running at once. Defaults to 1. */
  concurrency?: number;
  /** Aborting skips items that have not started; running moves finish. */
  signal?: AbortSignal;
  onProgress?: (progress: ApplyProgress) => void;
  /** Run despite invalid-name or existing-file conflicts. Duplicates are never overridden. */
  override?: boolean;
}

export interface ApplySummary {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
  readonly errorsByKind: Readonly<Partial<Record<ApplyErrorKind, number>>>;
}

interface Job {
  readonly item: RenamePlanItem;
  /** Where the file is now: its original path, or a staging name. */
  readonly from: string;
  /** Staged files have already been moved once and must not be skipped. */
  readonly staged: boolean;
  readonly stageError?: ApplyResult;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

export function classifyError(err: unknown): ApplyErrorKind {
  switch (errnoCode(err)) {
    case "ENOENT":
      return "SourceMissing";
    case "EACCES":
    case "EPERM":
      return "PermissionDenied";
    case "EEXIST":
    case "ENOTEMPTY":
      return "ExistingFileConflict";
    default:
      return "FilesystemOther";
  }
}

function success(item: RenamePlanItem): ApplyResult {
  return { originalPath: item.originalPath, newPath: item.newPath, index: item.index, outcome: { status: "success" } };
}

function skipped(item: RenamePlanItem): ApplyResult {
  return { originalPath: item.originalPath, newPath: item.newPath, index: item.index, outcome: { status: "skipped" } };
}

function failure(item: RenamePlanItem, kind: ApplyErrorKind, message: string): ApplyResult {
  return {
    originalPath: item.originalPath,
    newPath: item.newPath,
    index: item.index,
    outcome: { status: "error", kind, message, timestamp: new Date() },
  };
}

function failureFrom(item: RenamePlanItem, err: unknown, context?: string): ApplyResult {
  const message = context ? `${context}: ${errorMessage(err)}` : errorMessage(err);
  return failure(item, classifyError(err), message);
}

async function statOrUndefined(p: string) {
  try {
    return await lstat(p);
  } catch (err: unknown) {
    if (errnoCode(err) === "ENOENT") return undefined;
    throw err;
  }
}

function samePath(a: string, b: string): boolean {
  return resolve(a) === resolve(b);
}

/** Throws PlanRejectedError when the report still blocks execution. */
export function assertRunnable(report: ConflictReport, override = false): void {
  if (report.duplicates.length > 0) {
    throw new PlanRejectedError(
      "NameCollision",
      `Plan has ${report.duplicates.length} duplicate target name(s); change the scheme before applying.`,
    );
  }
  if (override) return;
  if (report.invalidChars.length > 0) {
    throw new PlanRejectedError(
      "InvalidCharacter",
      `Plan has ${report.invalidChars.length} invalid target name(s).`,
    );
  }
  if (report.existingFiles.length > 0) {
    throw new PlanRejectedError(
      "ExistingFileConflict",
      `Plan would overwrite ${report.existingFiles.length} existing file(s).`,
    );
  }
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err: unknown) {
    if (errnoCode(err) !== "EXDEV") throw err;
    await copyFile(from, to, constants.COPYFILE_EXCL);
    try {
      await unlink(from);
    } catch (unlinkErr: unknown) {
      throw Object.assign(
        new Error(`Copied to ${to} but could not remove ${from}: ${errorMessage(unlinkErr)}`),
        { code: errnoCode(unlinkErr) },
      );
    }
  }
}

async function moveItem(job: Job): Promise<ApplyResult> {
  const { item, from } = job;
  if (!job.staged && samePath(item.originalPath, item.newPath)) return success(item);

  const source = await statOrUndefined(from);
  if (!source) {
    return failure(item, "SourceMissing", `Source file no longer exists: ${item.originalPath}`);
  }
  const target = await statOrUndefined(item.newPath);
  // a case-only rename sees the source itself at the target path
  if (target && !(target.dev === source.dev && target.ino === source.ino)) {
    return failure(item, "ExistingFileConflict", `Target already exists: ${item.newPath}`);
  }
  await moveFile(from, item.newPath);
  return success(item);
}

/**
 * Put a staged file whose move failed back at its original path. `link`
 * refuses an occupied path, so an earlier chain member that already moved
 * there is never replaced.
 */
async function restoreStaged(job: Job, result: ApplyResult): Promise<ApplyResult> {
  const { outcome } = result;
  if (outcome.status !== "error") return result;
  try {
    if (!(await statOrUndefined(job.from))) return result;
    await link(job.from, job.item.originalPath);
  } catch {
    return failure(job.item, outcome.kind, `File left at ${job.from}: ${outcome.message}`);
  }
  try {
    await unlink(job.from);
  } catch (err: unknown) {
    return failure(
      job.item,
      outcome.kind,
      `${outcome.message} (restored to ${job.item.originalPath}; a second link remains at ${job.from}: ${errorMessage(err)})`,
    );
  }
  return result;
}

async function runJob(job: Job, cancelled: () => boolean): Promise<ApplyResult> {
  if (job.stageError) return job.stageError;
  if (!job.staged && cancelled()) return skipped(job.item);
  let result: ApplyResult;
  try {
    result = await moveItem(job);
  } catch (err: unknown) {
    result = failureFrom(job.item, err);
  }
  return job.staged ? restoreStaged(job, result) : result;
}

interface Staging {
  readonly jobs: Job[];
  /** Temporary directories created for staging, removed once every job is done. */
  readonly dirs: string[];
}

/**
 * Items whose source is another item's target, keyed the way the validator
 * compares paths, so swaps and rename chains never trip over each other.
 */
export function findStagedItems(items: readonly RenamePlanItem[], platform: FilenamePlatform): RenamePlanItem[] {
  const moving = items.filter((item) => !samePath(item.originalPath, item.newPath));
  const targets = new Set(moving.map((item) => pathKey(item.newPath, platform)));
  return moving.filter((item) => targets.has(pathKey(item.originalPath, platform)));
}

/**
 * Move staged sources out of the way first. Each source directory gets a
 * fresh mkdtemp directory, so staging cannot land on an existing file.
 */
async function stageSources(items: readonly RenamePlanItem[], platform: FilenamePlatform): Promise<Staging> {
  const staged = new Set(findStagedItems(items, platform));
  const stagingDirs = new Map<string, string>();
  const jobs: Job[] = [];
  for (const item of items) {
    if (!staged.has(item)) {
      jobs.push({ item, from: item.originalPath, staged: false });
      continue;
    }
    const sourceDir = dirname(resolve(item.originalPath));
    try {
      let stagingDir = stagingDirs.get(sourceDir);
      if (stagingDir === undefined) {
        stagingDir = await mkdtemp(join(sourceDir, ".nomen-"));
        stagingDirs.set(sourceDir, stagingDir);
      }
      const temp = join(stagingDir, `${item.index}_${basename(item.originalPath)}`);
      await rename(item.originalPath, temp);
      jobs.push({ item, from: temp, staged: true });
    } catch (err: unknown) {
      jobs.push({ item, from: item.originalPath, staged: false, stageError: failureFrom(item, err) });
    }
  }
  return { jobs, dirs: [...stagingDirs.values()] };
}

/** Remove staging directories; one that still holds a stranded file stays. */
async function removeStagingDirs(dirs: readonly string[]): Promise<void> {
  for (const dir of dirs) {
    try {
      await rmdir(dir);
    } catch (err: unknown) {
      if (errnoCode(err) !== "ENOTEMPTY" && errnoCode(err) !== "EEXIST") throw err;
    }
  }
}

/** Buffers results from concurrent workers for a single consumer. */
class ResultChannel<T> {
  private readonly buffer: T[] = [];
  private waiter: (() => void) | undefined;

  push(value: T): void {
    this.buffer.push(value);
    const wake = this.waiter;
    this.waiter = undefined;
    wake?.();
  }

  async take(): Promise<T> {
    for (;;) {
      const value = this.buffer.shift();
      if (value !== undefined) return value;
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }
}

/**
 * Execute a validated plan. Results stream in completion order, tagged with
 * their batch index; with the default concurrency of 1 that is plan order.
 */
export async function* applyPlan(
  validated: ValidatedPlan,
  options: ApplyOptions = {},
): AsyncGenerator<ApplyResult, void, undefined> {
  assertRunnable(validated.report, options.override);

  const { items, destination } = validated.plan;
  const total = items.length;
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  let completed = 0;
  const report = (result: ApplyResult): ApplyResult => {
    completed++;
    options.onProgress?.({ completed, total, result });
    return result;
  };

  if (options.signal?.aborted) {
    for (const item of items) yield report(skipped(item));
    return;
  }

  if (destination !== undefined) {
    try {
      await mkdir(destination, { recursive: true });
    } catch (err: unknown) {
      for (const item of items) {
        yield report(failureFrom(item, err, `Could not create destination folder ${destination}`));
      }
      return;
    }
  }

  const { jobs, dirs } = await stageSources(items, validated.platform);
  let stopped = false;
  const cancelled = () => stopped || options.signal?.aborted === true;
  const channel = new ResultChannel<ApplyResult>();
  let cursor = 0;
  const worker = async (): Promise<void> => {
    while (cursor < jobs.length) {
      const job = jobs[cursor++];
      channel.push(await runJob(job, cancelled));
    }
  };
  const workers = Promise.all(Array.from({ length: Math.min(concurrency, jobs.length) }, worker));

  try {
    for (let i = 0; i < jobs.length; i++) {
      yield report(await channel.take());
    }
  } finally {
    // consumer stopped early: let in-flight and staged moves finish, skip the rest
    stopped = true;
    await workers;
    await removeStagingDirs(dirs);
  }
}

export function summarizeResults(results: readonly ApplyResult[]): ApplySummary {
  let succeeded = 0;
  let failed = 0;
  let skippedCount = 0;
  const errorsByKind: Partial<Record<ApplyErrorKind, number>> = {};
  for (const { outcome } of results) {
    if (outcome.status === "success") succeeded++;
    else if (outcome.status === "skipped") skippedCount++;
    else {
      failed++;
      errorsByKind[outcome.kind] = (errorsByKind[outcome.kind] ?? 0) + 1;
    }
  }
  return { total: results.length, succeeded, failed, skipped: skippedCount, errorsByKind };
}

/** Results back in batch order. */
export function sortResults(results: readonly ApplyResult[]): ApplyResult[] {
  return [...results].sort((a, b) => a.index - b.index);
}

/** Drain applyPlan and summarize. */
export async function runApply(
  validated: ValidatedPlan,
  options: ApplyOptions = {},
): Promise<{ results: ApplyResult[]; summary: ApplySummary }> {
  const results: ApplyResult[] = [];
  for await (const result of applyPlan(validated, options)) {
    results.push(result);
  }
  return { results, summary: summarizeResults(results) };
}
