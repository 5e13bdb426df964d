import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, unlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ApplyProgress, ApplyResult } from "../apply.js";
import { applyPlan, classifyError, findStagedItems, runApply, sortResults, summarizeResults } from "../apply.js";
import { createBatch } from "../batch.js";
import { PlanRejectedError } from "../errors.js";
import type { SchemeInput } from "../scheme.js";
import { createScheme } from "../scheme.js";
import type { CheckOptions } from "../validator.js";
import { isReportEmpty, validatePlan } from "../validator.js";

let dir: string;

/** 1.txt → 2.txt, 2.txt → 3.txt */
const CHAIN: SchemeInput = {
  nameTemplate: "",
  numbering: { enabled: true, padding: 0, start: 2, separator: "" },
};

function files(...names: string[]): string[] {
  return names.map((name) => {
    const path = join(dir, name);
    writeFileSync(path, `content of ${name}`);
    return path;
  });
}

function validate(paths: string[], scheme: SchemeInput, options: CheckOptions = {}) {
  return validatePlan(createBatch(paths), createScheme(scheme), { platform: "posix", ...options });
}

function statuses(results: readonly ApplyResult[]): string[] {
  return results.map((r) => (r.outcome.status === "error" ? `error:${r.outcome.kind}` : r.outcome.status));
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "nomen-apply-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("applyPlan", () => {
  it("renames every file in place", async () => {
    const validated = validate(files("a.jpg", "b.jpg", "c.jpg"), { prefix: "new_" });
    const { results, summary } = await runApply(validated);
    expect(statuses(results)).toEqual(["success", "success", "success"]);
    expect(readdirSync(dir).sort()).toEqual(["new_a.jpg", "new_b.jpg", "new_c.jpg"]);
    expect(readFileSync(join(dir, "new_b.jpg"), "utf-8")).toBe("content of b.jpg");
    expect(summary).toEqual({ total: 3, succeeded: 3, failed: 0, skipped: 0, errorsByKind: {} });
  });

  it("keeps going when a source disappears after validation", async () => {
    const [a, b, c] = files("a.jpg", "b.jpg", "c.jpg");
    const validated = validate([a, b, c], { prefix: "new_" });
    unlinkSync(b);

    const { results, summary } = await runApply(validated);

    expect(statuses(results)).toEqual(["success", "error:SourceMissing", "success"]);
    const failed = results[1].outcome;
    expect(failed.status === "error" && failed.message).toBe(`Source file no longer exists: ${b}`);
    expect(failed.status === "error" && failed.timestamp instanceof Date).toBe(true);
    expect(readdirSync(dir).sort()).toEqual(["new_a.jpg", "new_c.jpg"]);
    expect(summary).toEqual({ total: 3, succeeded: 2, failed: 1, skipped: 0, errorsByKind: { SourceMissing: 1 } });
  });

  it("refuses a plan with duplicate targets before touching anything", async () => {
    const validated = validate(files("a.jpg", "b.jpg"), { nameTemplate: "same" });
    await expect(runApply(validated)).rejects.toBeInstanceOf(PlanRejectedError);
    await expect(runApply(validated, { override: true })).rejects.toMatchObject({ kind: "NameCollision" });
    expect(readdirSync(dir).sort()).toEqual(["a.jpg", "b.jpg"]);
  });

  it("refuses existing-file conflicts unless overridden, and never overwrites", async () => {
    const [a] = files("a.txt", "keep.txt");
    const validated = validate([a], { nameTemplate: "keep" });
    await expect(runApply(validated)).rejects.toMatchObject({ kind: "ExistingFileConflict" });

    const { results } = await runApply(validated, { override: true });
    expect(statuses(results)).toEqual(["error:ExistingFileConflict"]);
    const outcome = results[0].outcome;
    expect(outcome.status === "error" && outcome.message).toBe(`Target already exists: ${join(dir, "keep.txt")}`);
    expect(readFileSync(join(dir, "keep.txt"), "utf-8")).toBe("content of keep.txt");
    expect(existsSync(a)).toBe(true);
  });

  it("creates the destination folder once and moves files into it", async () => {
    const dest = join(dir, "out", "nested");
    const validated = validate(files("a.jpg", "b.jpg"), { numbering: { enabled: true } }, { destination: dest });
    const { results } = await runApply(validated);
    expect(statuses(results)).toEqual(["success", "success"]);
    expect(readdirSync(dest).sort()).toEqual(["a_01.jpg", "b_02.jpg"]);
    expect(readdirSync(dir).sort()).toEqual(["out"]);
  });

  it("reports every item when the destination folder cannot be created", async () => {
    files("blocker");
    const validated = validate(files("a.jpg", "b.jpg"), {}, { destination: join(dir, "blocker", "sub") });
    const { results } = await runApply(validated);
    expect(results).toHaveLength(2);
    for (const { outcome } of results) {
      expect(outcome.status).toBe("error");
      expect(outcome.status === "error" && outcome.message).toMatch(/^Could not create destination folder/);
    }
    expect(existsSync(join(dir, "a.jpg"))).toBe(true);
  });

  it("handles rename chains where a target is another file's source", async () => {
    const validated = validate(files("1.txt", "2.txt"), CHAIN);
    const { results } = await runApply(validated);
    expect(statuses(results)).toEqual(["success", "success"]);
    expect(readdirSync(dir).sort()).toEqual(["2.txt", "3.txt"]);
    expect(readFileSync(join(dir, "2.txt"), "utf-8")).toBe("content of 1.txt");
    expect(readFileSync(join(dir, "3.txt"), "utf-8")).toBe("content of 2.txt");
  });

  it("never replaces an unrelated file while staging a chain", async () => {
    const [one, two] = files("1.txt", "2.txt");
    writeFileSync(join(dir, "__nomen_1_2.txt"), "USER DATA");
    const validated = validate([one, two], CHAIN);
    expect(isReportEmpty(validated.report)).toBe(true);

    const { results } = await runApply(validated);

    expect(statuses(results)).toEqual(["success", "success"]);
    expect(readdirSync(dir).sort()).toEqual(["2.txt", "3.txt", "__nomen_1_2.txt"]);
    expect(readFileSync(join(dir, "__nomen_1_2.txt"), "utf-8")).toBe("USER DATA");
    expect(readFileSync(join(dir, "3.txt"), "utf-8")).toBe("content of 2.txt");
  });

  it("reports where a staged file was left when its path was taken by the chain", async () => {
    const [one, two] = files("1.txt", "2.txt");
    const validated = validate([one, two], CHAIN);
    writeFileSync(join(dir, "3.txt"), "late arrival");

    const { results } = await runApply(validated);

    expect(statuses(results)).toEqual(["success", "error:ExistingFileConflict"]);
    const outcome = results[1].outcome;
    const message = outcome.status === "error" ? outcome.message : "";
    const left = /^File left at (.+): Target already exists: (.+)$/.exec(message);
    expect(left?.[2]).toBe(join(dir, "3.txt"));
    const leftAt = left?.[1] ?? "";
    expect(readFileSync(leftAt, "utf-8")).toBe("content of 2.txt");
    expect(readFileSync(join(dir, "2.txt"), "utf-8")).toBe("content of 1.txt");
    expect(readFileSync(join(dir, "3.txt"), "utf-8")).toBe("late arrival");
  });

  it("moves a staged file back when its final move fails and its old path is free", async () => {
    const [one, two] = files("1.txt", "2.txt");
    const validated = validate([one, two], CHAIN);
    unlinkSync(one);
    writeFileSync(join(dir, "3.txt"), "late arrival");

    const { results } = await runApply(validated);

    expect(statuses(results)).toEqual(["error:SourceMissing", "error:ExistingFileConflict"]);
    const outcome = results[1].outcome;
    expect(outcome.status === "error" && outcome.message).toBe(`Target already exists: ${join(dir, "3.txt")}`);
    expect(readdirSync(dir).sort()).toEqual(["2.txt", "3.txt"]);
    expect(readFileSync(join(dir, "2.txt"), "utf-8")).toBe("content of 2.txt");
  });

  it("reports a source that vanished before it could be staged", async () => {
    const [one, two] = files("1.txt", "2.txt");
    const validated = validate([one, two], CHAIN);
    unlinkSync(two);

    const { results } = await runApply(validated);

    expect(statuses(results)).toEqual(["success", "error:SourceMissing"]);
    expect(readdirSync(dir)).toEqual(["2.txt"]);
    expect(readFileSync(join(dir, "2.txt"), "utf-8")).toBe("content of 1.txt");
  });

  it("succeeds without moving files whose name does not change", async () => {
    const validated = validate(files("a.jpg"), {});
    const { results } = await runApply(validated);
    expect(statuses(results)).toEqual(["success"]);
    expect(readdirSync(dir)).toEqual(["a.jpg"]);
  });

  it("reports progress after every item", async () => {
    const validated = validate(files("a.jpg", "b.jpg", "c.jpg"), { suffix: "_x" });
    const seen: ApplyProgress[] = [];
    await runApply(validated, { onProgress: (p) => seen.push(p) });
    expect(seen.map((p) => [p.completed, p.total])).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
    expect(seen[2].result.originalPath).toBe(join(dir, "c.jpg"));
  });

  it("moves files with several workers and tags results with their index", async () => {
    const names = ["a.jpg", "b.jpg", "c.jpg", "d.jpg", "e.jpg"];
    const validated = validate(files(...names), { caseOption: "upper" });
    const { results, summary } = await runApply(validated, { concurrency: 3 });
    expect(summary.succeeded).toBe(5);
    expect(sortResults(results).map((r) => r.index)).toEqual([0, 1, 2, 3, 4]);
    expect(readdirSync(dir).sort()).toEqual(["A.jpg", "B.jpg", "C.jpg", "D.jpg", "E.jpg"]);
  });

  it("skips every item when cancelled before starting", async () => {
    const validated = validate(files("a.jpg", "b.jpg"), { prefix: "new_" });
    const controller = new AbortController();
    controller.abort();
    const { results, summary } = await runApply(validated, { signal: controller.signal });
    expect(statuses(results)).toEqual(["skipped", "skipped"]);
    expect(summary.skipped).toBe(2);
    expect(readdirSync(dir).sort()).toEqual(["a.jpg", "b.jpg"]);
  });

  it("leaves every file whole when the consumer stops early", async () => {
    const validated = validate(files("a.jpg", "b.jpg", "c.jpg"), { prefix: "new_" });
    for await (const result of applyPlan(validated)) {
      expect(result.outcome.status).toBe("success");
      break;
    }
    const names = readdirSync(dir).sort();
    expect(names).toHaveLength(3);
    expect(names).toContain("new_a.jpg");
    for (const base of ["b.jpg", "c.jpg"]) {
      expect(names.includes(base) || names.includes(`new_${base}`)).toBe(true);
    }
  });
});

describe("findStagedItems", () => {
  const item = (originalPath: string, newPath: string, index: number) => ({
    originalPath,
    newName: newPath.slice(newPath.lastIndexOf("/") + 1),
    newPath,
    index,
  });

  it("stages sources that are another item's target", () => {
    const items = [item("/d/1.txt", "/d/2.txt", 0), item("/d/2.txt", "/d/3.txt", 1)];
    expect(findStagedItems(items, "posix")).toEqual([items[1]]);
  });

  it("matches targets by case on case-insensitive platforms only", () => {
    const items = [item("/d/a.jpg", "/d/b.jpg", 0), item("/d/B.jpg", "/d/c.jpg", 1)];
    expect(findStagedItems(items, "posix")).toEqual([]);
    expect(findStagedItems(items, "darwin")).toEqual([items[1]]);
    expect(findStagedItems(items, "win32")).toEqual([items[1]]);
  });

  it("leaves items that keep their name alone", () => {
    const items = [item("/d/a.jpg", "/d/a.jpg", 0), item("/d/b.jpg", "/d/a.jpg", 1)];
    expect(findStagedItems(items, "posix")).toEqual([]);
  });
});

describe("classifyError", () => {
  it("maps errno codes to error kinds", () => {
    const withCode = (code: string) => Object.assign(new Error(code), { code });
    expect(classifyError(withCode("ENOENT"))).toBe("SourceMissing");
    expect(classifyError(withCode("EACCES"))).toBe("PermissionDenied");
    expect(classifyError(withCode("EPERM"))).toBe("PermissionDenied");
    expect(classifyError(withCode("EEXIST"))).toBe("ExistingFileConflict");
    expect(classifyError(withCode("EIO"))).toBe("FilesystemOther");
    expect(classifyError("boom")).toBe("FilesystemOther");
  });
});

describe("summarizeResults", () => {
  it("counts outcomes and errors by kind", () => {
    const base = { originalPath: "/a", newPath: "/b" };
    const error = (kind: "SourceMissing" | "PermissionDenied") =>
      ({ status: "error", kind, message: "x", timestamp: new Date(0) }) as const;
    const results: ApplyResult[] = [
      { ...base, index: 0, outcome: { status: "success" } },
      { ...base, index: 1, outcome: error("PermissionDenied") },
      { ...base, index: 2, outcome: error("PermissionDenied") },
      { ...base, index: 3, outcome: error("SourceMissing") },
      { ...base, index: 4, outcome: { status: "skipped" } },
    ];
    expect(summarizeResults(results)).toEqual({
      total: 5,
      succeeded: 1,
      failed: 3,
      skipped: 1,
      errorsByKind: { PermissionDenied: 2, SourceMissing: 1 },
    });
  });
});
