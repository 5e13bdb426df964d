/**
 * Interactive mode: prompts for folder, selection and scheme, then preview,
 * conflict check and confirm.
 */

import { existsSync, statSync } from "node:fs";
import { basename } from "node:path";
import * as p from "@clack/prompts";
import pc from "picocolors";
import type { ApplyResult } from "../apply.js";
import { applyPlan, summarizeResults } from "../apply.js";
import type { IndexBy } from "../batch.js";
import { createBatch, IMAGE_EXTENSIONS, listFiles } from "../batch.js";
import { errorMessage } from "../errors.js";
import { VERSION } from "../flags.js";
import { BUILT_IN_PRESETS } from "../presets.js";
import { samplePreview } from "../preview.js";
import type { CaseOption, NumberingOptions, NumberPosition, SchemeInput, SchemeParams } from "../scheme.js";
import { createScheme } from "../scheme.js";
import { countConflicts, validatePlan } from "../validator.js";
import { formatFailures, formatPreview, formatReport, formatSummary, PREVIEW_MAX_LINES } from "./common.js";

function exitIfCancel<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  return value;
}

function validateCount(value: string | undefined): string | undefined {
  return /^\d+$/.test(value ?? "") ? undefined : "Enter a whole number (0 or more).";
}

async function askText(message: string, placeholder?: string): Promise<string> {
  const result = await p.text({ message, placeholder, defaultValue: "" });
  return exitIfCancel(result);
}

async function askCount(message: string, initialValue: number): Promise<number> {
  const result = await p.text({ message, initialValue: String(initialValue), validate: validateCount });
  return Number.parseInt(exitIfCancel(result), 10);
}

async function askNumbering(): Promise<Partial<NumberingOptions>> {
  const enabled = exitIfCancel(await p.confirm({ message: "Add sequential numbers?", initialValue: false }));
  if (!enabled) return { enabled: false };
  const padding = await askCount("Pad numbers to how many digits?", 2);
  const start = await askCount("Start at", 1);
  const step = await askCount("Step", 1);
  const position = exitIfCancel(
    await p.select<NumberPosition>({
      message: "Number position",
      options: [
        { value: "suffix", label: "After the name" },
        { value: "prefix", label: "Before the name" },
      ],
    }),
  );
  return { enabled, padding, start, step, position };
}

async function askCustomScheme(): Promise<SchemeInput> {
  const replaceWhole = exitIfCancel(
    await p.confirm({ message: "Replace the whole name?", initialValue: false }),
  );
  const nameTemplate = replaceWhole
    ? await askText("New name ({name} inserts the original name)", "e.g. holiday")
    : undefined;
  const prefix = await askText("Prefix", "(none)");
  const suffix = await askText("Suffix", "(none)");
  const find = await askText("Find", "(none)");
  const replace = find !== "" ? await askText("Replace with", "(empty removes it)") : "";
  const caseOption = exitIfCancel(
    await p.select<CaseOption>({
      message: "Case",
      options: [
        { value: "preserve", label: "Keep as is" },
        { value: "lower", label: "lowercase" },
        { value: "upper", label: "UPPERCASE" },
        { value: "title", label: "Title Case" },
      ],
    }),
  );
  const numbering = await askNumbering();
  return { prefix, suffix, find, replace, caseOption, numbering, ...(nameTemplate !== undefined ? { nameTemplate } : {}) };
}

async function askScheme(): Promise<SchemeParams> {
  const options = BUILT_IN_PRESETS.map((preset, i) => ({ value: String(i), label: preset.name }));
  options.push({ value: "custom", label: "Custom…" });
  const choice = exitIfCancel(await p.select<string>({ message: "Naming scheme", options }));
  const input = choice === "custom" ? await askCustomScheme() : BUILT_IN_PRESETS[Number.parseInt(choice, 10)].scheme;
  try {
    return createScheme(input);
  } catch (err: unknown) {
    p.log.error(errorMessage(err));
    process.exit(1);
  }
}

async function askSelection(dir: string): Promise<{ selected: string[]; listing: string[]; indexBy: IndexBy }> {
  const listing = listFiles(dir);
  const filter = exitIfCancel(
    await p.select<"all" | "images" | "pick">({
      message: "Files to include",
      options: [
        { value: "all", label: "All files" },
        { value: "images", label: `Images only (${IMAGE_EXTENSIONS.join(" ")})` },
        { value: "pick", label: "Pick files…" },
      ],
    }),
  );
  if (filter === "all") return { selected: listing, listing, indexBy: "selection" };
  if (filter === "images") {
    return { selected: listFiles(dir, { extensions: IMAGE_EXTENSIONS }), listing, indexBy: "selection" };
  }

  const picked = exitIfCancel(
    await p.multiselect<string>({
      message: "Select files",
      options: listing.map((file) => ({ value: file, label: basename(file) })),
      initialValues: listing,
      required: true,
    }),
  );
  const indexBy = exitIfCancel(
    await p.select<IndexBy>({
      message: "Number files by",
      options: [
        { value: "selection", label: "Position among selected files" },
        { value: "listing", label: "Position in the whole folder" },
      ],
    }),
  );
  return { selected: picked, listing, indexBy };
}

async function askDestination(): Promise<string | undefined> {
  const move = exitIfCancel(await p.confirm({ message: "Move renamed files to another folder?", initialValue: false }));
  if (!move) return undefined;
  const dest = exitIfCancel(await p.path({ message: "Destination folder", directory: true }));
  return dest !== "" ? dest : undefined;
}

export async function runInteractive(dryRun: boolean): Promise<void> {
  p.intro(pc.bold(pc.cyan(`nomen – batch file renamer v${VERSION}`)));

  const dir = exitIfCancel(
    await p.path({
      message: "Folder to rename files in",
      directory: true,
      initialValue: process.cwd(),
    }),
  );

  if (!existsSync(dir)) {
    p.log.error(`Directory does not exist: ${dir}`);
    process.exit(1);
  }
  if (!statSync(dir).isDirectory()) {
    p.log.error(`Not a directory: ${dir}`);
    process.exit(1);
  }

  const { selected, listing, indexBy } = await askSelection(dir);
  if (selected.length === 0) {
    p.outro(pc.yellow("No files to rename. Exiting."));
    process.exit(0);
  }
  const entries = createBatch(selected, { indexBy, listing });

  const scheme = await askScheme();
  p.note(formatPreview([...samplePreview(entries, scheme, PREVIEW_MAX_LINES)], entries.length), "Preview");

  const destination = await askDestination();
  const validated = validatePlan(entries, scheme, destination !== undefined ? { destination } : {});
  const { report } = validated;
  let override = false;
  if (countConflicts(report) > 0) {
    p.note(formatReport(report), pc.yellow(`${countConflicts(report)} conflict(s)`));
    if (report.duplicates.length > 0) {
      p.log.error("Duplicate target names cannot be applied. Change the scheme and try again.");
      process.exit(1);
    }
    if (!dryRun) {
      override = exitIfCancel(await p.confirm({ message: "Apply anyway?", initialValue: false }));
      if (!override) {
        p.cancel("Rename cancelled.");
        process.exit(0);
      }
    }
  }

  if (dryRun) {
    p.note("Dry run: no files were renamed.", "Done");
    p.outro(pc.green("Done."));
    process.exit(0);
  }

  const confirmResult = exitIfCancel(
    await p.confirm({
      message: `Rename ${entries.length} file(s)?`,
      initialValue: false,
    }),
  );
  if (!confirmResult) {
    p.cancel("Rename cancelled.");
    process.exit(0);
  }

  // Ctrl+C stops files that have not started; the current move finishes
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  const s = p.spinner();
  s.start("Renaming…");
  const results: ApplyResult[] = [];
  try {
    for await (const result of applyPlan(validated, {
      override,
      signal: controller.signal,
      onProgress: ({ completed, total }) => s.message(`Renaming… ${completed}/${total}`),
    })) {
      results.push(result);
    }
  } catch (err: unknown) {
    s.stop("Failed.");
    p.log.error(errorMessage(err));
    process.exit(1);
  } finally {
    process.off("SIGINT", onInterrupt);
  }

  const summary = summarizeResults(results);
  s.stop(summary.failed > 0 ? "Finished with errors." : "Done.");
  const failures = formatFailures(results);
  if (failures !== "") p.log.error(failures);
  p.note(formatSummary(summary), "Done");
  p.outro(summary.failed > 0 ? pc.yellow("Some files were not renamed.") : pc.green("Done."));
  if (summary.failed > 0) process.exit(1);
}
