/**
 * Script mode: non-interactive rename driven by flags.
 */

import { existsSync, statSync } from "node:fs";
import pc from "picocolors";
import { runApply } from "../apply.js";
import { createBatch, listFiles } from "../batch.js";
import { errorMessage } from "../errors.js";
import type { ParsedArgs } from "../flags.js";
import { parseCount, parseExtensions, parseIndexBy, schemeInputFromArgs } from "../flags.js";
import { samplePreview } from "../preview.js";
import type { SchemeParams } from "../scheme.js";
import { countConflicts, validatePlan } from "../validator.js";
import { formatFailures, formatPreview, formatReport, formatSummary, PREVIEW_MAX_LINES, resolveScheme } from "./common.js";

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    console.error(`Error: Directory does not exist: ${dir}`);
    process.exit(1);
  }
  if (!statSync(dir).isDirectory()) {
    console.error(`Error: Not a directory: ${dir}`);
    process.exit(1);
  }
}

function fail(err: unknown): never {
  console.error(pc.red(`Error: ${errorMessage(err)}`));
  process.exit(1);
}

export async function runScriptMode(args: ParsedArgs): Promise<void> {
  const { dir, dest, dryRun, yes, force } = args;
  if (dir === undefined) {
    console.error("Error: Script mode requires --dir.");
    process.exit(1);
  }
  ensureDir(dir);

  let scheme: SchemeParams;
  let concurrency: number | undefined;
  let extensions: string[] | undefined;
  let indexBy: "selection" | "listing";
  try {
    scheme = await resolveScheme({
      preset: args.preset,
      schemeFile: args.scheme,
      flags: schemeInputFromArgs(args),
    });
    concurrency = parseCount("concurrency", args.concurrency);
    extensions = parseExtensions(args.ext);
    indexBy = parseIndexBy(args.indexBy);
  } catch (err: unknown) {
    fail(err);
  }

  const listing = listFiles(dir);
  const selection = extensions ? listFiles(dir, { extensions }) : listing;
  if (selection.length === 0) {
    console.log("No files in that folder.");
    process.exit(0);
  }
  const entries = createBatch(selection, { indexBy, listing });

  console.log(formatPreview([...samplePreview(entries, scheme, PREVIEW_MAX_LINES)], entries.length));

  const validated = validatePlan(entries, scheme, dest !== undefined ? { destination: dest } : {});
  const { report } = validated;
  if (countConflicts(report) > 0) {
    console.error(pc.yellow(`\n${countConflicts(report)} conflict(s):`));
    console.error(formatReport(report));
    if (report.duplicates.length > 0) {
      fail("Duplicate target names cannot be applied; change the scheme.");
    }
    if (!force) {
      fail("Resolve the conflicts or pass --force to apply anyway.");
    }
  }

  if (dryRun) {
    process.exit(0);
  }
  if (!yes) {
    console.error("Use --yes to apply renames in script mode.");
    process.exit(1);
  }

  try {
    const { results, summary } = await runApply(validated, { concurrency, override: force });
    const failures = formatFailures(results);
    if (failures !== "") console.error(pc.red(failures));
    const line = formatSummary(summary);
    console.log(summary.failed > 0 ? pc.yellow(line) : pc.green(line));
    if (summary.failed > 0) process.exit(1);
  } catch (err: unknown) {
    fail(err);
  }
}
