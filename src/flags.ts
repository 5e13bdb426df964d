/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";
import type { IndexBy } from "./batch.js";
import type { NumberingOptions, SchemeInput } from "./scheme.js";
import { isCaseOption, isNumberPosition } from "./scheme.js";

export const VERSION = "0.1.0";

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  dryRun: boolean;
  yes: boolean;
  force: boolean;
  number: boolean;
  dir: string | undefined;
  ext: string | undefined;
  prefix: string | undefined;
  suffix: string | undefined;
  find: string | undefined;
  replace: string | undefined;
  case: string | undefined;
  pad: string | undefined;
  start: string | undefined;
  step: string | undefined;
  numberPosition: string | undefined;
  separator: string | undefined;
  template: string | undefined;
  dest: string | undefined;
  indexBy: string | undefined;
  scheme: string | undefined;
  preset: string | undefined;
  concurrency: string | undefined;
}

const ARGS_CONFIG = {
  boolean: ["help", "version", "dry-run", "yes", "force", "number"] as const,
  string: [
    "dir", "ext", "prefix", "suffix", "find", "replace", "case", "pad", "start", "step",
    "number-position", "separator", "template", "dest", "index-by", "scheme", "preset",
    "concurrency",
  ] as const,
  alias: { h: "help", v: "version", y: "yes" } as const,
};

export function parseArgs(argv: string[]): ParsedArgs {
  const raw = parse(argv, ARGS_CONFIG);
  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    dryRun: Boolean(raw["dry-run"]),
    yes: Boolean(raw.yes),
    force: Boolean(raw.force),
    number: Boolean(raw.number),
    dir: raw.dir,
    ext: raw.ext,
    prefix: raw.prefix,
    suffix: raw.suffix,
    find: raw.find,
    replace: raw.replace,
    case: raw.case,
    pad: raw.pad,
    start: raw.start,
    step: raw.step,
    numberPosition: raw["number-position"],
    separator: raw.separator,
    template: raw.template,
    dest: raw.dest,
    indexBy: raw["index-by"],
    scheme: raw.scheme,
    preset: raw.preset,
    concurrency: raw.concurrency,
  };
}

/** True when any flag that only makes sense without prompts is present. */
export function isScriptMode(args: ParsedArgs): boolean {
  const valueFlags = [
    args.dir, args.ext, args.prefix, args.suffix, args.find, args.replace, args.case,
    args.pad, args.start, args.step, args.numberPosition, args.separator, args.template,
    args.dest, args.indexBy, args.scheme, args.preset, args.concurrency,
  ];
  return args.number || valueFlags.some((v) => v !== undefined);
}

export function parseCount(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new Error(`--${flag} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

export function parseExtensions(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const list = value
    .split(",")
    .map((e) => e.trim())
    .filter((e) => e !== "");
  return list.length > 0 ? list : undefined;
}

export function parseIndexBy(value: string | undefined): IndexBy {
  if (value === undefined || value === "selection") return "selection";
  if (value === "listing") return "listing";
  throw new Error(`--index-by must be "selection" or "listing", got "${value}"`);
}

/** Scheme fields given on the command line; absent flags are left out. */
export function schemeInputFromArgs(args: ParsedArgs): SchemeInput {
  const scheme: { -readonly [K in keyof SchemeInput]?: SchemeInput[K] } = {};
  if (args.prefix !== undefined) scheme.prefix = args.prefix;
  if (args.suffix !== undefined) scheme.suffix = args.suffix;
  if (args.find !== undefined) scheme.find = args.find;
  if (args.replace !== undefined) scheme.replace = args.replace;
  if (args.template !== undefined) scheme.nameTemplate = args.template;
  if (args.case !== undefined) {
    if (!isCaseOption(args.case)) {
      throw new Error(`--case must be one of preserve, lower, upper, title, got "${args.case}"`);
    }
    scheme.caseOption = args.case;
  }

  const numbering: { -readonly [K in keyof NumberingOptions]?: NumberingOptions[K] } = {};
  if (args.number) numbering.enabled = true;
  const padding = parseCount("pad", args.pad);
  const start = parseCount("start", args.start);
  const step = parseCount("step", args.step);
  if (padding !== undefined) numbering.padding = padding;
  if (start !== undefined) numbering.start = start;
  if (step !== undefined) numbering.step = step;
  if (args.separator !== undefined) numbering.separator = args.separator;
  if (args.numberPosition !== undefined) {
    if (!isNumberPosition(args.numberPosition)) {
      throw new Error(`--number-position must be "prefix" or "suffix", got "${args.numberPosition}"`);
    }
    numbering.position = args.numberPosition;
  }
  if (Object.keys(numbering).length > 0) scheme.numbering = numbering;
  return scheme;
}

export function printHelp(): void {
  const usage = `nomen – batch rename files with a composable naming scheme

Usage:
  nomen                  Interactive mode (prompts for folder and scheme)
  nomen --help           Show this help
  nomen --version        Show version
  nomen --dry-run        Interactive mode, show preview only (no rename)
  nomen --dir <path> [scheme options] [options]   Script mode

Scheme options:
  --prefix <text>        Text added before the name
  --suffix <text>        Text added after the name
  --find <text>          Literal text to replace in the name
  --replace <text>       Replacement for --find
  --case <option>        preserve | lower | upper | title
  --number               Add a sequential number
  --pad <n>              Digits to zero-pad the number to (default 2, 0 = none)
  --start <n>            First number (default 1)
  --step <n>             Increment between numbers (default 1)
  --number-position <p>  prefix | suffix (default suffix)
  --separator <text>     Text between number and name (default "_")
  --template <text>      Replace the name; {name} and {ext} insert the original parts
  --preset <name>        Start from a built-in preset
  --scheme <file>        Start from a JSON scheme file

Options:
  --dir <path>           Folder with the files to rename
  --ext <list>           Only files with these extensions (e.g. jpg,png)
  --dest <path>          Move renamed files into this folder
  --index-by <mode>      Number by position in the selection (default) or the full listing
  --concurrency <n>      Files moved at once (default 1)
  --dry-run              Show preview and conflicts only, do not rename
  --yes, -y              Apply renames without confirmation
  --force                Apply despite invalid-name or existing-file conflicts

Examples:
  nomen
  nomen --dir ./photos --ext jpg --template holiday --number --pad 3 --dry-run
  nomen --dir . --find " " --replace "_" --case lower --yes
  nomen --dir ./scans --preset "Numbered photos" --dest ./sorted --yes`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
