#!/usr/bin/env node
/**
 * nomen – batch file renamer CLI
 * Supports --help, --version, --dry-run, and script mode (--dir plus scheme flags).
 */

import { runInteractive } from "./commands/interactive.js";
import { runScriptMode } from "./commands/script.js";
import { isScriptMode, parseArgs, printHelp, printVersion } from "./flags.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (isScriptMode(args)) {
    await runScriptMode(args);
    return;
  }

  await runInteractive(args.dryRun);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
