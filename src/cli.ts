#!/usr/bin/env node
import { USAGE, buildRunConfig, isHelpRequested } from "./config.js";
import { formatRunSummary, run } from "./runner.js";

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv.length === 0 || isHelpRequested(argv)) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }
  const config = buildRunConfig(argv);
  const summary = await run(config);
  process.stdout.write(`${formatRunSummary(summary)}\n`);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Fatal error: ${message}\n`);
  process.exit(1);
});
