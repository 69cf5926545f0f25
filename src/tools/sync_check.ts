#!/usr/bin/env node
import { runSyncCheck } from "../publish/syncCheck.js";
import { logger } from "../logger.js";

function printUsage() {
  console.error("Usage: sync-check [--pull]");
  console.error("");
  console.error("  No flags: fetch and report (non-destructive)");
  console.error("  --pull:   fetch and fast-forward if behind");
  console.error("");
  console.error("Exit codes: 0 up to date or pulled, 1 behind, 2 error or diverged");
}

async function main() {
  const argv = process.argv.slice(2);
  const unknown = argv.filter((a) => a !== "--pull");
  if (unknown.length) {
    console.error(`Unknown argument: ${unknown[0]}`);
    printUsage();
    process.exitCode = 2;
    return;
  }

  const result = await runSyncCheck({
    cwd: process.cwd(),
    pull: argv.includes("--pull"),
    report: (line) => console.log(line),
  });
  process.exitCode = result.exitCode;
}

main().catch((error: unknown) => {
  logger.error("sync check failed", { error });
  console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 2;
});
