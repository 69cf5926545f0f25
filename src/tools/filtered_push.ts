#!/usr/bin/env node
import { DivergenceError, PublishError } from "../publish/errors.js";
import { runFilteredPush } from "../publish/runFilteredPush.js";
import { logger } from "../logger.js";

function printUsage() {
  console.error("Usage: filtered-push [--dry-run] [--config <path>] [--repo <path>]");
  console.error("");
  console.error("Pushes the current branch in full to the private remote, then publishes");
  console.error("a filtered commit to the public remote. Reads .push-filter.conf from the");
  console.error("repository root unless --config is given.");
  console.error("");
  console.error("Flags:");
  console.error("  --dry-run          Compare and report, push nothing");
  console.error("  --config <path>    Publish config (relative to the repository root)");
  console.error("  --repo <path>      Run against this directory instead of the cwd");
}

type CliArgs = { dryRun: boolean; configPath?: string; cwd: string; help: boolean };

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { dryRun: false, cwd: process.cwd(), help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--dry-run") args.dryRun = true;
    else if (arg === "--help" || arg === "-h") args.help = true;
    else if (arg === "--config" || arg === "--repo") {
      const value = argv[++i];
      if (!value) throw new Error(`${arg} requires a value`);
      if (arg === "--config") args.configPath = value;
      else args.cwd = value;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return args;
}

function printFailure(error: PublishError) {
  console.error(`ERROR: ${error.message}`);
  if (error instanceof DivergenceError) {
    const d = error.details;
    console.error(`  Local:  ${d.local}`);
    console.error(`  Remote: ${d.remoteTip}`);
    console.error(`  Base:   ${d.base ?? "none"}`);
    if (d.localOnly.length) {
      console.error("");
      console.error("Local commits not on remote:");
      for (const line of d.localOnly) console.error(`  ${line}`);
    }
    if (d.remoteOnly.length) {
      console.error("");
      console.error("Remote commits not local:");
      for (const line of d.remoteOnly) console.error(`  ${line}`);
    }
  }
  if (error.hint) console.error(error.hint);
}

async function main() {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    printUsage();
    process.exitCode = 1;
    return;
  }
  if (args.help) {
    printUsage();
    return;
  }

  try {
    await runFilteredPush({
      cwd: args.cwd,
      configPath: args.configPath,
      dryRun: args.dryRun,
      report: (line) => console.log(line),
    });
  } catch (error) {
    if (error instanceof PublishError) {
      printFailure(error);
    } else {
      logger.error("filtered push failed", { error });
      console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
