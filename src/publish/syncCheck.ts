import fs from "fs/promises";
import path from "path";
import { cfg } from "../config.js";
import { runGit } from "../git/core.js";
import {
  diffStat,
  getCurrentBranch,
  getUpstreamRef,
  onelineLog,
  resolveCommit,
  resolveRepoRoot,
} from "../git/queries.js";
import { logger } from "../logger.js";
import { classifyDivergence, type SyncStatus } from "./divergence.js";
import { readPrivateRemote } from "./filterConfig.js";
import type { StatusReporter } from "./FilteredPublisher.js";
import { GitSyncRemote, trackingRef } from "./remotes.js";

export type SyncCheckResult = {
  exitCode: 0 | 1 | 2;
  status: SyncStatus | "skipped" | "error" | "pulled";
};

async function readDualRemoteConfig(repoRoot: string): Promise<string | null> {
  const file = path.join(repoRoot, cfg.publish.configFile);
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (error) {
    logger.debug("no publish config, using upstream", { file, error: String(error) });
    return null;
  }
  return readPrivateRemote(text);
}

/**
 * Reports whether the current branch needs pulling. In a dual-remote
 * project only the private remote is consulted; the public remote is
 * never fetched or merged.
 */
export async function runSyncCheck(options: {
  cwd: string;
  pull?: boolean;
  report?: StatusReporter;
}): Promise<SyncCheckResult> {
  const report = options.report ?? (() => undefined);
  const fail = (line: string): SyncCheckResult => {
    report(line);
    return { exitCode: 2, status: "error" };
  };

  const repoRoot = await resolveRepoRoot(options.cwd);
  if (!repoRoot) return fail("ERROR: Not a git repo.");

  const branch = await getCurrentBranch(repoRoot);
  if (!branch) return fail("ERROR: Detached HEAD, cannot check remote.");

  const privateRemote = await readDualRemoteConfig(repoRoot);

  let compareRef: string;
  if (privateRemote) {
    report(`Dual-remote project detected, syncing with '${privateRemote}' only.`);
    try {
      await new GitSyncRemote(repoRoot, privateRemote).fetchBranch(branch);
    } catch (error) {
      logger.debug("sync fetch failed", { repoRoot, privateRemote, error });
      return fail(`WARNING: git fetch ${privateRemote} failed (network issue?).`);
    }
    compareRef = trackingRef(privateRemote, branch);
  } else {
    const upstream = await getUpstreamRef(repoRoot);
    if (!upstream) {
      report(`No upstream set for '${branch}', skipping.`);
      return { exitCode: 0, status: "skipped" };
    }
    try {
      await runGit(["fetch", "--quiet"], { cwd: repoRoot });
    } catch (error) {
      logger.debug("sync fetch failed", { repoRoot, upstream, error });
      return fail("WARNING: git fetch failed (network issue?).");
    }
    compareRef = upstream;
  }

  const local = await resolveCommit(repoRoot, "HEAD");
  const remote = await resolveCommit(repoRoot, compareRef);
  if (!local || !remote) {
    report(`Remote ref '${compareRef}' not found, skipping.`);
    return { exitCode: 0, status: "skipped" };
  }

  const verdict = await classifyDivergence(repoRoot, local, remote);
  switch (verdict.status) {
    case "up-to-date":
    case "unpublished":
      report("Up to date.");
      return { exitCode: 0, status: "up-to-date" };
    case "ahead":
      report(`Ahead of remote by ${verdict.ahead} commit(s) (unpushed). No action needed.`);
      return { exitCode: 0, status: "ahead" };
    case "diverged":
      report(`DIVERGED: ${verdict.ahead} ahead, ${verdict.behind} behind. Manual resolution needed.`);
      report("");
      report("Local commits not on remote:");
      for (const line of await onelineLog(repoRoot, `${remote}..${local}`)) report(line);
      report("");
      report("Remote commits not local:");
      for (const line of await onelineLog(repoRoot, `${local}..${remote}`)) report(line);
      return { exitCode: 2, status: "diverged" };
    case "behind":
      break;
  }

  report(`BEHIND remote by ${verdict.behind} commit(s).`);
  report("");
  report("Incoming changes:");
  for (const line of await onelineLog(repoRoot, `${local}..${remote}`)) report(line);
  report("");
  report("Files changed:");
  report(await diffStat(repoRoot, `${local}..${remote}`));

  if (!options.pull) return { exitCode: 1, status: "behind" };

  report("");
  report("Pulling...");
  try {
    await runGit(["merge", "--ff-only", compareRef], { cwd: repoRoot });
  } catch (error) {
    logger.debug("fast-forward failed", { repoRoot, compareRef, error });
    return fail("WARNING: Fast-forward merge failed. Manual merge may be needed.");
  }
  report(privateRemote ? `Pulled successfully (from ${privateRemote}).` : "Pulled successfully.");
  return { exitCode: 0, status: "pulled" };
}
