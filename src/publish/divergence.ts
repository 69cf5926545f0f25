import { countCommits, mergeBase, onelineLog } from "../git/queries.js";
import { logger } from "../logger.js";
import { DivergenceError } from "./errors.js";
import type { SyncRemote } from "./remotes.js";

export type SyncStatus = "up-to-date" | "ahead" | "behind" | "diverged" | "unpublished";

export type DivergenceReport = {
  status: SyncStatus;
  remote: string;
  branch: string;
  local: string;
  remoteTip: string | null;
  base: string | null;
  ahead: number;
  behind: number;
  /** One-line logs of commits unique to each side; filled for behind and diverged. */
  localOnly: string[];
  remoteOnly: string[];
};

export function canPushOver(status: SyncStatus) {
  return status === "up-to-date" || status === "ahead" || status === "unpublished";
}

/** Classifies `local` against the remote tip by their merge base. */
export async function classifyDivergence(
  repoRoot: string,
  local: string,
  remoteTip: string | null,
): Promise<Pick<DivergenceReport, "status" | "base" | "ahead" | "behind">> {
  if (!remoteTip) {
    return { status: "unpublished", base: null, ahead: 0, behind: 0 };
  }
  if (local === remoteTip) {
    return { status: "up-to-date", base: local, ahead: 0, behind: 0 };
  }

  const base = await mergeBase(repoRoot, local, remoteTip);
  if (base === remoteTip) {
    return { status: "ahead", base, ahead: await countCommits(repoRoot, `${remoteTip}..${local}`), behind: 0 };
  }
  if (base === local) {
    return { status: "behind", base, ahead: 0, behind: await countCommits(repoRoot, `${local}..${remoteTip}`) };
  }
  return {
    status: "diverged",
    base,
    ahead: await countCommits(repoRoot, `${remoteTip}..${local}`),
    behind: await countCommits(repoRoot, `${local}..${remoteTip}`),
  };
}

/**
 * Fetches the branch from the sync remote (read-only) and reports how the
 * local commit relates to it. Never touches any other remote.
 */
export async function checkDivergence(options: {
  repoRoot: string;
  remote: SyncRemote;
  branch: string;
  local: string;
}): Promise<DivergenceReport> {
  const { repoRoot, remote, branch, local } = options;
  const remoteTip = await remote.fetchBranch(branch);
  const verdict = await classifyDivergence(repoRoot, local, remoteTip);

  let localOnly: string[] = [];
  let remoteOnly: string[] = [];
  if (remoteTip && (verdict.status === "diverged" || verdict.status === "behind")) {
    localOnly = await onelineLog(repoRoot, `${remoteTip}..${local}`);
    remoteOnly = await onelineLog(repoRoot, `${local}..${remoteTip}`);
  }

  logger.debug("divergence checked", {
    repoRoot,
    remote: remote.name,
    branch,
    local,
    remoteTip,
    ...verdict,
  });

  return {
    ...verdict,
    remote: remote.name,
    branch,
    local,
    remoteTip,
    localOnly,
    remoteOnly,
  };
}

/** Throws unless the report allows pushing the local branch over the remote. */
export function assertPushable(report: DivergenceReport): void {
  if (canPushOver(report.status)) return;
  if (!report.remoteTip || (report.status !== "behind" && report.status !== "diverged")) {
    throw new Error(`Unexpected sync status ${report.status}`);
  }
  throw new DivergenceError({
    status: report.status,
    remote: report.remote,
    branch: report.branch,
    local: report.local,
    remoteTip: report.remoteTip,
    base: report.base,
    ahead: report.ahead,
    behind: report.behind,
    localOnly: report.localOnly,
    remoteOnly: report.remoteOnly,
  });
}
