import { logger } from "../logger.js";
import { GitCommandError, gitSucceeds, runGit } from "./core.js";

async function orNullOnExit1(task: Promise<string>): Promise<string | null> {
  try {
    const value = await task;
    return value.length ? value : null;
  } catch (error) {
    if (error instanceof GitCommandError && error.exitCode === 1) return null;
    throw error;
  }
}

export async function resolveRepoRoot(cwd: string): Promise<string | null> {
  try {
    const res = await runGit(["rev-parse", "--show-toplevel"], { cwd });
    const root = res.stdout.trim();
    return root.length ? root : null;
  } catch (e) {
    logger.debug("Not inside a git work tree", { cwd, error: String(e) });
    return null;
  }
}

export async function resolveGitDir(repoRoot: string): Promise<string> {
  const res = await runGit(["rev-parse", "--absolute-git-dir"], { cwd: repoRoot });
  return res.stdout.trim();
}

/** Short name of the checked-out branch, or null on a detached HEAD. */
export async function getCurrentBranch(repoRoot: string): Promise<string | null> {
  return orNullOnExit1(
    runGit(["symbolic-ref", "--quiet", "--short", "HEAD"], { cwd: repoRoot }).then((r) => r.stdout.trim()),
  );
}

/** Commit id a ref points at, or null when the ref does not exist. */
export async function resolveCommit(repoRoot: string, ref: string): Promise<string | null> {
  return orNullOnExit1(
    runGit(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], { cwd: repoRoot }).then((r) =>
      r.stdout.trim(),
    ),
  );
}

export async function resolveTreeOf(repoRoot: string, commit: string): Promise<string> {
  const res = await runGit(["rev-parse", "--verify", `${commit}^{tree}`], { cwd: repoRoot });
  return res.stdout.trim();
}

/** Best common ancestor of two commits, or null for unrelated histories. */
export async function mergeBase(repoRoot: string, a: string, b: string): Promise<string | null> {
  return orNullOnExit1(runGit(["merge-base", a, b], { cwd: repoRoot }).then((r) => r.stdout.trim()));
}

export async function countCommits(repoRoot: string, range: string): Promise<number> {
  const res = await runGit(["rev-list", "--count", range], { cwd: repoRoot });
  return Number.parseInt(res.stdout.trim() || "0", 10) || 0;
}

export async function onelineLog(repoRoot: string, range: string): Promise<string[]> {
  const res = await runGit(["log", "--oneline", "--no-decorate", range], { cwd: repoRoot });
  return res.stdout.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

export async function diffStat(repoRoot: string, range: string): Promise<string> {
  const res = await runGit(["diff", "--stat", range], { cwd: repoRoot });
  return res.stdout.trimEnd();
}

/**
 * Staged or unstaged modifications to tracked files. Untracked files never
 * reach a commit, so they do not count.
 */
export async function hasUncommittedChanges(repoRoot: string): Promise<boolean> {
  const worktreeClean = await gitSucceeds(["diff", "--quiet"], { cwd: repoRoot });
  if (!worktreeClean) return true;
  const indexClean = await gitSucceeds(["diff", "--cached", "--quiet"], { cwd: repoRoot });
  return !indexClean;
}

export async function getRemoteUrl(repoRoot: string, remote: string): Promise<string | null> {
  try {
    const res = await runGit(["remote", "get-url", remote], { cwd: repoRoot });
    return res.stdout.trim() || null;
  } catch (e) {
    logger.debug("Remote not configured", { repoRoot, remote, error: String(e) });
    return null;
  }
}

export async function getUpstreamRef(repoRoot: string): Promise<string | null> {
  try {
    const res = await runGit(["rev-parse", "--abbrev-ref", "--symbolic-full-name", "@{u}"], { cwd: repoRoot });
    return res.stdout.trim() || null;
  } catch (e) {
    logger.debug("No upstream configured", { repoRoot, error: String(e) });
    return null;
  }
}
