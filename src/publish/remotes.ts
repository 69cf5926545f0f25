import { GitCommandError, runGit } from "../git/core.js";
import { updateRef } from "../git/objects.js";
import { resolveCommit } from "../git/queries.js";
import { maskRemote } from "../git/utils/remoteUtils.js";
import { logger } from "../logger.js";
import { PushRejectedError, TransportError } from "./errors.js";

/**
 * A remote the engine may write to. Its branch position is only ever read
 * from the local remote-tracking ref; nothing here contacts the remote
 * except `push`.
 */
export interface PublishTarget {
  readonly name: string;
  lastKnownTip(branch: string): Promise<string | null>;
  /**
   * Updates `refs/heads/<branch>` on the remote to `oid` without force and
   * moves the local tracking ref along on success.
   */
  push(oid: string, branch: string): Promise<void>;
}

/** The private role: a publish target that may also be fetched from. */
export interface SyncRemote extends PublishTarget {
  /** Read-only fetch of one branch; null when the remote has no such branch. */
  fetchBranch(branch: string): Promise<string | null>;
}

const REJECTED =
  /\[rejected\]|\[remote rejected\]|non-fast-forward|fetch first|stale info|updates were rejected/i;
const MISSING_REMOTE_REF = /couldn't find remote ref|could not find remote ref/i;

export function trackingRef(remote: string, branch: string) {
  return `refs/remotes/${remote}/${branch}`;
}

export class GitPublishTarget implements PublishTarget {
  constructor(
    protected readonly repoRoot: string,
    readonly name: string,
  ) {}

  async lastKnownTip(branch: string): Promise<string | null> {
    try {
      return await resolveCommit(this.repoRoot, trackingRef(this.name, branch));
    } catch (error) {
      throw new TransportError(this.name, `Unable to resolve ${this.name}/${branch}`, error);
    }
  }

  async push(oid: string, branch: string): Promise<void> {
    const ref = `refs/heads/${branch}`;
    try {
      await runGit(["push", "--porcelain", this.name, `${oid}:${ref}`], { cwd: this.repoRoot });
    } catch (error) {
      if (error instanceof GitCommandError && REJECTED.test(error.output)) {
        throw new PushRejectedError(
          this.name,
          ref,
          `${this.name} rejected the update of ${branch} to ${oid.slice(0, 12)}`,
          error,
        );
      }
      throw new TransportError(this.name, `Push to ${this.name} failed`, error);
    }

    try {
      await updateRef(this.repoRoot, trackingRef(this.name, branch), oid);
    } catch (error) {
      // remote already moved; the next run chains onto this ref
      logger.warn("pushed, but failed to move the tracking ref", {
        remote: this.name,
        branch,
        oid,
        error,
      });
    }
    logger.debug("push complete", { remote: this.name, branch, oid });
  }
}

export class GitSyncRemote extends GitPublishTarget implements SyncRemote {
  async fetchBranch(branch: string): Promise<string | null> {
    const tracking = trackingRef(this.name, branch);
    try {
      await runGit(
        ["fetch", "--quiet", "--no-tags", this.name, `+refs/heads/${branch}:${tracking}`],
        { cwd: this.repoRoot },
      );
    } catch (error) {
      if (error instanceof GitCommandError && MISSING_REMOTE_REF.test(error.output)) {
        logger.debug("remote has no such branch", { remote: this.name, branch });
        return null;
      }
      throw new TransportError(this.name, `Fetch from ${this.name} failed`, error);
    }
    return resolveCommit(this.repoRoot, tracking);
  }
}

export async function describeRemote(repoRoot: string, name: string): Promise<string> {
  const res = await runGit(["remote", "get-url", name], { cwd: repoRoot });
  return maskRemote(res.stdout.trim());
}
