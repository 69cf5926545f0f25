import { getCurrentBranch, getRemoteUrl, hasUncommittedChanges, resolveCommit } from "../git/queries.js";
import { PreconditionError } from "./errors.js";
import type { PublishConfig } from "./filterConfig.js";

/**
 * Everything that must hold before any remote I/O: both remotes configured,
 * the publish branch checked out, no uncommitted changes to tracked files.
 * Returns the branch head.
 */
export async function checkPreconditions(repoRoot: string, config: PublishConfig): Promise<string> {
  for (const remote of [config.privateRemote, config.publicRemote]) {
    if (!(await getRemoteUrl(repoRoot, remote))) {
      throw new PreconditionError(`Remote '${remote}' not configured`, {
        hint: `Run: git remote add ${remote} <url>`,
      });
    }
  }

  const current = await getCurrentBranch(repoRoot);
  if (current !== config.branch) {
    throw new PreconditionError(
      `Expected to be on branch '${config.branch}', but on '${current ?? "(detached HEAD)"}'`,
    );
  }

  const head = await resolveCommit(repoRoot, `refs/heads/${config.branch}`);
  if (!head) {
    throw new PreconditionError(`Branch '${config.branch}' has no commits`);
  }

  if (await hasUncommittedChanges(repoRoot)) {
    throw new PreconditionError("Uncommitted changes. Commit or stash first.");
  }
  return head;
}
