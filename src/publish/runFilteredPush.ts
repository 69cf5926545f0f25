import path from "path";
import { resolveGitDir, resolveRepoRoot } from "../git/queries.js";
import { PreconditionError, PublishError } from "./errors.js";
import { loadPublishConfig, type PublishConfig } from "./filterConfig.js";
import { FilteredPublisher, type PublishResult, type StatusReporter } from "./FilteredPublisher.js";
import { withPublishLock } from "./lock.js";
import { checkPreconditions } from "./preconditions.js";
import { describeRemote, GitPublishTarget, GitSyncRemote } from "./remotes.js";

export type RunFilteredPushOptions = {
  cwd: string;
  configPath?: string;
  dryRun?: boolean;
  report?: StatusReporter;
};

function describeFilter(config: PublishConfig) {
  const all = [...config.filter.excludePaths, ...config.filter.excludeGlobs];
  return all.length ? all.join(" ") : "none";
}

/**
 * Full publish invocation for the repository containing `cwd`: config,
 * lock, preconditions, then the publish pipeline.
 */
export async function runFilteredPush(options: RunFilteredPushOptions): Promise<PublishResult> {
  const report = options.report ?? (() => undefined);
  try {
    const repoRoot = await resolveRepoRoot(options.cwd);
    if (!repoRoot) throw new PreconditionError("Not inside a git repository.");

    const { config } = await loadPublishConfig(repoRoot, options.configPath);
    const gitDir = await resolveGitDir(repoRoot);

    return await withPublishLock(gitDir, async () => {
      const publisher = new FilteredPublisher({
        repoRoot,
        config,
        privateRemote: new GitSyncRemote(repoRoot, config.privateRemote),
        publicRemote: new GitPublishTarget(repoRoot, config.publicRemote),
        dryRun: options.dryRun,
        report,
      });

      let local: string;
      try {
        local = await checkPreconditions(repoRoot, config);
      } catch (error) {
        if (error instanceof PublishError) publisher.rejectPrecondition(error);
        throw error;
      }

      report(`=== Dual-remote push: ${path.basename(repoRoot)}${options.dryRun ? " (dry run)" : ""} ===`);
      report(`  Private: ${config.privateRemote} (${await describeRemote(repoRoot, config.privateRemote)}, full content)`);
      report(`  Public:  ${config.publicRemote} (${await describeRemote(repoRoot, config.publicRemote)}, filtered)`);
      report(`  Branch:  ${config.branch}`);
      report(`  Excluding: ${describeFilter(config)}`);

      return publisher.publish(local);
    });
  } catch (error) {
    if (error instanceof PublishError && error.state === null) error.state = "aborted-precondition";
    throw error;
  }
}
