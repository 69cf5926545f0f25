import { GitCommandError } from "../git/core.js";
import { resolveTreeOf } from "../git/queries.js";
import { logger } from "../logger.js";
import { assertPushable, checkDivergence, type DivergenceReport } from "./divergence.js";
import { DivergenceError, GitOperationError, PublishError, TransportError } from "./errors.js";
import { isEmptyFilter, type PublishConfig } from "./filterConfig.js";
import { buildFilteredTree, type FilteredTree } from "./filteredTree.js";
import { publishPrivate, type PrivatePushResult } from "./privatePublisher.js";
import { comparePublicTip, synthesizePublicCommit } from "./publicCommit.js";
import type { PublishTarget, SyncRemote } from "./remotes.js";
import { PublishStateMachine, type PublishState } from "./states.js";

export type StatusReporter = (line: string) => void;

export type PublishResult = {
  outcome: "done" | "no-op";
  dryRun: boolean;
  states: PublishState[];
  divergence: DivergenceReport;
  privatePush: PrivatePushResult;
  /** Absent when the filter is empty and the branch tree is published as is. */
  filteredTree: FilteredTree | null;
  treeId: string;
  publicTip: string | null;
  /** Commit pushed (or that would be pushed) to the public branch. */
  publicCommit: string | null;
};

export type FilteredPublisherOptions = {
  repoRoot: string;
  config: PublishConfig;
  privateRemote: SyncRemote;
  publicRemote: PublishTarget;
  dryRun?: boolean;
  report?: StatusReporter;
};

function short(oid: string | null) {
  return oid ? oid.slice(0, 12) : "(none)";
}

/**
 * One publish run: check the branch against the private remote, push it
 * there in full, then derive the filtered tree and publish it to the
 * public remote as a single synthesized commit.
 */
export class FilteredPublisher {
  private readonly machine = new PublishStateMachine();
  private readonly report: StatusReporter;

  constructor(private readonly options: FilteredPublisherOptions) {
    this.report = options.report ?? (() => undefined);
  }

  get states(): readonly PublishState[] {
    return this.machine.history;
  }

  /** Marks the run as failed before the pipeline started. */
  rejectPrecondition(error: PublishError): never {
    return this.abort("aborted-precondition", error);
  }

  async publish(local: string): Promise<PublishResult> {
    const { repoRoot, config, privateRemote, publicRemote } = this.options;
    const dryRun = this.options.dryRun ?? false;
    const { branch } = config;
    const tag = dryRun ? "[dry-run] " : "";

    this.machine.transition("checking-divergence");
    const divergence = await this.guard(async () => {
      const checked = await checkDivergence({ repoRoot, remote: privateRemote, branch, local });
      this.report(this.describeSync(checked));
      assertPushable(checked);
      return checked;
    }, "aborted-unreachable");

    this.machine.transition("pushing-private");
    const privatePush = await this.guard(
      () => publishPrivate({ remote: privateRemote, divergence, dryRun }),
      "aborted-push-failed",
    );
    if (privatePush === "pushed") this.report(`Private: pushed ${branch} to ${privateRemote.name} (full content)`);
    else if (privatePush === "dry-run") this.report(`${tag}Private: would push ${branch} to ${privateRemote.name}`);
    else this.report(`Private: ${privateRemote.name}/${branch} already at ${short(local)}`);

    this.machine.transition("building-filtered-tree");
    let filteredTree: FilteredTree | null = null;
    let treeId: string;
    if (isEmptyFilter(config.filter)) {
      treeId = await this.guard(() => resolveTreeOf(repoRoot, local), "aborted-git-failed");
      this.report("Filter: no exclusions configured, publishing full content");
    } else {
      const built = await this.guard(() => buildFilteredTree(repoRoot, local, config.filter), "aborted-git-failed");
      filteredTree = built;
      treeId = built.treeId;
      this.report(
        `Filter: removed ${built.removed.length} path(s), kept ${built.keptCount}, tree ${short(treeId)}`,
      );
    }

    this.machine.transition("comparing-trees");
    const comparison = await this.guard(
      () => comparePublicTip({ repoRoot, target: publicRemote, branch, treeId }),
      "aborted-unreachable",
    );
    const base = { dryRun, divergence, privatePush, filteredTree, treeId, publicTip: comparison.tip };

    if (comparison.unchanged) {
      this.machine.transition("no-op-done");
      this.report(`Trees: ${publicRemote.name}/${branch} already has tree ${short(treeId)}`);
      this.report("Public repo already up to date.");
      return { ...base, outcome: "no-op", states: [...this.states], publicCommit: null };
    }
    this.report(
      comparison.tip
        ? `Trees: ${short(treeId)} differs from ${publicRemote.name}/${branch} (${short(comparison.tipTree)})`
        : `Trees: ${publicRemote.name}/${branch} has no known tip, publishing ${short(treeId)} as a root commit`,
    );

    let publicCommit: string;
    if (filteredTree) {
      this.machine.transition("synthesizing-commit");
      const synthesized = await this.guard(
        () =>
          synthesizePublicCommit({
            repoRoot,
            treeId,
            parent: comparison.tip,
            sourceRev: local,
            branch,
            messageTemplate: config.messageTemplate,
          }),
        "aborted-git-failed",
      );
      publicCommit = synthesized.oid;
      this.report(`Commit: synthesized ${short(publicCommit)} on ${short(synthesized.parent)}`);
    } else {
      publicCommit = local;
    }

    this.machine.transition("pushing-public");
    if (dryRun) {
      this.report(`${tag}Public: would push ${short(publicCommit)} to ${publicRemote.name}/${branch}`);
      if (filteredTree) {
        const excluded = [...config.filter.excludePaths, ...config.filter.excludeGlobs].join(" ");
        this.report(`${tag}Filtered tree excludes: ${excluded}`);
      }
    } else {
      await this.guard(() => publicRemote.push(publicCommit, branch), "aborted-push-failed");
      this.report(
        `Public: pushed ${short(publicCommit)} to ${publicRemote.name}/${branch}${filteredTree ? " (filtered)" : ""}`,
      );
    }

    this.machine.transition("done");
    this.report(
      `Done. ${privateRemote.name}: full push. ${publicRemote.name}: ${filteredTree ? "filtered" : "full"}.`,
    );
    logger.info("filtered push complete", {
      repoRoot,
      branch,
      dryRun,
      local,
      publicCommit,
      parent: comparison.tip,
    });
    return { ...base, outcome: "done", states: [...this.states], publicCommit };
  }

  private describeSync(d: DivergenceReport) {
    const ref = `${d.remote}/${d.branch}`;
    switch (d.status) {
      case "up-to-date":
        return `Sync: ${d.branch} is up to date with ${ref}`;
      case "ahead":
        return `Sync: ${d.branch} is ahead of ${ref} by ${d.ahead} commit(s), will push`;
      case "unpublished":
        return `Sync: ${ref} does not exist yet, will create it`;
      case "behind":
        return `Sync: ${d.branch} is behind ${ref} by ${d.behind} commit(s)`;
      case "diverged":
        return `Sync: ${d.branch} and ${ref} have diverged`;
    }
  }

  private async guard<T>(step: () => Promise<T>, onTransportFailure: PublishState): Promise<T> {
    try {
      return await step();
    } catch (error) {
      if (error instanceof DivergenceError) {
        this.abort(error.details.status === "behind" ? "aborted-behind" : "aborted-diverged", error);
      }
      if (error instanceof TransportError) this.abort(onTransportFailure, error);
      if (error instanceof PublishError) this.abort("aborted-push-failed", error);
      if (error instanceof GitCommandError) {
        this.abort("aborted-git-failed", new GitOperationError(error.args, error.message, error));
      }
      throw error;
    }
  }

  private abort(state: PublishState, error: PublishError): never {
    this.machine.transition(state);
    error.state = state;
    logger.debug("filtered push aborted", { state, kind: error.kind, error: error.message });
    throw error;
  }
}
