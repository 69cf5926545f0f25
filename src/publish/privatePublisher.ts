import { logger } from "../logger.js";
import { assertPushable, type DivergenceReport } from "./divergence.js";
import type { SyncRemote } from "./remotes.js";

export type PrivatePushResult = "pushed" | "already-current" | "dry-run";

/**
 * Pushes the local branch verbatim to the private remote. Refuses anything
 * but an up-to-date, ahead or unpublished branch; failures surface as
 * TransportError or PushRejectedError and are never retried.
 */
export async function publishPrivate(options: {
  remote: SyncRemote;
  divergence: DivergenceReport;
  dryRun?: boolean;
}): Promise<PrivatePushResult> {
  const { remote, divergence, dryRun } = options;
  assertPushable(divergence);

  if (divergence.status === "up-to-date") return "already-current";
  if (dryRun) return "dry-run";

  await remote.push(divergence.local, divergence.branch);
  logger.info("private push complete", {
    remote: remote.name,
    branch: divergence.branch,
    commit: divergence.local,
    previous: divergence.remoteTip,
  });
  return "pushed";
}
