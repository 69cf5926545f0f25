import { commitTree, readCommit, type CommitInfo } from "../git/objects.js";
import { resolveTreeOf } from "../git/queries.js";
import type { PublishTarget } from "./remotes.js";

export type PublicTipComparison = {
  tip: string | null;
  tipTree: string | null;
  unchanged: boolean;
};

/**
 * Compares a tree against the public branch's last known tip. The tip comes
 * from the local tracking ref only; the public remote is never fetched.
 */
export async function comparePublicTip(options: {
  repoRoot: string;
  target: PublishTarget;
  branch: string;
  treeId: string;
}): Promise<PublicTipComparison> {
  const { repoRoot, target, branch, treeId } = options;
  const tip = await target.lastKnownTip(branch);
  if (!tip) return { tip: null, tipTree: null, unchanged: false };
  const tipTree = await resolveTreeOf(repoRoot, tip);
  return { tip, tipTree, unchanged: tipTree === treeId };
}

const PLACEHOLDER = /\{(message|subject|sha|short_sha|branch)\}/g;

export function renderPublicMessage(template: string | undefined, source: CommitInfo, branch: string): string {
  if (!template) return source.message;
  const values: Record<string, string> = {
    message: source.message,
    subject: source.message.split(/\r?\n/, 1)[0] ?? "",
    sha: source.oid,
    short_sha: source.oid.slice(0, 12),
    branch,
  };
  return template
    .replace(/\\n/g, "\n")
    .replace(PLACEHOLDER, (whole: string, key: string) => values[key] ?? whole)
    .replace(/\s+$/, "");
}

export type SynthesizedCommit = {
  oid: string;
  parent: string | null;
  treeId: string;
  message: string;
  source: CommitInfo;
};

/**
 * Wraps `treeId` in a new commit on top of the public tip. Message,
 * author and committer come from the source commit, so the same inputs
 * always produce the same commit id.
 */
export async function synthesizePublicCommit(options: {
  repoRoot: string;
  treeId: string;
  parent: string | null;
  sourceRev: string;
  branch: string;
  messageTemplate?: string;
}): Promise<SynthesizedCommit> {
  const { repoRoot, treeId, parent, sourceRev, branch } = options;
  const source = await readCommit(repoRoot, sourceRev);
  const message = renderPublicMessage(options.messageTemplate, source, branch);
  const oid = await commitTree(repoRoot, {
    tree: treeId,
    parents: parent ? [parent] : [],
    message,
    author: source.author,
    committer: source.committer,
  });
  return { oid, parent, treeId, message, source };
}
