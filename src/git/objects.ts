import fs from "fs/promises";
import os from "os";
import path from "path";
import { runGit } from "./core.js";

export type TreeEntryType = "blob" | "tree" | "commit";

export type TreeEntry = {
  mode: string;
  type: TreeEntryType;
  oid: string;
  /** UTF-8 reading of the path, used for matching and reporting. */
  path: string;
  /** Path bytes exactly as stored in the tree; `path` may be lossy when they are not UTF-8. */
  pathBytes?: Buffer;
};

export type CommitIdentity = {
  name: string;
  email: string;
  /** `git --date=raw` form: seconds since epoch and zone offset. */
  date: string;
};

export type CommitInfo = {
  oid: string;
  tree: string;
  parents: string[];
  author: CommitIdentity;
  committer: CommitIdentity;
  message: string;
};

export const EMPTY_TREE_OID = "4b825dc642cb6eb9a060e54bf8d69288fbee4904";

function isEntryType(value: string): value is TreeEntryType {
  return value === "blob" || value === "tree" || value === "commit";
}

/** All non-tree entries reachable from `rev`, with full paths. */
export async function listTree(repoRoot: string, rev: string): Promise<TreeEntry[]> {
  const res = await runGit(["ls-tree", "-r", "-z", "--full-tree", rev], { cwd: repoRoot, encoding: "latin1" });
  const entries: TreeEntry[] = [];
  for (const record of res.stdout.split("\0")) {
    if (!record) continue;
    const tab = record.indexOf("\t");
    if (tab < 0) throw new Error(`Unexpected ls-tree record: ${record}`);
    const [mode, type, oid] = record.slice(0, tab).split(" ");
    if (!mode || !oid || !type || !isEntryType(type)) {
      throw new Error(`Unexpected ls-tree record: ${record}`);
    }
    const pathBytes = Buffer.from(record.slice(tab + 1), "latin1");
    entries.push({ mode, type, oid, path: pathBytes.toString("utf8"), pathBytes });
  }
  return entries;
}

/**
 * Writes `entries` as a tree object through a throwaway index file. The
 * repository's own index and working directory are never touched.
 */
export async function writeTree(repoRoot: string, entries: TreeEntry[]): Promise<string> {
  const scratch = await fs.mkdtemp(path.join(os.tmpdir(), "filtered-push-index-"));
  const env = { GIT_INDEX_FILE: path.join(scratch, "index") };
  try {
    if (entries.length > 0) {
      const input = Buffer.concat(
        entries.map((e) =>
          Buffer.concat([
            Buffer.from(`${e.mode} ${e.type} ${e.oid}\t`),
            e.pathBytes ?? Buffer.from(e.path),
            Buffer.from([0]),
          ]),
        ),
      );
      await runGit(["update-index", "--add", "-z", "--index-info"], { cwd: repoRoot, env, input });
    }
    const res = await runGit(["write-tree"], { cwd: repoRoot, env });
    return res.stdout.trim();
  } finally {
    await fs.rm(scratch, { recursive: true, force: true });
  }
}

const COMMIT_FORMAT = ["%H", "%T", "%P", "%an", "%ae", "%ad", "%cn", "%ce", "%cd", "%B"].join("%x00");

export async function readCommit(repoRoot: string, rev: string): Promise<CommitInfo> {
  const res = await runGit(["log", "-1", "--date=raw", `--format=${COMMIT_FORMAT}`, rev, "--"], {
    cwd: repoRoot,
  });
  const fields = res.stdout.split("\0");
  if (fields.length < 10) throw new Error(`Unable to read commit ${rev}`);
  const [oid, tree, parents, an, ae, ad, cn, ce, cd] = fields;
  // %B may itself contain NULs only in pathological commits; keep the remainder intact
  const message = fields.slice(9).join("\0");
  return {
    oid,
    tree,
    parents: parents.split(" ").filter(Boolean),
    author: { name: an, email: ae, date: ad },
    committer: { name: cn, email: ce, date: cd },
    message: message.replace(/\s+$/, ""),
  };
}

export async function commitTree(
  repoRoot: string,
  options: {
    tree: string;
    parents: string[];
    message: string;
    author?: CommitIdentity;
    committer?: CommitIdentity;
  },
): Promise<string> {
  const args = ["commit-tree", options.tree];
  for (const parent of options.parents) args.push("-p", parent);

  const env: Record<string, string> = {};
  if (options.author) {
    env.GIT_AUTHOR_NAME = options.author.name;
    env.GIT_AUTHOR_EMAIL = options.author.email;
    env.GIT_AUTHOR_DATE = options.author.date;
  }
  if (options.committer) {
    env.GIT_COMMITTER_NAME = options.committer.name;
    env.GIT_COMMITTER_EMAIL = options.committer.email;
    env.GIT_COMMITTER_DATE = options.committer.date;
  }

  const res = await runGit(args, { cwd: repoRoot, env, input: `${options.message}\n` });
  return res.stdout.trim();
}

/** Moves a local ref, refusing when it no longer points at `expectedOld`. */
export async function updateRef(repoRoot: string, ref: string, newOid: string, expectedOld?: string | null) {
  const args = ["update-ref", "-m", "filtered-push", ref, newOid];
  if (expectedOld) args.push(expectedOld);
  await runGit(args, { cwd: repoRoot });
}
