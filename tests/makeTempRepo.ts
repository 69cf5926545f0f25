import fs from "fs/promises";
import path from "path";
import os from "os";
import { execFile } from "child_process";
import { promisify } from "util";
const execFileP = promisify(execFile);

function tmpRoot() {
  return process.env.FP_TEST_TMP || os.tmpdir();
}

export async function git(cwd: string, ...args: string[]): Promise<string> {
  const { stdout } = await execFileP("git", args, { cwd });
  return stdout.trim();
}

export async function writeFiles(dir: string, files: Record<string, string | null>) {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(dir, rel);
    if (content === null) {
      await fs.rm(full, { recursive: true, force: true });
      continue;
    }
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, "utf8");
  }
}

/** Writes (or with null, deletes) files, commits everything and returns the new commit id. */
export async function commitFiles(dir: string, files: Record<string, string | null>, message: string) {
  await writeFiles(dir, files);
  await git(dir, "add", "-A");
  await git(dir, "commit", "-q", "-m", message);
  return git(dir, "rev-parse", "HEAD");
}

export async function makeTempRepo(initialFiles?: Record<string, string>) {
  const dir = await fs.mkdtemp(path.join(tmpRoot(), "repo-"));
  await git(dir, "init", "-q", "-b", "main");
  await commitFiles(dir, initialFiles ?? { "README.md": "# temp\n" }, "init");
  return dir;
}

export async function makeBareRemote() {
  const dir = await fs.mkdtemp(path.join(tmpRoot(), "remote-"));
  await git(dir, "init", "-q", "--bare", "-b", "main");
  return dir;
}

/** Sorted paths of every file in a tree or commit. */
export async function treePaths(repo: string, rev: string) {
  const out = await git(repo, "ls-tree", "-r", "--name-only", "--full-tree", rev);
  return out.split("\n").filter(Boolean).sort();
}

/** Commit id a ref points at in `repoDir`, or null. */
export async function refOf(repoDir: string, ref: string): Promise<string | null> {
  try {
    return await git(repoDir, "rev-parse", "--verify", "--quiet", ref);
  } catch {
    return null;
  }
}

/** Hex of every path in a tree, read as raw bytes so non-UTF-8 names survive. */
export async function treePathsHex(repo: string, rev: string) {
  const { stdout } = await execFileP("git", ["ls-tree", "-r", "-z", "--name-only", "--full-tree", rev], {
    cwd: repo,
    encoding: "buffer",
  });
  const names: string[] = [];
  let start = 0;
  for (let i = 0; i < stdout.length; i++) {
    if (stdout[i] !== 0) continue;
    if (i > start) names.push(stdout.subarray(start, i).toString("hex"));
    start = i + 1;
  }
  return names.sort();
}
