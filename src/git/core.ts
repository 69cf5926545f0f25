import { execFile } from "child_process";
import { promisify } from "util";
import { cfg } from "../config.js";

const execGit = promisify(execFile);

export type GitRunOptions = {
  cwd?: string;
  env?: Record<string, string>;
  input?: string | Buffer;
  /** `latin1` maps every output byte to one char, for paths that are not valid UTF-8. */
  encoding?: "utf8" | "latin1";
};

export type GitRunResult = { stdout: string; stderr: string };

// Allow tests to override how git is executed without relying on spy semantics on ESM exports.
// `next` runs the real git binary, for overrides that only observe or fail selected calls.
type RunGitImpl = (
  args: string[],
  options: GitRunOptions,
  next: (args: string[], options: GitRunOptions) => Promise<GitRunResult>,
) => Promise<GitRunResult>;
let runGitImpl: RunGitImpl | null = null;

export class GitCommandError extends Error {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(args: string[], exitCode: number | null, stdout: string, stderr: string, cause?: unknown) {
    const detail = stderr.trim() || stdout.trim();
    super(`git ${args.join(" ")} failed${exitCode !== null ? ` (exit ${exitCode})` : ""}${detail ? `: ${detail}` : ""}`, { cause });
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }

  /** Combined output, for matching on git's human-readable failure reasons. */
  get output() {
    return `${this.stdout}\n${this.stderr}`;
  }
}

function toGitCommandError(args: string[], error: unknown): GitCommandError {
  if (error instanceof GitCommandError) return error;
  if (error && typeof error === "object") {
    const code = "code" in error ? error.code : undefined;
    const stdout = "stdout" in error ? error.stdout : undefined;
    const stderr = "stderr" in error ? error.stderr : undefined;
    return new GitCommandError(
      args,
      typeof code === "number" ? code : null,
      typeof stdout === "string" ? stdout : "",
      typeof stderr === "string" ? stderr : error instanceof Error ? error.message : "",
      error,
    );
  }
  return new GitCommandError(args, null, "", String(error), error);
}

export function gitEnv(extra?: Record<string, string>): Record<string, string | undefined> {
  const env: Record<string, string | undefined> = { ...process.env, ...extra };
  env.GIT_TERMINAL_PROMPT = "0";
  if (cfg.git.sshKeyPath) {
    env.GIT_SSH_COMMAND = `ssh -i "${cfg.git.sshKeyPath}" -o IdentitiesOnly=yes`;
  }
  return env;
}

async function execGitProcess(args: string[], options: GitRunOptions): Promise<GitRunResult> {
  const pending = execGit("git", args, {
    cwd: options.cwd,
    env: gitEnv(options.env),
    encoding: options.encoding ?? "utf8",
    maxBuffer: 64 * 1024 * 1024,
  });
  const stdin = pending.child.stdin;
  if (stdin) {
    if (options.input !== undefined) stdin.end(options.input);
    else stdin.end();
  }
  return pending;
}

export async function runGit(args: string[], options: GitRunOptions = {}): Promise<GitRunResult> {
  try {
    if (runGitImpl) return await runGitImpl(args, options, execGitProcess);
    return await execGitProcess(args, options);
  } catch (error) {
    throw toGitCommandError(args, error);
  }
}

/**
 * Runs a git command whose exit status is the answer (`diff --quiet`,
 * `merge-base --is-ancestor`). Exit 0 is true, exit 1 is false, anything
 * else is rethrown.
 */
export async function gitSucceeds(args: string[], options: GitRunOptions = {}): Promise<boolean> {
  try {
    await runGit(args, options);
    return true;
  } catch (error) {
    if (error instanceof GitCommandError && error.exitCode === 1) return false;
    throw error;
  }
}

// Test-only hook to override git execution
export function __setRunGitImplForTests(impl?: RunGitImpl | null) {
  runGitImpl = impl || null;
}
