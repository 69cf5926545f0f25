import fs from "fs/promises";
import os from "os";
import path from "path";
import { randomUUID } from "crypto";
import { z } from "zod";
import { cfg } from "../config.js";
import { logger } from "../logger.js";
import { PreconditionError } from "./errors.js";

const LockOwnerSchema = z.object({
  pid: z.number().int(),
  host: z.string(),
  acquiredAt: z.string(),
});
type LockOwner = z.infer<typeof LockOwnerSchema>;

export type PublishLock = {
  path: string;
  owner: LockOwner;
  release(): Promise<void>;
};

function errorCode(error: unknown) {
  return error && typeof error === "object" && "code" in error ? error.code : undefined;
}

function isProcessAlive(pid: number) {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === "EPERM";
  }
}

type LockSnapshot = {
  owner: LockOwner | null;
  ino: number;
  mtimeMs: number;
};

/** Current lock file, or null when it vanished before it could be read. */
async function inspectLock(lockPath: string): Promise<LockSnapshot | null> {
  try {
    const stat = await fs.stat(lockPath);
    const text = await fs.readFile(lockPath, "utf8");
    let owner: LockOwner | null = null;
    try {
      const parsed = LockOwnerSchema.safeParse(JSON.parse(text));
      if (parsed.success) owner = parsed.data;
    } catch (error) {
      logger.debug("unreadable publish lock", { lockPath, error: String(error) });
    }
    return { owner, ino: stat.ino, mtimeMs: stat.mtimeMs };
  } catch (error) {
    if (errorCode(error) === "ENOENT") return null;
    throw error;
  }
}

function isStale(lock: LockSnapshot, staleMs: number, now: number) {
  if (!lock.owner) return now - lock.mtimeMs > staleMs;
  const age = now - Date.parse(lock.owner.acquiredAt);
  if (!Number.isFinite(age) || age > staleMs) return true;
  return lock.owner.host === os.hostname() && !isProcessAlive(lock.owner.pid);
}

/** Publishes a fully written lock file at `lockPath`, or returns false when one exists. */
async function tryCreate(lockPath: string, owner: LockOwner): Promise<boolean> {
  const draft = `${lockPath}.${randomUUID()}.tmp`;
  await fs.writeFile(draft, JSON.stringify(owner), { flag: "wx" });
  try {
    await fs.link(draft, lockPath);
    return true;
  } catch (error) {
    if (errorCode(error) === "EEXIST") return false;
    throw error;
  } finally {
    await fs.rm(draft, { force: true });
  }
}

/**
 * Moves a stale lock aside. The rename is atomic, so the moved file is
 * checked against the one judged stale; a lock created in between is put
 * back.
 */
async function reclaim(lockPath: string, stale: LockSnapshot): Promise<boolean> {
  const aside = `${lockPath}.${randomUUID()}.stale`;
  try {
    await fs.rename(lockPath, aside);
  } catch (error) {
    if (errorCode(error) === "ENOENT") return true;
    throw error;
  }
  try {
    const moved = await fs.stat(aside);
    if (moved.ino === stale.ino && moved.mtimeMs === stale.mtimeMs) return true;
    try {
      await fs.link(aside, lockPath);
    } catch (error) {
      if (errorCode(error) !== "EEXIST") throw error;
    }
    return false;
  } finally {
    await fs.rm(aside, { force: true });
  }
}

function heldError(lockPath: string, lock: LockSnapshot | null) {
  const owner = lock?.owner;
  return new PreconditionError(
    owner
      ? `Another filtered push is running (pid ${owner.pid} on ${owner.host} since ${owner.acquiredAt})`
      : `Publish lock ${lockPath} is held`,
    { hint: `If no publish is running, delete ${lockPath} and retry.` },
  );
}

/**
 * Takes the advisory lock that serializes publish runs against one
 * repository. The lock file appears fully written or not at all. A lock
 * left by a dead process, or older than `staleMs`, is taken over; an
 * unreadable one only once its mtime is older than `staleMs`.
 */
export async function acquirePublishLock(
  gitDir: string,
  options: { staleMs?: number; now?: () => number } = {},
): Promise<PublishLock> {
  const lockPath = path.join(gitDir, cfg.publish.lockFileName);
  const staleMs = options.staleMs ?? cfg.publish.lockStaleMs;
  const now = options.now ?? Date.now;

  let holder: LockSnapshot | null = null;
  for (let attempt = 0; attempt < 3; attempt++) {
    const owner: LockOwner = {
      pid: process.pid,
      host: os.hostname(),
      acquiredAt: new Date(now()).toISOString(),
    };
    if (await tryCreate(lockPath, owner)) {
      let released = false;
      return {
        path: lockPath,
        owner,
        async release() {
          if (released) return;
          released = true;
          await fs.rm(lockPath, { force: true });
        },
      };
    }

    holder = await inspectLock(lockPath);
    if (!holder) continue;
    if (!isStale(holder, staleMs, now())) break;
    logger.warn("removing stale publish lock", { lockPath, holder: holder.owner });
    if (!(await reclaim(lockPath, holder))) {
      holder = await inspectLock(lockPath);
      break;
    }
  }
  throw heldError(lockPath, holder);
}

export async function withPublishLock<T>(gitDir: string, task: () => Promise<T>): Promise<T> {
  const lock = await acquirePublishLock(gitDir);
  try {
    return await task();
  } finally {
    await lock.release();
  }
}
