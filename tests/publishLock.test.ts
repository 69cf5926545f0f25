import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { PreconditionError } from '../src/publish/errors.js';
import { acquirePublishLock, withPublishLock } from '../src/publish/lock.js';

const DEAD_PID = 999999999;

describe('publish lock', () => {
  let gitDir: string;
  let lockPath: string;

  beforeEach(async () => {
    gitDir = await fs.mkdtemp(path.join(process.env.FP_TEST_TMP || os.tmpdir(), 'gitdir-'));
    lockPath = path.join(gitDir, 'filtered-push.lock');
  });

  async function plantLock(owner: { pid: number; host: string; acquiredAt: string }) {
    await fs.writeFile(lockPath, JSON.stringify(owner), 'utf8');
  }

  async function exists(file: string) {
    return fs.stat(file).then(
      () => true,
      () => false,
    );
  }

  it('records the owner and removes the file on release', async () => {
    const lock = await acquirePublishLock(gitDir);

    expect(lock.path).toBe(lockPath);
    const stored = JSON.parse(await fs.readFile(lockPath, 'utf8'));
    expect(stored).toEqual({ pid: process.pid, host: os.hostname(), acquiredAt: lock.owner.acquiredAt });

    await lock.release();
    await lock.release();
    expect(await exists(lockPath)).toBe(false);
  });

  it('refuses a second holder while the first is alive', async () => {
    const lock = await acquirePublishLock(gitDir);

    await expect(acquirePublishLock(gitDir)).rejects.toThrow(
      `Another filtered push is running (pid ${process.pid} on ${os.hostname()} since ${lock.owner.acquiredAt})`,
    );
    await lock.release();
  });

  it('takes over a lock left by a dead process on this host', async () => {
    await plantLock({ pid: DEAD_PID, host: os.hostname(), acquiredAt: new Date().toISOString() });

    const lock = await acquirePublishLock(gitDir);

    expect(lock.owner.pid).toBe(process.pid);
    await lock.release();
  });

  it('takes over a lock older than the stale timeout', async () => {
    const now = Date.parse('2024-05-01T12:00:00.000Z');
    await plantLock({ pid: process.pid, host: 'build-agent', acquiredAt: '2024-05-01T11:00:00.000Z' });

    const lock = await acquirePublishLock(gitDir, { staleMs: 10 * 60 * 1000, now: () => now });

    expect(lock.owner.acquiredAt).toBe('2024-05-01T12:00:00.000Z');
    await lock.release();
  });

  it('takes over an unreadable lock file once its mtime is past the stale timeout', async () => {
    await fs.writeFile(lockPath, 'not json', 'utf8');
    const past = new Date(Date.now() - 60 * 60 * 1000);
    await fs.utimes(lockPath, past, past);

    const lock = await acquirePublishLock(gitDir, { staleMs: 10 * 60 * 1000 });

    expect(lock.owner.pid).toBe(process.pid);
    await lock.release();
  });

  it('refuses an empty lock file that was just created', async () => {
    const handle = await fs.open(lockPath, 'wx');
    await handle.close();

    const error = await acquirePublishLock(gitDir, { staleMs: 10 * 60 * 1000 }).then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(PreconditionError);
    expect(error instanceof Error && error.message).toBe(`Publish lock ${lockPath} is held`);
    expect(await fs.readFile(lockPath, 'utf8')).toBe('');
  });

  it('leaves only the lock file behind while held', async () => {
    const lock = await acquirePublishLock(gitDir);
    expect(await fs.readdir(gitDir)).toEqual(['filtered-push.lock']);
    await lock.release();
    expect(await fs.readdir(gitDir)).toEqual([]);
  });

  it('lets exactly one of two concurrent runs take the lock', async () => {
    const results = await Promise.allSettled([acquirePublishLock(gitDir), acquirePublishLock(gitDir)]);
    const held = results.filter((r) => r.status === 'fulfilled');
    expect(held).toHaveLength(1);
    expect(results.filter((r) => r.status === 'rejected')).toHaveLength(1);
    for (const r of results) if (r.status === 'fulfilled') await r.value.release();
  });

  it('keeps a fresh lock held from another host', async () => {
    const now = Date.parse('2024-05-01T12:00:00.000Z');
    await plantLock({ pid: DEAD_PID, host: 'build-agent', acquiredAt: '2024-05-01T11:59:00.000Z' });

    const pending = acquirePublishLock(gitDir, { staleMs: 10 * 60 * 1000, now: () => now });

    await expect(pending).rejects.toBeInstanceOf(PreconditionError);
    expect(await exists(lockPath)).toBe(true);
  });

  it('releases the lock when the task throws', async () => {
    await expect(
      withPublishLock(gitDir, async () => {
        expect(await exists(lockPath)).toBe(true);
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(await exists(lockPath)).toBe(false);
  });
});
