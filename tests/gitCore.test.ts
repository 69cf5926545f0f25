import { describe, it, expect, afterEach } from 'vitest';
import { GitCommandError, gitSucceeds, runGit, __setRunGitImplForTests } from '../src/git/core.js';
import { mergeBase, resolveCommit, getCurrentBranch, hasUncommittedChanges } from '../src/git/queries.js';
import { readCommit, commitTree, listTree, writeTree, EMPTY_TREE_OID } from '../src/git/objects.js';
import { commitFiles, git, makeTempRepo, writeFiles } from './makeTempRepo.js';

afterEach(() => {
  __setRunGitImplForTests(null);
});

describe('runGit', () => {
  it('feeds input to stdin', async () => {
    const repo = await makeTempRepo();
    const res = await runGit(['hash-object', '--stdin'], { cwd: repo, input: 'hello\n' });
    expect(res.stdout.trim()).toBe('ce013625030ba8dba906f756967f9e9ca394464a');
  });

  it('wraps failures in GitCommandError with the exit code', async () => {
    const repo = await makeTempRepo();
    const err = await runGit(['rev-parse', '--verify', 'no-such-ref'], { cwd: repo }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GitCommandError);
    expect(err instanceof GitCommandError && err.exitCode).toBe(128);
    expect(err instanceof GitCommandError && err.args).toEqual(['rev-parse', '--verify', 'no-such-ref']);
  });

  it('routes through the test override, which may delegate to the real binary', async () => {
    const repo = await makeTempRepo();
    const seen: string[][] = [];
    __setRunGitImplForTests((args, options, next) => {
      seen.push(args);
      return next(args, options);
    });
    const res = await runGit(['symbolic-ref', '--short', 'HEAD'], { cwd: repo });
    expect(res.stdout.trim()).toBe('main');
    expect(seen).toEqual([['symbolic-ref', '--short', 'HEAD']]);
  });
});

describe('gitSucceeds', () => {
  it('maps exit 0 and 1 to booleans', async () => {
    const repo = await makeTempRepo({ 'a.txt': 'a\n' });
    expect(await gitSucceeds(['diff', '--quiet'], { cwd: repo })).toBe(true);
    await writeFiles(repo, { 'a.txt': 'changed\n' });
    expect(await gitSucceeds(['diff', '--quiet'], { cwd: repo })).toBe(false);
  });

  it('rethrows other failures', async () => {
    const repo = await makeTempRepo();
    await expect(gitSucceeds(['rev-parse', '--verify', 'nope'], { cwd: repo })).rejects.toBeInstanceOf(GitCommandError);
  });
});

describe('queries', () => {
  it('resolves commits and reports missing refs as null', async () => {
    const repo = await makeTempRepo();
    const head = await git(repo, 'rev-parse', 'HEAD');
    expect(await resolveCommit(repo, 'refs/heads/main')).toBe(head);
    expect(await resolveCommit(repo, 'refs/remotes/public/main')).toBeNull();
  });

  it('returns null merge base for unrelated histories', async () => {
    const repo = await makeTempRepo();
    const first = await git(repo, 'rev-parse', 'HEAD');
    await git(repo, 'checkout', '-q', '--orphan', 'other');
    const second = await commitFiles(repo, { 'other.txt': 'x\n' }, 'unrelated root');
    expect(await mergeBase(repo, first, second)).toBeNull();
    expect(await getCurrentBranch(repo)).toBe('other');
  });

  it('reports a detached HEAD as no branch', async () => {
    const repo = await makeTempRepo();
    await git(repo, 'checkout', '-q', '--detach');
    expect(await getCurrentBranch(repo)).toBeNull();
  });

  it('counts staged and unstaged changes but not untracked files', async () => {
    const repo = await makeTempRepo({ 'a.txt': 'a\n' });
    await writeFiles(repo, { 'untracked.txt': 'u\n' });
    expect(await hasUncommittedChanges(repo)).toBe(false);
    await writeFiles(repo, { 'a.txt': 'b\n' });
    expect(await hasUncommittedChanges(repo)).toBe(true);
    await git(repo, 'add', 'a.txt');
    expect(await hasUncommittedChanges(repo)).toBe(true);
  });
});

describe('objects', () => {
  it('round-trips a tree through a scratch index without touching the real one', async () => {
    const repo = await makeTempRepo({ 'a.txt': 'a\n', 'dir/b.txt': 'b\n', 'dir/sub/c.txt': 'c\n' });
    const entries = await listTree(repo, 'HEAD');
    expect(entries.map((e) => e.path)).toEqual(['a.txt', 'dir/b.txt', 'dir/sub/c.txt']);

    const treeId = await writeTree(repo, entries);
    expect(treeId).toBe(await git(repo, 'rev-parse', 'HEAD^{tree}'));
    expect(await git(repo, 'status', '--porcelain')).toBe('');
  });

  it('writes the empty tree for no entries', async () => {
    const repo = await makeTempRepo();
    expect(await writeTree(repo, [])).toBe(EMPTY_TREE_OID);
  });

  it('reads commit metadata and recreates identical commits from it', async () => {
    const repo = await makeTempRepo();
    const head = await commitFiles(repo, { 'x.txt': 'x\n' }, 'subject line\n\nbody text');
    const info = await readCommit(repo, head);
    expect(info.oid).toBe(head);
    expect(info.message).toBe('subject line\n\nbody text');
    expect(info.author.name).toBe('Test Author');
    expect(info.committer.email).toBe('committer@example.com');
    expect(info.parents).toHaveLength(1);

    const again = await commitTree(repo, {
      tree: info.tree,
      parents: info.parents,
      message: info.message,
      author: info.author,
      committer: info.committer,
    });
    expect(again).toBe(head);
  });
});
