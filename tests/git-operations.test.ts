import { describe, expect, it } from 'vitest';
import { execa } from 'execa';
import { realpath } from 'node:fs/promises';
import { join } from 'node:path';

import { commitAll, createTempGitRepo, writeFileInRepo } from './git-fixture.js';
import { tempDir } from './policy-fixture.js';
import { GitContextError } from '../src/core/errors.js';
import { allPathsMatch } from '../src/core/match/patterns.js';
import {
  changedFiles,
  getCurrentBranch,
  getRepoRoot,
  getUserName,
  git,
  refExists,
  resolveBaseRef,
  resolveBranch
} from '../src/git/operations.js';

async function featureRepo() {
  const { dir } = await createTempGitRepo();
  await execa('git', ['checkout', '-b', 'feature/x'], { cwd: dir });
  await writeFileInRepo(dir, 'src/a.ts', 'export const a = 1;\n');
  await commitAll(dir, 'add a');
  await writeFileInRepo(dir, 'notes/todo.txt', 'later\n');
  await writeFileInRepo(dir, 'README.md', '# temp\n\nmore\n');
  return dir;
}

describe('git operations', () => {
  it('finds the repo root from a subdirectory', async () => {
    const dir = await featureRepo();
    expect(await getRepoRoot(join(dir, 'src'))).toBe(await realpath(dir));
    expect(await getRepoRoot(await tempDir('gatewise-norepo-'))).toBeNull();
  });

  it('reads the branch, preferring CI variables', async () => {
    const dir = await featureRepo();
    const repo = git(dir);

    expect(await getCurrentBranch(repo)).toBe('feature/x');
    expect(await resolveBranch(repo, {})).toBe('feature/x');
    expect(await resolveBranch(repo, { GITHUB_HEAD_REF: 'pr/head', GITHUB_REF_NAME: '12/merge' })).toBe('pr/head');
    expect(await resolveBranch(repo, { GITHUB_HEAD_REF: ' ', GITHUB_REF_NAME: 'release/1.0' })).toBe('release/1.0');
  });

  it('falls back through the usual base refs', async () => {
    const dir = await featureRepo();
    const repo = git(dir);

    expect(await refExists(repo, 'main')).toBe(true);
    expect(await refExists(repo, 'origin/main')).toBe(false);
    expect(await resolveBaseRef(repo)).toBe('main');
    expect(await resolveBaseRef(repo, 'HEAD~1')).toBe('HEAD~1');
  });

  it('lists committed, modified and untracked files against the merge base', async () => {
    const dir = await featureRepo();
    const repo = git(dir);

    expect(await changedFiles(repo, 'main')).toEqual(['README.md', 'notes/todo.txt', 'src/a.ts']);
    expect(await changedFiles(repo, 'main', { includeWorkingTree: false })).toEqual(['src/a.ts']);
  });

  it('returns non-ASCII paths unquoted', async () => {
    const { dir } = await createTempGitRepo();
    await execa('git', ['checkout', '-b', 'docs/accents'], { cwd: dir });
    await writeFileInRepo(dir, 'docs/café.md', '# Café\n');
    await commitAll(dir, 'add café page');

    const files = await changedFiles(git(dir), 'main');
    expect(files).toEqual(['docs/café.md']);
    expect(allPathsMatch(files, ['docs/**'])).toBe(true);
  });

  it('treats the whole working tree as changed before the first commit', async () => {
    const dir = await tempDir('gatewise-unborn-');
    await execa('git', ['init', '-b', 'main'], { cwd: dir });
    await writeFileInRepo(dir, 'src/b.ts', 'export const b = 2;\n');
    await writeFileInRepo(dir, 'a.txt', 'a\n');
    await execa('git', ['add', 'src/b.ts'], { cwd: dir });
    const repo = git(dir);

    expect(await getCurrentBranch(repo)).toBe('main');
    expect(await resolveBaseRef(repo)).toBe('HEAD');
    expect(await changedFiles(repo, 'HEAD')).toEqual(['a.txt', 'src/b.ts']);
    expect(await changedFiles(repo, 'HEAD', { includeWorkingTree: false })).toEqual([]);
  });

  it('reports git failures as git context errors', async () => {
    const dir = await featureRepo();
    await expect(changedFiles(git(dir), 'no-such-ref')).rejects.toThrow(GitContextError);
  });

  it('reads the configured user name', async () => {
    const dir = await featureRepo();
    expect(await getUserName(git(dir))).toBe('Gatewise Test');
  });
});
