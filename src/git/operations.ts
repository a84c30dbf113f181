import { execa } from 'execa';

import { GitContextError } from '../core/errors.js';

export interface GitRepo {
  repoRoot: string;
}

export function git(repoRoot: string): GitRepo {
  return { repoRoot };
}

async function run(repo: GitRepo, args: string[]): Promise<string> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    stdout: 'pipe',
    stderr: 'pipe',
    reject: false
  });
  if (res.exitCode === 0) return res.stdout;

  const reason = res.stderr.split('\n')[0]?.trim() || (res.exitCode === undefined ? 'git could not be started' : `exit ${res.exitCode}`);
  throw new GitContextError(`git ${args.join(' ')} failed: ${reason}`);
}

/** Like run, but returns null instead of throwing when git exits non-zero. */
async function tryRun(repo: GitRepo, args: string[]): Promise<string | null> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    stdout: 'pipe',
    stderr: 'pipe',
    reject: false
  });
  return res.exitCode === 0 ? res.stdout : null;
}

// Paths come NUL-separated (-z) so git does not quote non-ASCII names.
function paths(out: string): string[] {
  return out.split('\0').filter(Boolean);
}

export async function getRepoRoot(cwd: string): Promise<string | null> {
  const out = await tryRun(git(cwd), ['rev-parse', '--show-toplevel']);
  return out ? out.trim() : null;
}

/** Current branch name, also before the first commit. A detached HEAD reads as `HEAD`. */
export async function getCurrentBranch(repo: GitRepo): Promise<string> {
  const symbolic = (await tryRun(repo, ['symbolic-ref', '--short', '-q', 'HEAD']))?.trim();
  if (symbolic) return symbolic;
  return (await run(repo, ['rev-parse', '--abbrev-ref', 'HEAD'])).trim();
}

/**
 * Branch name for policy matching. CI checkouts are often detached, so the
 * GitHub Actions ref variables win over the local HEAD.
 */
export async function resolveBranch(repo: GitRepo, env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const fromCi = env.GITHUB_HEAD_REF?.trim() || env.GITHUB_REF_NAME?.trim();
  if (fromCi) return fromCi;
  return await getCurrentBranch(repo);
}

export async function refExists(repo: GitRepo, ref: string): Promise<boolean> {
  return (await tryRun(repo, ['rev-parse', '--verify', '--quiet', `${ref}^{commit}`])) !== null;
}

const BASE_REF_CANDIDATES = ['@{upstream}', 'origin/main', 'origin/master', 'main', 'master'];

/**
 * Pick the ref the changeset is computed against: the upstream of the current
 * branch, then the usual default branches. Falls back to HEAD.
 */
export async function resolveBaseRef(repo: GitRepo, preferred?: string): Promise<string> {
  if (preferred) return preferred;
  for (const ref of BASE_REF_CANDIDATES) {
    if (await refExists(repo, ref)) return ref;
  }
  return 'HEAD';
}

export interface ChangedFilesOptions {
  /** Include staged, unstaged and untracked files. Defaults to true. */
  includeWorkingTree?: boolean;
}

/**
 * Files changed between the merge base of `baseRef` and HEAD, plus (by default)
 * the working tree. Sorted and de-duplicated. Before the first commit every
 * tracked or untracked file counts as changed.
 */
export async function changedFiles(repo: GitRepo, baseRef: string, opts: ChangedFilesOptions = {}): Promise<string[]> {
  const includeWorkingTree = opts.includeWorkingTree ?? true;

  if (!(await refExists(repo, 'HEAD'))) {
    if (!includeWorkingTree) return [];
    return sortedUnique(paths(await run(repo, ['ls-files', '-z', '--cached', '--others', '--exclude-standard'])));
  }

  const mergeBase = (await tryRun(repo, ['merge-base', baseRef, 'HEAD']))?.trim() || baseRef;

  const tasks: Array<Promise<string>> = [run(repo, ['diff', '--name-only', '-z', `${mergeBase}..HEAD`])];
  if (includeWorkingTree) {
    tasks.push(run(repo, ['diff', '--name-only', '-z', 'HEAD']));
    tasks.push(run(repo, ['ls-files', '-z', '--others', '--exclude-standard']));
  }
  const outputs = await Promise.all(tasks);
  return sortedUnique(outputs.flatMap(paths));
}

function sortedUnique(files: string[]): string[] {
  return Array.from(new Set(files)).sort();
}

export async function getUserName(repo: GitRepo, env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const configured = (await tryRun(repo, ['config', 'user.name']))?.trim();
  if (configured) return configured;
  return env.USER?.trim() || env.USERNAME?.trim() || 'unknown';
}
