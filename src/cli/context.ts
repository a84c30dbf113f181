import { resolve } from 'node:path';

import { GitContextError } from '../core/errors.js';
import type { MatchContext } from '../core/match/engine.js';
import { loadPolicy } from '../core/policy/loader.js';
import { detectStage, parseStage } from '../core/policy/stage.js';
import type { Policy } from '../core/policy/types.js';
import { changedFiles, getRepoRoot, git, resolveBaseRef, resolveBranch } from '../git/operations.js';
import { getLogger } from '../utils/logger.js';
import { resolveWorkspacePaths, type WorkspacePaths } from '../workspace/layout.js';

/** Options shared by every command that loads the policy. */
export interface PolicyOptions {
  cwd?: string;
  config?: string;
  override?: string;
  env?: NodeJS.ProcessEnv;
}

/** Options shared by `plan` and `run`. */
export interface TargetOptions extends PolicyOptions {
  branch?: string;
  stage?: string;
  files?: string[];
  base?: string;
  /** Only diff committed changes against the base. */
  committedOnly?: boolean;
}

export interface CliContext {
  cwd: string;
  /** Null outside a git work tree. */
  repoRoot: string | null;
  policy: Policy;
  paths: WorkspacePaths;
}

/**
 * Load the policy relative to the repository root (or the working directory when
 * not inside a repository). Paths given on the command line resolve against the cwd.
 */
export async function loadContext(opts: PolicyOptions): Promise<CliContext> {
  const cwd = resolve(opts.cwd ?? process.cwd());
  const repoRoot = await getRepoRoot(cwd);
  const root = repoRoot ?? cwd;

  const policy = await loadPolicy({
    cwd: root,
    basePath: opts.config ? resolve(cwd, opts.config) : undefined,
    overridePath: opts.override ? resolve(cwd, opts.override) : undefined,
    env: opts.env,
    logger: getLogger()
  });

  return { cwd, repoRoot, policy, paths: resolveWorkspacePaths(root, policy) };
}

/**
 * Work out branch, stage and changeset. Explicit options win; the rest comes from
 * git and the environment.
 */
export async function resolveTarget(ctx: CliContext, opts: TargetOptions): Promise<MatchContext> {
  const env = opts.env ?? process.env;
  const stage = opts.stage ? parseStage(opts.stage) : detectStage(env);

  if (!ctx.repoRoot) {
    if (!opts.branch || !opts.files) {
      throw new GitContextError(`Not inside a git repository: ${ctx.cwd}. Pass --branch and --files explicitly.`);
    }
    return { branch: opts.branch, changedFiles: opts.files, stage };
  }

  const repo = git(ctx.repoRoot);
  const branch = opts.branch ?? (await resolveBranch(repo, env));
  let files = opts.files;
  if (!files) {
    const baseRef = await resolveBaseRef(repo, opts.base);
    files = await changedFiles(repo, baseRef, { includeWorkingTree: !opts.committedOnly });
    getLogger().debug('Computed changeset', { baseRef, files: files.length });
  }
  return { branch, changedFiles: files, stage };
}
