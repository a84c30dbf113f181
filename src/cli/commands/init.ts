import { dirname, relative, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { DEFAULT_POLICY_PATH } from '../../core/policy/loader.js';
import { getRepoRoot } from '../../git/operations.js';
import { fileExists, findUpSync, readText, writeText } from '../../utils/fs.js';
import { getRenderer } from '../ui/renderer.js';
import type { CommandResult } from './shared.js';

export const TEMPLATE_PATH = 'templates/quality-gates.yaml';

export interface InitCommandOptions {
  cwd?: string;
  /** Destination; defaults to the standard policy location in the repository. */
  path?: string;
  force?: boolean;
}

/**
 * `gatewise init`: write a starter policy document.
 */
export async function runInitCommand(opts: InitCommandOptions): Promise<CommandResult & { path?: string }> {
  const r = getRenderer();
  const cwd = resolve(opts.cwd ?? process.cwd());
  const root = (await getRepoRoot(cwd)) ?? cwd;
  const target = opts.path ? resolve(cwd, opts.path) : resolve(root, DEFAULT_POLICY_PATH);

  if (!opts.force && (await fileExists(target))) {
    return { ok: false, details: `${target} already exists (use --force to overwrite)` };
  }

  const template = findUpSync(dirname(fileURLToPath(import.meta.url)), TEMPLATE_PATH);
  if (!template) return { ok: false, details: `Starter template not found (${TEMPLATE_PATH})` };

  await writeText(target, await readText(template));
  r.success(`Wrote ${relative(cwd, target) || target}`);
  r.dim('Run `gatewise check` to validate it, then `gatewise plan` to preview the gates.');
  return { ok: true, path: target };
}
