#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

import { errorMessage } from '../core/errors.js';
import { findUpSync, isPlainObject } from '../utils/fs.js';
import { loggerFromEnv, setLogger } from '../utils/logger.js';
import type { TargetOptions } from './context.js';
import { runBypassesCommand } from './commands/bypasses.js';
import { runCheckCommand } from './commands/check.js';
import { runInitCommand } from './commands/init.js';
import { runPlanCommand } from './commands/plan.js';
import { runRunCommand } from './commands/run.js';
import type { CommandResult } from './commands/shared.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  override?: string;
}

interface TargetFlags {
  branch?: string;
  stage?: string;
  files?: string[];
  base?: string;
  committedOnly?: boolean;
}

export async function buildCli(argv: string[]): Promise<void> {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('gatewise')
    .description('Resolve and run branch- and path-aware quality gates')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines)')
    .option('--config <path>', 'Base policy document')
    .option('--override <path>', 'Repository override document');

  program.hook('preAction', () => {
    const o = program.opts<GlobalOptions>();
    process.env.GATEWISE_VERBOSE = o.verbose ? '1' : '0';
    process.env.GATEWISE_QUIET = o.quiet ? '1' : '0';
    setLogger(loggerFromEnv(process.env));
    createRenderer({ quiet: !!o.quiet });
  });

  const policyOpts = () => {
    const o = program.opts<GlobalOptions>();
    return { config: o.config, override: o.override };
  };

  const targetOpts = (flags: TargetFlags): TargetOptions => ({
    ...policyOpts(),
    branch: flags.branch,
    stage: flags.stage,
    files: flags.files,
    base: flags.base,
    committedOnly: !!flags.committedOnly
  });

  const withTargetFlags = (cmd: Command) =>
    cmd
      .option('--branch <name>', 'Branch to evaluate (defaults to the current branch)')
      .option('--stage <stage>', 'Stage: pre-push, pr or push-to-main (defaults to GATEWISE_STAGE / CI detection)')
      .option('--files <paths...>', 'Changed files (defaults to the git changeset)')
      .option('--base <ref>', 'Base ref for the changeset (defaults to upstream, then main/master)')
      .option('--committed-only', 'Ignore staged, unstaged and untracked files');

  // ── Policy ────────────────────────────────────────────────────────────────

  program
    .command('check')
    .description('Load and validate the policy')
    .action(async () => {
      report('Policy check failed', await runCheckCommand(policyOpts()), 'Fix the listed errors and re-run `gatewise check`.');
    });

  program
    .command('init')
    .description('Write a starter policy document')
    .option('--path <file>', 'Destination file')
    .option('--force', 'Overwrite an existing document')
    .action(async (opts: { path?: string; force?: boolean }) => {
      report('Init failed', await runInitCommand({ path: opts.path, force: !!opts.force }));
    });

  // ── Gates ─────────────────────────────────────────────────────────────────

  withTargetFlags(program.command('plan'))
    .description('Show the effective gates without running them')
    .option('--json', 'Print the plan as JSON on stdout')
    .action(async (opts: TargetFlags & { json?: boolean }) => {
      report('Plan failed', await runPlanCommand({ ...targetOpts(opts), json: !!opts.json }));
    });

  withTargetFlags(program.command('run'))
    .description('Resolve and execute the gates')
    .action(async (opts: TargetFlags) => {
      const res = await runRunCommand(targetOpts(opts));
      // Gate failures are already summarised by the renderer.
      if (!res.ok && res.report) {
        process.exitCode = 1;
        return;
      }
      report('Run failed', res, 'Run with --verbose for more details.');
    });

  // ── Audit ─────────────────────────────────────────────────────────────────

  program
    .command('bypasses')
    .description('List emergency bypasses and the bypass rate')
    .option('--limit <n>', 'Show only the most recent N', parsePositiveInt)
    .action(async (opts: { limit?: number }) => {
      report('Bypass listing failed', await runBypassesCommand({ ...policyOpts(), limit: opts.limit }));
    });

  await program.parseAsync(argv);
}

function report(title: string, res: CommandResult, tip?: string): void {
  if (res.ok) return;
  getRenderer().error(title, res.details ?? 'unknown error', tip);
  process.exitCode = 1;
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function detectVersionSync(): string | null {
  try {
    const pkg = findUpSync(dirname(fileURLToPath(import.meta.url)), 'package.json');
    if (!pkg) return null;
    const parsed: unknown = JSON.parse(readFileSync(pkg, 'utf8'));
    return isPlainObject(parsed) && typeof parsed.version === 'string' ? parsed.version : null;
  } catch {
    return null;
  }
}

buildCli(process.argv).catch((err: unknown) => {
  getRenderer().error('Unexpected error', errorMessage(err), 'Run with --verbose for more details.');
  process.exitCode = 1;
});
