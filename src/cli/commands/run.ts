import { detectBypass, recordBypass, type RecordedBypass } from '../../core/bypass/bypass-logger.js';
import type { BypassRequest } from '../../core/bypass/types.js';
import { LedgerWriter } from '../../core/ledger/writer.js';
import { resolvePlan, type GatePlan } from '../../core/match/engine.js';
import { runPlan } from '../../core/runner/runner.js';
import type { CommandExecutor, RunReport } from '../../core/runner/types.js';
import { getUserName, git } from '../../git/operations.js';
import { newRunId } from '../../utils/id.js';
import { getLogger } from '../../utils/logger.js';
import { loadContext, resolveTarget, type CliContext, type TargetOptions } from '../context.js';
import { canPrompt, promptReason } from '../ui/prompts.js';
import { getRenderer } from '../ui/renderer.js';
import { toFailure, type CommandResult } from './shared.js';

export interface RunCommandOptions extends TargetOptions {
  /** Allow prompting for a missing bypass reason. Defaults to true. */
  interactive?: boolean;
  executor?: CommandExecutor;
}

export interface RunCommandResult extends CommandResult {
  report?: RunReport;
  bypass?: RecordedBypass;
}

/**
 * `gatewise run`: resolve the plan and execute it, or record an emergency bypass
 * instead when one is requested through the environment.
 */
export async function runRunCommand(opts: RunCommandOptions): Promise<RunCommandResult> {
  const env = opts.env ?? process.env;
  try {
    const ctx = await loadContext(opts);
    const target = await resolveTarget(ctx, opts);
    const plan = resolvePlan(ctx.policy, target, getLogger());
    const ledger = await LedgerWriter.open(ctx.paths.ledgerPath);

    const bypass = detectBypass(ctx.policy, env);
    if (bypass) {
      const recorded = await bypassGates(ctx, plan, bypass, ledger, opts);
      getRenderer().bypassRecorded(recorded.record, recorded.path);
      return { ok: true, bypass: recorded };
    }

    const report = await executePlan(ctx, plan, ledger, opts);
    return report.passed ? { ok: true, report } : { ok: false, report, details: `${report.failedCount} gate(s) failed` };
  } catch (err) {
    return toFailure(err);
  }
}

async function executePlan(ctx: CliContext, plan: GatePlan, ledger: LedgerWriter, opts: RunCommandOptions): Promise<RunReport> {
  const r = getRenderer();
  const runId = newRunId();

  await ledger.append({
    type: 'run_started',
    data: {
      runId,
      branch: plan.branch,
      stage: plan.stage,
      changedFiles: plan.changedFiles.length,
      appliedRules: plan.appliedRules
    }
  });
  r.runStarted({ runId, branch: plan.branch, stage: plan.stage, changedFiles: plan.changedFiles.length });

  const report = await runPlan(plan, {
    cwd: ctx.paths.repoRoot,
    env: opts.env,
    executor: opts.executor,
    logger: getLogger(),
    onEvent: (event) => {
      if (event.type === 'gate_started') r.gateStarted(event.gate);
      else r.gateFinished(event.result);
    }
  });

  for (const result of report.results) {
    await ledger.append({
      type: 'gate_finished',
      data: { runId, gate: result.gate, status: result.status, durationMs: result.durationMs }
    });
  }
  await ledger.append({
    type: 'run_completed',
    data: {
      runId,
      passed: report.passed,
      failedCount: report.failedCount,
      totalCount: report.totalCount,
      durationMs: report.durationMs
    }
  });

  r.runSummary(report);
  return report;
}

async function bypassGates(
  ctx: CliContext,
  plan: GatePlan,
  request: BypassRequest,
  ledger: LedgerWriter,
  opts: RunCommandOptions
): Promise<RecordedBypass> {
  const env = opts.env ?? process.env;
  let reason = request.reason;
  if (!reason && (opts.interactive ?? true) && canPrompt()) {
    reason = await promptReason(`Emergency bypass reason (${request.reasonEnvVar})`);
  }

  const user = ctx.repoRoot
    ? await getUserName(git(ctx.repoRoot), env)
    : env.USER?.trim() || env.USERNAME?.trim() || 'unknown';

  return await recordBypass({
    policy: ctx.policy,
    request: { ...request, reason },
    user,
    plan,
    logDir: ctx.paths.bypassLogDir,
    ledger,
    logger: getLogger()
  });
}
