import { resolvePlan, type GatePlan } from '../../core/match/engine.js';
import { getLogger } from '../../utils/logger.js';
import { loadContext, resolveTarget, type TargetOptions } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { toFailure, type CommandResult } from './shared.js';

export interface PlanCommandOptions extends TargetOptions {
  /** Print the plan as JSON on stdout. */
  json?: boolean;
}

/**
 * `gatewise plan`: show which gates would run for the current branch and changeset.
 */
export async function runPlanCommand(opts: PlanCommandOptions): Promise<CommandResult & { plan?: GatePlan }> {
  try {
    const ctx = await loadContext(opts);
    const target = await resolveTarget(ctx, opts);
    const plan = resolvePlan(ctx.policy, target, getLogger());

    if (opts.json) {
      process.stdout.write(`${JSON.stringify(plan, null, 2)}\n`);
    } else {
      getRenderer().plan(plan);
    }
    return { ok: true, plan };
  } catch (err) {
    return toFailure(err);
  }
}
