import { loadContext, type PolicyOptions } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { toFailure, type CommandResult } from './shared.js';

/**
 * `gatewise check`: load, merge and validate the policy, then print a summary.
 */
export async function runCheckCommand(opts: PolicyOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const { policy } = await loadContext(opts);
    r.policySummary(policy);
    r.success(`Policy ${policy.version} is valid`);
    return { ok: true };
  } catch (err) {
    return toFailure(err);
  }
}
