import type { GatePlan, PlannedGate } from '../match/engine.js';
import { getLogger, type Logger } from '../../utils/logger.js';
import { ShellCommandExecutor } from './executor.js';
import { isToolAvailable } from './tools.js';
import type { CommandExecutor, GateResult, RunEvent, RunReport, ToolProbe } from './types.js';

export interface RunPlanOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  executor?: CommandExecutor;
  toolProbe?: ToolProbe;
  onEvent?: (event: RunEvent) => void;
  logger?: Logger;
}

/**
 * Execute a resolved plan.
 *
 * Gates run in plan order. A gate whose dependency failed or was blocked is itself
 * blocked. A required gate that does not pass stops the run and the remaining gates
 * are reported as not run; optional failures are recorded and the run continues.
 */
export async function runPlan(plan: GatePlan, opts: RunPlanOptions): Promise<RunReport> {
  const logger = opts.logger ?? getLogger();
  const env = opts.env ?? process.env;
  const executor = opts.executor ?? new ShellCommandExecutor();
  const toolProbe = opts.toolProbe ?? ((tool: string) => isToolAvailable(tool, env, opts.cwd));

  const start = Date.now();
  const results: GateResult[] = [];
  const notPassed = new Set<string>();
  let haltedBy: string | null = null;

  const finish = (gate: PlannedGate, result: GateResult) => {
    opts.onEvent?.({ type: 'gate_finished', gate, result });
    results.push(result);
  };

  for (const gate of plan.gates) {
    if (haltedBy) {
      finish(gate, outcome(gate, 'not_run', `not run: required gate '${haltedBy}' failed`));
      continue;
    }

    if (gate.decision === 'skip') {
      finish(gate, outcome(gate, 'skipped', gate.detail));
      continue;
    }

    const blockers = gate.dependsOn.filter((d) => notPassed.has(d));
    let result: GateResult;
    if (blockers.length > 0) {
      result = outcome(gate, 'blocked', `blocked by failed dependencies: ${blockers.join(', ')}`);
    } else {
      opts.onEvent?.({ type: 'gate_started', gate });
      result = await executeGate(gate, { ...opts, env, executor, toolProbe });
    }
    finish(gate, result);
    logger.debug('Gate finished', { gate: gate.name, status: result.status, durationMs: result.durationMs });

    if (result.status === 'failed' || result.status === 'blocked') {
      notPassed.add(gate.name);
      if (gate.required) haltedBy = gate.name;
    }
  }

  const failures = results.filter((r) => r.status === 'failed' || r.status === 'blocked');
  const executed = results.filter((r) => r.status === 'passed' || r.status === 'failed');

  return {
    passed: failures.length === 0,
    failedCount: failures.length,
    totalCount: executed.length,
    durationMs: Date.now() - start,
    results,
    failures
  };
}

interface ExecuteGateDeps {
  cwd: string;
  env: NodeJS.ProcessEnv;
  executor: CommandExecutor;
  toolProbe: ToolProbe;
}

export async function executeGate(gate: PlannedGate, deps: ExecuteGateDeps): Promise<GateResult> {
  if (!(await deps.toolProbe(gate.tool))) {
    if (gate.required) {
      return {
        ...outcome(gate, 'failed', `Tool '${gate.tool}' not installed`),
        failMessage: `Install ${gate.tool} and re-run`
      };
    }
    return outcome(gate, 'skipped', `Tool '${gate.tool}' not installed (skipped - optional)`);
  }

  const res = await deps.executor.run(gate.command, {
    cwd: deps.cwd,
    env: deps.env,
    timeoutMs: gate.timeoutSeconds * 1000
  });

  if (res.timedOut) {
    return {
      ...outcome(gate, 'failed', `Timeout after ${gate.timeoutSeconds} seconds`),
      durationMs: res.durationMs,
      failMessage: gate.failMessage
    };
  }

  if (res.exitCode === 0) {
    return { ...outcome(gate, 'passed', 'Passed'), durationMs: res.durationMs, exitCode: 0 };
  }

  const output = [res.stdout, res.stderr].filter((s) => s.trim()).join('\n');
  return {
    ...outcome(gate, 'failed', output || `exit ${res.exitCode ?? 'unknown'}`),
    durationMs: res.durationMs,
    exitCode: res.exitCode,
    failMessage: gate.failMessage
  };
}

function outcome(gate: PlannedGate, status: GateResult['status'], message: string): GateResult {
  return { gate: gate.name, status, required: gate.required, durationMs: 0, message, failMessage: '', exitCode: null };
}
