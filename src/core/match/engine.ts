import { applyStageRelaxations } from '../policy/relaxations.js';
import type { ExemptionRule, GateDefinition, Policy, Stage } from '../policy/types.js';
import type { Logger } from '../../utils/logger.js';
import { renderCommand } from './command.js';
import { allPathsMatch, literalLength, matchesPattern, normalizePath } from './patterns.js';

export interface MatchContext {
  branch: string;
  changedFiles: string[];
  stage: Stage | null;
}

export type SkipReason = 'disabled' | 'exempt' | 'only_paths';

interface PlannedGateBase {
  name: string;
  tool: string;
  description: string;
  /** Command with placeholders substituted. */
  command: string;
  threshold: number | null;
  required: boolean;
  timeoutSeconds: number;
  dependsOn: string[];
  failMessage: string;
  /** Rule that forced this gate on via `required_gates`. */
  forcedBy?: string;
}

export type PlannedGate =
  | (PlannedGateBase & { decision: 'run' })
  | (PlannedGateBase & { decision: 'skip'; skipReason: SkipReason; detail: string });

export interface GatePlan {
  policyVersion: string;
  branch: string;
  stage: Stage | null;
  changedFiles: string[];
  strategy: Policy['exemptionStrategy'];
  appliedRules: string[];
  /** Gates in run order (dependencies first, otherwise as declared). */
  gates: PlannedGate[];
}

export function branchMatches(rule: ExemptionRule, branch: string): boolean {
  return rule.branches.some((p) => matchesPattern(branch, p));
}

/**
 * A rule applies when each predicate it declares holds: some branch glob matches the
 * branch, and every changed file matches one of its path globs.
 */
export function ruleMatches(rule: ExemptionRule, ctx: Pick<MatchContext, 'branch' | 'changedFiles'>): boolean {
  if (rule.branches.length === 0 && rule.paths.length === 0) return false;
  if (rule.branches.length > 0 && !branchMatches(rule, ctx.branch)) return false;
  if (rule.paths.length > 0 && !allPathsMatch(ctx.changedFiles, rule.paths)) return false;
  return true;
}

/**
 * Specificity of a matching rule: [predicate kinds declared, longest literal matched glob].
 */
export function ruleSpecificity(rule: ExemptionRule, ctx: Pick<MatchContext, 'branch' | 'changedFiles'>): [number, number] {
  const kinds = (rule.branches.length > 0 ? 1 : 0) + (rule.paths.length > 0 ? 1 : 0);
  const matched = [
    ...rule.branches.filter((p) => matchesPattern(ctx.branch, p)),
    ...rule.paths.filter((p) => ctx.changedFiles.some((f) => matchesPattern(f, p)))
  ];
  const literal = matched.reduce((max, p) => Math.max(max, literalLength(p)), 0);
  return [kinds, literal];
}

/**
 * Pick the exemption rule that applies, if any.
 *
 * `first-match` takes the first matching rule in document order. `most-specific`
 * ranks matching rules by ruleSpecificity; ties go to the earlier rule.
 */
export function selectRule(policy: Policy, ctx: Pick<MatchContext, 'branch' | 'changedFiles'>): ExemptionRule | null {
  const matching = policy.exemptions.filter((r) => ruleMatches(r, ctx));
  if (matching.length === 0) return null;
  if (policy.exemptionStrategy === 'first-match') return matching[0] ?? null;

  let best: ExemptionRule | null = null;
  let bestScore: [number, number] = [-1, -1];
  for (const rule of matching) {
    const score = ruleSpecificity(rule, ctx);
    if (score[0] > bestScore[0] || (score[0] === bestScore[0] && score[1] > bestScore[1])) {
      best = rule;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Topological order of `executionOrder` that keeps the declared order wherever the
 * dependencies allow it. A dependency declared after its dependent is hoisted in
 * front of it. Assumes an acyclic graph.
 */
export function orderGates(policy: Policy): string[] {
  const inOrder = new Set(policy.executionOrder);
  const position = new Map(policy.executionOrder.map((g, i) => [g, i] as const));
  const placed = new Set<string>();
  const out: string[] = [];

  const place = (name: string, path: Set<string>) => {
    if (placed.has(name) || path.has(name)) return;
    path.add(name);
    const deps = (policy.gates[name]?.dependsOn ?? [])
      .filter((d) => inOrder.has(d))
      .sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
    for (const d of deps) place(d, path);
    path.delete(name);
    placed.add(name);
    out.push(name);
  };

  for (const name of policy.executionOrder) place(name, new Set());
  return out;
}

/**
 * Compute the effective gates for a branch and changeset.
 *
 * Stage relaxations apply first, then the selected exemption rule: its thresholds
 * replace gate thresholds, `required_gates` forces gates on as required, and
 * `exempt_gates` waives gates. A gate is also skipped when disabled, or when every
 * changed file matches its `skip_if_only_paths`.
 */
export function resolvePlan(policy: Policy, ctx: MatchContext, logger?: Logger): GatePlan {
  const changedFiles = Array.from(new Set(ctx.changedFiles.map(normalizePath))).sort();
  const staged = applyStageRelaxations(policy, ctx.stage, logger);
  const rule = selectRule(staged, { branch: ctx.branch, changedFiles });

  const gates: PlannedGate[] = [];
  for (const name of orderGates(staged)) {
    const gate = staged.gates[name];
    if (!gate) continue;
    gates.push(planGate(gate, rule, changedFiles));
  }

  logger?.debug('Resolved gate plan', {
    branch: ctx.branch,
    stage: ctx.stage,
    rule: rule?.name ?? null,
    run: gates.filter((g) => g.decision === 'run').map((g) => g.name)
  });

  return {
    policyVersion: policy.version,
    branch: ctx.branch,
    stage: ctx.stage,
    changedFiles,
    strategy: policy.exemptionStrategy,
    appliedRules: rule ? [rule.name] : [],
    gates
  };
}

function planGate(gate: GateDefinition, rule: ExemptionRule | null, changedFiles: string[]): PlannedGate {
  const threshold = rule && Object.hasOwn(rule.thresholds, gate.name) ? (rule.thresholds[gate.name] ?? null) : gate.threshold;
  const forced = rule?.requiredGates.includes(gate.name) ?? false;

  const base: PlannedGateBase = {
    name: gate.name,
    tool: gate.tool,
    description: gate.description,
    command: renderCommand(gate.command, { threshold, omitPatterns: gate.omitPatterns, changedFiles }),
    threshold,
    required: forced || gate.required,
    timeoutSeconds: gate.timeoutSeconds,
    dependsOn: gate.dependsOn,
    failMessage: gate.failMessage
  };

  if (forced && rule) return { ...base, forcedBy: rule.name, decision: 'run' };

  if (!gate.enabled) {
    return { ...base, decision: 'skip', skipReason: 'disabled', detail: 'gate disabled' };
  }
  if (rule?.exemptGates.includes(gate.name)) {
    return { ...base, decision: 'skip', skipReason: 'exempt', detail: `exempted by rule '${rule.name}'` };
  }
  if (allPathsMatch(changedFiles, gate.skipIfOnlyPaths)) {
    return { ...base, decision: 'skip', skipReason: 'only_paths', detail: 'all changed files match skip_if_only_paths' };
  }
  return { ...base, decision: 'run' };
}
