import { getLogger, type Logger } from '../../utils/logger.js';
import type { GateDefinition, Policy, Stage } from './types.js';

type Relaxer = (gate: GateDefinition, value: unknown) => GateDefinition | null;

const isPositiveInt = (v: unknown): v is number => typeof v === 'number' && Number.isInteger(v) && v > 0;
const isStringArray = (v: unknown): v is string[] => Array.isArray(v) && v.every((s) => typeof s === 'string');

// Relaxation keys use the document's snake_case names. A relaxer returns null when
// the value has the wrong type.
const RELAXERS: Record<string, Relaxer> = {
  enabled: (g, v) => (typeof v === 'boolean' ? { ...g, enabled: v } : null),
  required: (g, v) => (typeof v === 'boolean' ? { ...g, required: v } : null),
  threshold: (g, v) => (typeof v === 'number' && Number.isInteger(v) ? { ...g, threshold: v } : null),
  timeout_seconds: (g, v) => (isPositiveInt(v) ? { ...g, timeoutSeconds: v } : null),
  command: (g, v) => (typeof v === 'string' && v.trim() ? { ...g, command: v } : null),
  fail_message: (g, v) => (typeof v === 'string' ? { ...g, failMessage: v } : null),
  skip_if_only_paths: (g, v) => (isStringArray(v) ? { ...g, skipIfOnlyPaths: [...v] } : null)
};

/**
 * Apply a stage's relaxations to every gate.
 *
 * The base document is the highest standard, so `push-to-main` and an unknown
 * (null) stage return the policy untouched. The input policy is never mutated.
 */
export function applyStageRelaxations(policy: Policy, stage: Stage | null, logger: Logger = getLogger()): Policy {
  if (stage === null || stage === 'push-to-main') return policy;

  const gates: Record<string, GateDefinition> = {};
  for (const [name, gate] of Object.entries(policy.gates)) {
    let relaxed: GateDefinition = { ...gate };
    const relaxations = gate.stageRelaxations[stage] ?? {};

    for (const [key, value] of Object.entries(relaxations)) {
      const relax = Object.hasOwn(RELAXERS, key) ? RELAXERS[key] : undefined;
      if (!relax) {
        logger.warn(`Unknown relaxation key '${key}' for gate '${name}' stage '${stage}'`);
        continue;
      }
      const next = relax(relaxed, value);
      if (!next) {
        logger.warn(`Ignoring relaxation '${key}' for gate '${name}' stage '${stage}': unexpected value`, { value });
        continue;
      }
      relaxed = next;
    }
    gates[name] = relaxed;
  }

  return { ...policy, gates };
}
