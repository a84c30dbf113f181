import { isPlainObject } from '../../utils/fs.js';

/** Top-level keys an override document replaces wholesale. */
const REPLACED_KEYS = ['version', 'execution_order', 'emergency_bypass', 'exemptions', 'exemption_strategy'] as const;

/**
 * Merge a repository override document into the base document.
 *
 * Gates are merged per gate: keys in the override replace the same keys of the
 * base gate, unknown gates are added. Neither input is mutated.
 */
export function mergePolicyDocuments(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };

  if (isPlainObject(override.gates)) {
    const gates: Record<string, unknown> = isPlainObject(base.gates) ? { ...base.gates } : {};
    for (const [name, patch] of Object.entries(override.gates)) {
      const current = gates[name];
      gates[name] = isPlainObject(current) && isPlainObject(patch) ? { ...current, ...patch } : patch;
    }
    out.gates = gates;
  }

  for (const key of REPLACED_KEYS) {
    if (key in override) out[key] = override[key];
  }

  return out;
}
