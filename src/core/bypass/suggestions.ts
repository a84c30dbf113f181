import YAML from 'yaml';

import { branchMatches } from '../match/engine.js';
import { allPathsMatch, matchesAny, normalizePath } from '../match/patterns.js';
import type { Policy } from '../policy/types.js';
import type { ExemptionSuggestion } from './types.js';

export interface SuggestionContext {
  branch: string;
  changedFiles: string[];
  /** Gates the plan would have run. */
  bypassedGates: string[];
}

/**
 * Exemption rules that would have made a bypass unnecessary.
 *
 * Existing rules that waive a bypassed gate are reported when they only just missed:
 * the paths matched but the branch did not, or the branch matched but some files
 * fell outside the rule. A new rule scoped to the changed directories is proposed
 * as YAML.
 */
export function suggestExemptions(policy: Policy, ctx: SuggestionContext): ExemptionSuggestion[] {
  const files = ctx.changedFiles.map(normalizePath);
  const out: ExemptionSuggestion[] = [];

  for (const rule of policy.exemptions) {
    const gates = rule.exemptGates.filter((g) => ctx.bypassedGates.includes(g));
    if (gates.length === 0) continue;

    const hasBranches = rule.branches.length > 0;
    const hasPaths = rule.paths.length > 0;
    const branchOk = hasBranches && branchMatches(rule, ctx.branch);
    const pathsOk = hasPaths && allPathsMatch(files, rule.paths);

    if (hasPaths && pathsOk && hasBranches && !branchOk) {
      out.push({
        kind: 'existing_rule_branch_mismatch',
        rule: rule.name,
        message: `Rule '${rule.name}' covers these files but only on branches matching ${rule.branches.join(', ')} (current: ${ctx.branch})`,
        gates,
        unmatchedFiles: [],
        proposal: null
      });
      continue;
    }

    if (hasPaths && !pathsOk && (!hasBranches || branchOk) && files.length > 0) {
      const unmatched = files.filter((f) => !matchesAny(f, rule.paths));
      // Only near misses are useful: at least one file must already be covered.
      if (unmatched.length === files.length) continue;
      out.push({
        kind: 'existing_rule_paths_partial',
        rule: rule.name,
        message: `Rule '${rule.name}' would apply without ${unmatched.length} file(s) outside ${rule.paths.join(', ')}`,
        gates,
        unmatchedFiles: unmatched,
        proposal: null
      });
    }
  }

  const proposed = proposeRule(files, ctx);
  if (proposed) out.push(proposed);
  return out;
}

/**
 * Collapse changed files into path globs: files under a top-level directory become
 * `<dir>/**`, files at the root stay literal.
 */
export function derivePathPatterns(files: string[]): string[] {
  const patterns = new Set<string>();
  for (const f of files.map(normalizePath)) {
    const slash = f.indexOf('/');
    patterns.add(slash > 0 ? `${f.slice(0, slash)}/**` : f);
  }
  return Array.from(patterns).sort();
}

function proposeRule(files: string[], ctx: SuggestionContext): ExemptionSuggestion | null {
  if (files.length === 0 || ctx.bypassedGates.length === 0) return null;

  const paths = derivePathPatterns(files);
  const name = `proposed-${slug(paths[0].replace(/\/\*\*$/, ''))}`;
  const proposal = YAML.stringify({
    exemptions: [
      {
        name,
        description: `Suggested after an emergency bypass on ${ctx.branch}`,
        match: { paths },
        exempt_gates: ctx.bypassedGates
      }
    ]
  });

  return {
    kind: 'proposed_rule',
    rule: name,
    message: `Add rule '${name}' to exempt ${ctx.bypassedGates.join(', ')} for ${paths.join(', ')}`,
    gates: [...ctx.bypassedGates],
    unmatchedFiles: [],
    proposal
  };
}

export function slug(value: string): string {
  const s = value
    .toLowerCase()
    .replaceAll(/[^a-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return s || 'unknown';
}
