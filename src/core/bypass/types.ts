import { z } from 'zod';

import { TimestampIso } from '../ledger/types.js';

export const SuggestionKind = z.enum(['existing_rule_branch_mismatch', 'existing_rule_paths_partial', 'proposed_rule']);
export type SuggestionKind = z.infer<typeof SuggestionKind>;

export const ExemptionSuggestion = z.object({
  kind: SuggestionKind,
  /** Existing or proposed rule name. */
  rule: z.string(),
  message: z.string(),
  /** Gates the rule would have waived out of the bypassed ones. */
  gates: z.array(z.string()),
  unmatchedFiles: z.array(z.string()).default([]),
  /** YAML snippet for a proposed rule. */
  proposal: z.string().nullable().default(null)
});
export type ExemptionSuggestion = z.infer<typeof ExemptionSuggestion>;

export const BypassRecord = z.object({
  timestamp: TimestampIso,
  user: z.string(),
  reason: z.string().min(1),
  branch: z.string(),
  stage: z.string().nullable(),
  changedFiles: z.array(z.string()),
  bypassedGates: z.array(z.string()),
  suggestions: z.array(ExemptionSuggestion).default([])
});
export type BypassRecord = z.infer<typeof BypassRecord>;

export interface BypassRequest {
  envVar: string;
  reasonEnvVar: string;
  /** Empty when the reason variable is unset. */
  reason: string;
}
