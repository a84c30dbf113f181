import { z } from 'zod';

export const STAGES = ['pre-push', 'pr', 'push-to-main'] as const;
export const Stage = z.enum(STAGES);
export type Stage = z.infer<typeof Stage>;

export const EXEMPTION_STRATEGIES = ['first-match', 'most-specific'] as const;
export const ExemptionStrategy = z.enum(EXEMPTION_STRATEGIES);
export type ExemptionStrategy = z.infer<typeof ExemptionStrategy>;

export const DEFAULT_TIMEOUT_SECONDS = 300;
export const DEFAULT_OVERRIDE_FILE = 'quality-gates.local.yaml';

const GlobPattern = z.string().min(1);
const GateName = z.string().min(1);

// ── On-disk document (snake_case YAML) ──────────────────────────────────────

export const RawGate = z.object({
  enabled: z.boolean(),
  tool: z.string().min(1),
  command: z.string().min(1).optional(),
  /** Named sub-commands, joined with `&&` when `command` is absent. */
  commands: z.record(z.string(), z.string().min(1)).optional(),
  threshold: z.number().int().optional(),
  description: z.string().default(''),
  required: z.boolean(),
  depends_on: z.array(GateName).default([]),
  omit_patterns: z.array(GlobPattern).default([]),
  skip_if_only_paths: z.array(GlobPattern).default([]),
  fail_message: z.string().default(''),
  timeout_seconds: z.number().int().positive().default(DEFAULT_TIMEOUT_SECONDS),
  /** Stage name -> gate fields to replace for that stage. Values are checked when applied. */
  stage_relaxations: z.record(z.string(), z.record(z.string(), z.unknown())).default({})
});

export const RawExemptionRule = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  match: z
    .object({
      branches: z.array(GlobPattern).default([]),
      paths: z.array(GlobPattern).default([])
    })
    .default({}),
  exempt_gates: z.array(GateName).default([]),
  required_gates: z.array(GateName).default([]),
  thresholds: z.record(z.string(), z.number().int()).default({})
});

export const RawEmergencyBypass = z.object({
  enabled: z.boolean().default(true),
  env_var: z.string().min(1).default('EMERGENCY_PUSH'),
  reason_env_var: z.string().min(1).default('EMERGENCY_REASON'),
  log_dir: z.string().min(1).default('.emergency-bypasses')
});

export const RawPolicyDocument = z.object({
  version: z.union([z.string().min(1), z.number()]).transform(String),
  gates: z.record(z.string(), RawGate),
  execution_order: z.array(GateName),
  exemptions: z.array(RawExemptionRule).default([]),
  exemption_strategy: ExemptionStrategy.default('first-match'),
  emergency_bypass: RawEmergencyBypass.default({}),
  override_file: z.string().min(1).default(DEFAULT_OVERRIDE_FILE)
});

export type RawGate = z.infer<typeof RawGate>;
export type RawExemptionRule = z.infer<typeof RawExemptionRule>;
export type RawPolicyDocument = z.infer<typeof RawPolicyDocument>;

// ── In-memory model ─────────────────────────────────────────────────────────

export interface GateDefinition {
  name: string;
  enabled: boolean;
  tool: string;
  /** Command template; may contain `{threshold}`, `{omit}` and `{changed_files}`. */
  command: string;
  threshold: number | null;
  description: string;
  required: boolean;
  dependsOn: string[];
  omitPatterns: string[];
  skipIfOnlyPaths: string[];
  failMessage: string;
  timeoutSeconds: number;
  stageRelaxations: Record<string, Record<string, unknown>>;
}

export interface ExemptionRule {
  name: string;
  description: string;
  branches: string[];
  paths: string[];
  exemptGates: string[];
  requiredGates: string[];
  thresholds: Record<string, number>;
}

export interface EmergencyBypassConfig {
  enabled: boolean;
  envVar: string;
  reasonEnvVar: string;
  logDir: string;
}

export interface PolicySources {
  basePath: string;
  overridePath: string | null;
}

export interface Policy {
  version: string;
  gates: Record<string, GateDefinition>;
  executionOrder: string[];
  exemptions: ExemptionRule[];
  exemptionStrategy: ExemptionStrategy;
  emergencyBypass: EmergencyBypassConfig;
  overrideFile: string;
  sources: PolicySources;
}

export function toPolicy(doc: RawPolicyDocument, sources: PolicySources): Policy {
  const gates: Record<string, GateDefinition> = {};
  for (const [name, g] of Object.entries(doc.gates)) {
    gates[name] = {
      name,
      enabled: g.enabled,
      tool: g.tool,
      command: g.command ?? Object.values(g.commands ?? {}).join(' && '),
      threshold: g.threshold ?? null,
      description: g.description,
      required: g.required,
      dependsOn: Array.from(new Set(g.depends_on)),
      omitPatterns: g.omit_patterns,
      skipIfOnlyPaths: g.skip_if_only_paths,
      failMessage: g.fail_message,
      timeoutSeconds: g.timeout_seconds,
      stageRelaxations: g.stage_relaxations
    };
  }

  return {
    version: doc.version,
    gates,
    executionOrder: doc.execution_order,
    exemptions: doc.exemptions.map((r) => ({
      name: r.name,
      description: r.description,
      branches: r.match.branches,
      paths: r.match.paths,
      exemptGates: Array.from(new Set(r.exempt_gates)),
      requiredGates: Array.from(new Set(r.required_gates)),
      thresholds: r.thresholds
    })),
    exemptionStrategy: doc.exemption_strategy,
    emergencyBypass: {
      enabled: doc.emergency_bypass.enabled,
      envVar: doc.emergency_bypass.env_var,
      reasonEnvVar: doc.emergency_bypass.reason_env_var,
      logDir: doc.emergency_bypass.log_dir
    },
    overrideFile: doc.override_file,
    sources
  };
}
