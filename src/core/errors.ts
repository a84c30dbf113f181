export interface ValidationError {
  rule: string;
  message: string;
  details?: unknown;
}

export type GatewiseErrorCode =
  | 'policy_not_found'
  | 'policy_invalid'
  | 'unknown_stage'
  | 'bypass_reason_required'
  | 'git_context';

export class GatewiseError extends Error {
  constructor(
    readonly code: GatewiseErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class PolicyNotFoundError extends GatewiseError {
  constructor(readonly path: string) {
    super('policy_not_found', `Config not found: ${path}`);
  }
}

export class PolicyValidationError extends GatewiseError {
  constructor(
    readonly path: string,
    readonly errors: ValidationError[]
  ) {
    super('policy_invalid', `Invalid policy ${path}:\n${errors.map((e) => `  - ${e.message}`).join('\n')}`);
  }
}

export class UnknownStageError extends GatewiseError {
  constructor(
    readonly stage: string,
    readonly validStages: readonly string[]
  ) {
    super(
      'unknown_stage',
      `Unknown stage '${stage}'. Valid stages: ${[...validStages].sort().join(', ')}.\n` +
        `Check for typos (e.g., 'pre_push' should be 'pre-push').`
    );
  }
}

export class BypassReasonRequiredError extends GatewiseError {
  constructor(readonly reasonEnvVar: string) {
    super('bypass_reason_required', `Emergency bypass requires a reason (set ${reasonEnvVar}).`);
  }
}

export class GitContextError extends GatewiseError {
  constructor(message: string) {
    super('git_context', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
