import type { PlannedGate } from '../match/engine.js';

export type GateStatus = 'passed' | 'failed' | 'skipped' | 'blocked' | 'not_run';

export interface GateResult {
  gate: string;
  status: GateStatus;
  required: boolean;
  durationMs: number;
  /** Short outcome, or the combined tool output when the command failed. */
  message: string;
  failMessage: string;
  exitCode: number | null;
}

export interface RunReport {
  passed: boolean;
  /** Gates that did not pass (failed or blocked). */
  failedCount: number;
  /** Gates whose command was actually executed (or whose required tool was missing). */
  totalCount: number;
  durationMs: number;
  results: GateResult[];
  failures: GateResult[];
}

export interface CommandOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

export interface CommandRequest {
  cwd: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

/** Runs one gate command through a shell. Must not throw for a failing command. */
export interface CommandExecutor {
  run(command: string, req: CommandRequest): Promise<CommandOutcome>;
}

export type ToolProbe = (tool: string) => Promise<boolean>;

export type RunEvent =
  | { type: 'gate_started'; gate: PlannedGate }
  | { type: 'gate_finished'; gate: PlannedGate; result: GateResult };
