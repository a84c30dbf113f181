import type { BypassStats } from '../../core/bypass/bypass-logger.js';
import type { BypassRecord } from '../../core/bypass/types.js';
import type { ValidationError } from '../../core/errors.js';
import type { GatePlan, PlannedGate } from '../../core/match/engine.js';
import type { Policy } from '../../core/policy/types.js';
import type { GateResult, RunReport } from '../../core/runner/types.js';
import { theme, GATE_NAME_WIDTH, INDENT, RULE_WIDTH } from './theme.js';
import {
  drawBox,
  formatMs,
  formatPercent,
  keyValue,
  padRight,
  planLine,
  resultLine,
  sectionBanner,
  tailLines
} from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

export interface RunHeader {
  runId: string;
  branch: string;
  stage: string | null;
  changedFiles: number;
}

/**
 * The Renderer is the single output coordinator for the CLI.
 * All user-facing output routes through it:
 * - InteractiveRenderer for rich TTY output (colors, spinners, box-drawing)
 * - QuietRenderer for machine-friendly JSON lines (--quiet mode)
 */
export interface Renderer {
  // ── Policy ──
  policySummary(policy: Policy): void;
  validationErrors(path: string, errors: ValidationError[]): void;

  // ── Plan / Run ──
  plan(plan: GatePlan): void;
  runStarted(header: RunHeader): void;
  gateStarted(gate: PlannedGate): void;
  gateFinished(result: GateResult): void;
  runSummary(report: RunReport): void;

  // ── Bypass ──
  bypassRecorded(record: BypassRecord, path: string): void;
  bypassList(records: BypassRecord[], stats: BypassStats): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  // ── Generic ──
  success(message: string): void;
  dim(message: string): void;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private active: SpinnerHandle | null = null;

  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  policySummary(policy: Policy): void {
    const lines: string[] = [];
    lines.push(`${theme.box.label('Version:')}  ${policy.version}`);
    lines.push(`${theme.box.label('Strategy:')} ${policy.exemptionStrategy}`);
    lines.push(`${theme.box.label('Source:')}   ${policy.sources.basePath}`);
    if (policy.sources.overridePath) {
      lines.push(`${theme.box.label('Override:')} ${policy.sources.overridePath}`);
    }
    lines.push('');
    lines.push(theme.bold('Execution order:'));
    for (const name of policy.executionOrder) {
      const gate = policy.gates[name];
      if (!gate) continue;
      const flags = [gate.required ? 'required' : 'optional', gate.enabled ? '' : 'disabled'].filter(Boolean).join(', ');
      const deps = gate.dependsOn.length > 0 ? ` ${theme.arrow} ${gate.dependsOn.join(', ')}` : '';
      lines.push(`  ${padRight(name, GATE_NAME_WIDTH)}${theme.dim(flags)}${theme.dim(deps)}`);
    }
    if (policy.exemptions.length > 0) {
      lines.push('');
      lines.push(theme.bold('Exemption rules:'));
      for (const rule of policy.exemptions) {
        lines.push(`  ${theme.bullet} ${rule.name}`);
      }
    }
    this.writeln(drawBox('Policy', lines, RULE_WIDTH));
    this.writeln();
  }

  validationErrors(path: string, errors: ValidationError[]): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('INVALID'))}  ${path}`);
    this.writeln();
    for (const e of errors) {
      this.writeln(`${INDENT}${theme.cross} ${e.message} ${theme.dim(`(${e.rule})`)}`);
    }
    this.writeln();
  }

  plan(plan: GatePlan): void {
    this.writeln();
    this.writeln(INDENT + sectionBanner('Plan'));
    this.writeln();
    this.writeln(keyValue('Branch', plan.branch));
    this.writeln(keyValue('Stage', plan.stage ?? theme.dim('(base)')));
    this.writeln(keyValue('Files', String(plan.changedFiles.length)));
    this.writeln(keyValue('Rule', plan.appliedRules.join(', ') || theme.dim('(none)')));
    this.writeln();
    for (const gate of plan.gates) this.writeln(planLine(gate));
    this.writeln();
  }

  runStarted(header: RunHeader): void {
    this.writeln();
    this.writeln(INDENT + sectionBanner(`Run ${header.runId}`));
    this.writeln();
    const stage = header.stage ?? 'base';
    this.writeln(`${INDENT}${theme.dim(`${header.branch}  |  stage ${stage}  |  ${header.changedFiles} changed file(s)`)}`);
    this.writeln();
  }

  gateStarted(gate: PlannedGate): void {
    this.active?.stop();
    this.active = startSpinner(`${gate.name}  ${theme.dim(gate.command)}`);
  }

  gateFinished(result: GateResult): void {
    this.active?.stop();
    this.active = null;
    this.writeln(resultLine(result));
  }

  runSummary(report: RunReport): void {
    this.writeln();
    if (report.passed) {
      this.writeln(`${INDENT}${theme.success(`All gates passed`)} ${theme.dim(`(${report.totalCount} run, ${formatMs(report.durationMs)})`)}`);
      this.writeln();
      return;
    }

    this.writeln(
      `${INDENT}${theme.error(theme.bold(`${report.failedCount} gate(s) failed`))} ${theme.dim(`(${report.totalCount} run, ${formatMs(report.durationMs)})`)}`
    );
    for (const f of report.failures) {
      this.writeln();
      this.writeln(`${INDENT}${theme.cross} ${theme.bold(f.gate)}${f.required ? '' : theme.dim(' (optional)')}`);
      for (const line of tailLines(f.message, 20)) this.writeln(`${INDENT}${INDENT}${theme.dim(line)}`);
      if (f.failMessage) this.writeln(`${INDENT}${INDENT}${theme.warning(f.failMessage)}`);
    }
    this.writeln();
  }

  bypassRecorded(record: BypassRecord, path: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.warning(theme.bold('EMERGENCY BYPASS'))}  gates not run: ${record.bypassedGates.join(', ') || '(none)'}`);
    this.writeln();
    this.writeln(keyValue('User', record.user));
    this.writeln(keyValue('Reason', record.reason));
    this.writeln(keyValue('Logged', path));

    if (record.suggestions.length > 0) {
      this.writeln();
      this.writeln(`${INDENT}${theme.bold('Suggestions')}`);
      for (const s of record.suggestions) {
        this.writeln(`${INDENT}  ${theme.bullet} ${s.message}`);
        if (s.proposal) {
          for (const line of s.proposal.trimEnd().split('\n')) this.writeln(`${INDENT}      ${theme.dim(line)}`);
        }
      }
    }
    this.writeln();
  }

  bypassList(records: BypassRecord[], stats: BypassStats): void {
    this.writeln(`${INDENT}${theme.bold('Emergency bypasses')}`);
    this.writeln();
    if (records.length === 0) {
      this.writeln(`${INDENT}  ${theme.dim('(none recorded)')}`);
    }
    for (const r of records) {
      const when = r.timestamp.slice(0, 19).replace('T', ' ');
      this.writeln(`${INDENT}  ${theme.dim(when)}  ${padRight(r.user, 16)}${padRight(r.branch, 24)}${r.reason}`);
    }
    this.writeln();
    this.writeln(keyValue('Bypasses', String(stats.bypasses)));
    this.writeln(keyValue('Runs', String(stats.runs)));
    this.writeln(keyValue('Rate', formatPercent(stats.rate)));
    this.writeln();
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }

  dim(message: string): void {
    this.writeln(`${INDENT}${theme.dim(message)}`);
  }
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  policySummary(policy: Policy): void {
    this.emit('policy', {
      version: policy.version,
      strategy: policy.exemptionStrategy,
      executionOrder: policy.executionOrder,
      exemptions: policy.exemptions.map((r) => r.name),
      sources: policy.sources
    });
  }

  validationErrors(path: string, errors: ValidationError[]): void {
    this.emit('validation_errors', { path, errors: errors.map((e) => ({ rule: e.rule, message: e.message })) });
  }

  plan(plan: GatePlan): void {
    this.emit('plan', { ...plan });
  }

  runStarted(header: RunHeader): void {
    this.emit('run_started', { ...header });
  }

  gateStarted(gate: PlannedGate): void {
    this.emit('gate_started', { gate: gate.name, command: gate.command });
  }

  gateFinished(result: GateResult): void {
    this.emit('gate_finished', { ...result });
  }

  runSummary(report: RunReport): void {
    this.emit('run_completed', {
      passed: report.passed,
      failedCount: report.failedCount,
      totalCount: report.totalCount,
      durationMs: report.durationMs,
      failures: report.failures.map((f) => f.gate)
    });
  }

  bypassRecorded(record: BypassRecord, path: string): void {
    this.emit('bypass_recorded', { path, ...record });
  }

  bypassList(records: BypassRecord[], stats: BypassStats): void {
    this.emit('bypasses', { records, ...stats });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  success(message: string): void {
    this.emit('success', { message });
  }

  dim(message: string): void {
    this.emit('dim', { message });
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.GATEWISE_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing or --quiet mode).
 */
export function setRenderer(renderer: Renderer | null): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
