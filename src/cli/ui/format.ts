import type { PlannedGate } from '../../core/match/engine.js';
import type { GateResult } from '../../core/runner/types.js';
import { theme, INDENT, RULE_WIDTH, GATE_NAME_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Format milliseconds into a compact human-readable string.
 * Examples: "124ms", "3.2s", "1m 42s", "2h 15m"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  if (m < 60) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return rm > 0 ? `${h}h ${rm}m` : `${h}h`;
}

/** "12.5%" with one decimal. */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

// ── Table Alignment ─────────────────────────────────────────────────────────

/**
 * Pad a string to a fixed width (right-pad with spaces).
 */
export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

// ── Section Banners ─────────────────────────────────────────────────────────

/**
 * A section banner:  ── Gates ────────────────────────
 */
export function sectionBanner(title: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const suffixLen = Math.max(4, width - prefix.length - title.length - 1);
  return theme.dim(prefix) + theme.bold(title) + theme.dim(' ' + '─'.repeat(suffixLen));
}

// ── Box Drawing ─────────────────────────────────────────────────────────────

/**
 * Draw a box with rounded corners around content lines.
 *
 * ```
 * ╭─── Title ─────────────────────────╮
 * │                                    │
 * │  content line 1                    │
 * │                                    │
 * ╰────────────────────────────────────╯
 * ```
 */
export function drawBox(title: string, lines: string[], width: number = RULE_WIDTH): string {
  const style = theme.box.border;

  const titleText = ` ${title} `;
  const topFillLen = Math.max(0, width - 2 - 3 - titleText.length);
  const topLine = style('╭───') + theme.box.title(titleText) + style('─'.repeat(topFillLen) + '╮');
  const bottomLine = style('╰' + '─'.repeat(width - 2) + '╯');
  const emptyLine = style('│') + ' '.repeat(width - 2) + style('│');

  const contentLines = lines.map((line) => {
    const padLen = Math.max(0, width - 4 - stripAnsi(line).length);
    return style('│') + '  ' + line + ' '.repeat(padLen) + style(' │');
  });

  return [topLine, emptyLine, ...contentLines, emptyLine, bottomLine].join('\n');
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * Format a label-value pair with alignment:
 * "  Branch      feature/login"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Gate Lines ──────────────────────────────────────────────────────────────

/**
 * One plan entry:
 *   ✔ lint              run       eslint . --max-warnings 0
 *   • coverage          skip      exempted by rule 'docs-only'
 */
export function planLine(gate: PlannedGate, nameWidth: number = GATE_NAME_WIDTH): string {
  const name = padRight(gate.name, nameWidth);
  if (gate.decision === 'run') {
    const req = gate.required ? '' : theme.dim(' (optional)');
    const forced = gate.forcedBy ? theme.warning(` [required by ${gate.forcedBy}]`) : '';
    return `${INDENT}${theme.check} ${name}${padRight('run', 10)}${theme.dim(gate.command)}${req}${forced}`;
  }
  return `${INDENT}${theme.bullet} ${theme.dim(name)}${theme.dim(padRight('skip', 10))}${theme.dim(gate.detail)}`;
}

/**
 * One gate result:
 *   ✔ lint              passed    1.2s
 *   ✖ tests             failed    4.0s  Timeout after 4 seconds
 */
export function resultLine(result: GateResult, nameWidth: number = GATE_NAME_WIDTH): string {
  const icon = result.status === 'passed' ? theme.check : result.status === 'failed' || result.status === 'blocked' ? theme.cross : theme.bullet;
  const name = padRight(result.gate, nameWidth);
  const status = theme.status(result.status)(padRight(result.status, 10));
  const timing = result.durationMs > 0 ? formatMs(result.durationMs) : '';
  const detail = result.status === 'passed' ? '' : firstLine(result.message);
  return `${INDENT}${icon} ${name}${status}${theme.dim([timing, detail].filter(Boolean).join('  '))}`;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Strip ANSI escape codes from a string (for width calculations).
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

export function firstLine(text: string): string {
  const line = text.split('\n').find((l) => l.trim()) ?? '';
  return line.trim();
}

/**
 * Keep the last `maxLines` lines of tool output.
 */
export function tailLines(text: string, maxLines: number): string[] {
  const lines = text.replace(/\n+$/, '').split('\n');
  if (lines.length <= maxLines) return lines;
  return [`... (${lines.length - maxLines} more lines)`, ...lines.slice(lines.length - maxLines)];
}
