import chalk, { type ChalkInstance } from 'chalk';

import type { GateStatus } from '../../core/runner/types.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,

  // Symbols
  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  bullet: chalk.dim('•'),
  arrow: chalk.dim('→'),

  // Gate status badges
  status: (status: GateStatus): ChalkInstance => {
    const map: Record<GateStatus, ChalkInstance> = {
      passed: chalk.green,
      failed: chalk.red,
      blocked: chalk.red,
      skipped: chalk.dim,
      not_run: chalk.dim
    };
    return map[status];
  },

  // Box chrome
  box: {
    border: chalk.cyan,
    title: chalk.bold.cyan,
    label: chalk.bold
  }
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 64;

/** Column width for gate names in plan and result tables. */
export const GATE_NAME_WIDTH = 18;
