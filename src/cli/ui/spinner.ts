import ora from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Wraps `ora` for long-running gate commands. Non-TTY contexts (CI, git hooks
// with piped output) get static lines instead. Writes to stderr so that
// `gatewise plan --json` keeps stdout clean.

export interface SpinnerHandle {
  stop(): void;
}

export function startSpinner(text: string, env: NodeJS.ProcessEnv = process.env): SpinnerHandle {
  const stream = process.stderr;
  if (!stream.isTTY || env.GATEWISE_QUIET === '1' || env.GATEWISE_VERBOSE === '1') {
    stream.write(`  ${text}\n`);
    return { stop: () => {} };
  }

  // ora disables itself when CI is set; hooks run locally with CI=1 often enough.
  const spinner = ora({ text, stream, spinner: 'dots', indent: 2, isEnabled: true }).start();
  return {
    stop() {
      spinner.stop();
    }
  };
}
