import { execa } from 'execa';

import { isErrnoException } from '../../utils/fs.js';
import { errorMessage } from '../errors.js';
import type { CommandExecutor, CommandOutcome, CommandRequest } from './types.js';

// Keep a bounded tail of tool output for reports.
const MAX_OUTPUT_CHARS = 64_000;

/**
 * Runs gate commands through `sh`. Each command gets its own process group so a
 * timeout kills every process the shell forked, not only the shell itself.
 */
export class ShellCommandExecutor implements CommandExecutor {
  async run(command: string, req: CommandRequest): Promise<CommandOutcome> {
    const start = Date.now();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    try {
      const subprocess = execa(command, {
        cwd: req.cwd,
        env: req.env,
        shell: true,
        detached: true,
        reject: false,
        stdin: 'ignore',
        stdout: 'pipe',
        stderr: 'pipe'
      });
      timer = setTimeout(() => {
        timedOut = true;
        killProcessGroup(subprocess.pid, () => subprocess.kill('SIGKILL'));
      }, req.timeoutMs);

      const res = await subprocess;
      return {
        exitCode: timedOut ? null : (res.exitCode ?? null),
        stdout: tail(res.stdout ?? ''),
        stderr: tail(res.stderr ?? ''),
        timedOut,
        durationMs: Date.now() - start
      };
    } catch (err) {
      return { exitCode: null, stdout: '', stderr: errorMessage(err), timedOut, durationMs: Date.now() - start };
    } finally {
      clearTimeout(timer);
    }
  }
}

function killProcessGroup(pid: number | undefined, killShell: () => void): void {
  if (pid === undefined) return killShell();
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    // ESRCH: the group is already gone.
    if (!isErrnoException(err) || err.code !== 'ESRCH') killShell();
  }
}

function tail(s: string): string {
  return s.length > MAX_OUTPUT_CHARS ? s.slice(-MAX_OUTPUT_CHARS) : s;
}
