import { isAbsolute, join, resolve } from 'node:path';

import type { Policy } from '../core/policy/types.js';

export const STATE_DIR_NAME = '.gatewise';

export interface WorkspacePaths {
  repoRoot: string;
  stateDir: string;
  ledgerPath: string;
  bypassLogDir: string;
}

export function resolveWorkspacePaths(repoRoot: string, policy: Pick<Policy, 'emergencyBypass'>): WorkspacePaths {
  const root = resolve(repoRoot);
  const stateDir = join(root, STATE_DIR_NAME);
  const logDir = policy.emergencyBypass.logDir;
  return {
    repoRoot: root,
    stateDir,
    ledgerPath: join(stateDir, 'ledger.jsonl'),
    bypassLogDir: isAbsolute(logDir) ? logDir : join(root, logDir)
  };
}
