import { join } from 'node:path';

import { readJson, safeReaddir, writeJson } from '../../utils/fs.js';
import { getLogger, type Logger } from '../../utils/logger.js';
import { BypassReasonRequiredError, errorMessage } from '../errors.js';
import type { LedgerWriter } from '../ledger/writer.js';
import type { LedgerEntry } from '../ledger/types.js';
import type { GatePlan } from '../match/engine.js';
import type { Policy } from '../policy/types.js';
import { slug, suggestExemptions } from './suggestions.js';
import { BypassRecord, type BypassRequest } from './types.js';

const TRUTHY = new Set(['1', 'true', 'yes']);

/**
 * A bypass is requested when the policy allows it and the configured variable is
 * set to 1/true/yes.
 */
export function detectBypass(policy: Policy, env: NodeJS.ProcessEnv = process.env): BypassRequest | null {
  const cfg = policy.emergencyBypass;
  if (!cfg.enabled) return null;
  const flag = env[cfg.envVar]?.trim().toLowerCase();
  if (!flag || !TRUTHY.has(flag)) return null;
  return { envVar: cfg.envVar, reasonEnvVar: cfg.reasonEnvVar, reason: env[cfg.reasonEnvVar]?.trim() ?? '' };
}

export interface RecordBypassInput {
  policy: Policy;
  request: BypassRequest;
  user: string;
  plan: GatePlan;
  /** Absolute directory the JSON record is written to. */
  logDir: string;
  ledger?: LedgerWriter;
  now?: Date;
  logger?: Logger;
}

export interface RecordedBypass {
  record: BypassRecord;
  path: string;
}

/**
 * Write the audit record for an emergency bypass and append it to the ledger.
 * The record names the gates the plan would have run and carries exemption suggestions.
 */
export async function recordBypass(input: RecordBypassInput): Promise<RecordedBypass> {
  const logger = input.logger ?? getLogger();
  const reason = input.request.reason.trim();
  if (!reason) throw new BypassReasonRequiredError(input.request.reasonEnvVar);

  const timestamp = (input.now ?? new Date()).toISOString();
  const bypassedGates = input.plan.gates.filter((g) => g.decision === 'run').map((g) => g.name);

  const record: BypassRecord = {
    timestamp,
    user: input.user,
    reason,
    branch: input.plan.branch,
    stage: input.plan.stage,
    changedFiles: input.plan.changedFiles,
    bypassedGates,
    suggestions: suggestExemptions(input.policy, {
      branch: input.plan.branch,
      changedFiles: input.plan.changedFiles,
      bypassedGates
    })
  };

  const path = join(input.logDir, bypassFileName(timestamp, input.user));
  await writeJson(path, record);
  logger.info('Recorded emergency bypass', { path, user: input.user, gates: bypassedGates });

  await input.ledger?.append({
    type: 'bypass_recorded',
    data: { user: input.user, reason, branch: record.branch, recordPath: path, bypassedGates }
  });

  return { record, path };
}

export function bypassFileName(timestampIso: string, user: string): string {
  return `${timestampIso.replaceAll(/[:.]/g, '-')}-${slug(user)}.json`;
}

/**
 * Read every bypass record in `logDir`, oldest first. Unreadable files are skipped
 * with a warning.
 */
export async function listBypasses(logDir: string, logger: Logger = getLogger()): Promise<BypassRecord[]> {
  const files = (await safeReaddir(logDir)).filter((f) => f.endsWith('.json'));
  const records: BypassRecord[] = [];
  for (const f of files) {
    try {
      records.push(BypassRecord.parse(await readJson(join(logDir, f))));
    } catch (err) {
      logger.warn(`Skipping unreadable bypass record ${f}: ${errorMessage(err)}`);
    }
  }
  return records.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
}

export interface BypassStats {
  bypasses: number;
  runs: number;
  /** bypasses / (runs + bypasses); 0 when nothing was recorded. */
  rate: number;
}

export function bypassStats(records: BypassRecord[], ledger: LedgerEntry[]): BypassStats {
  const runs = ledger.filter((e) => e.type === 'run_completed').length;
  const bypasses = records.length;
  const total = runs + bypasses;
  return { bypasses, runs, rate: total === 0 ? 0 : bypasses / total };
}
