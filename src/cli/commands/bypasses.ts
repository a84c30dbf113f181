import { bypassStats, listBypasses, type BypassStats } from '../../core/bypass/bypass-logger.js';
import type { BypassRecord } from '../../core/bypass/types.js';
import { LedgerReader } from '../../core/ledger/reader.js';
import { getLogger } from '../../utils/logger.js';
import { loadContext, type PolicyOptions } from '../context.js';
import { getRenderer } from '../ui/renderer.js';
import { toFailure, type CommandResult } from './shared.js';

export interface BypassesCommandOptions extends PolicyOptions {
  /** Show only the most recent N records. */
  limit?: number;
}

/**
 * `gatewise bypasses`: list recorded emergency bypasses and the bypass rate.
 */
export async function runBypassesCommand(
  opts: BypassesCommandOptions
): Promise<CommandResult & { records?: BypassRecord[]; stats?: BypassStats }> {
  const r = getRenderer();
  try {
    const ctx = await loadContext(opts);
    const records = await listBypasses(ctx.paths.bypassLogDir, getLogger());

    const ledger = new LedgerReader(ctx.paths.ledgerPath);
    const entries = await ledger.readAll();
    const integrity = await ledger.verifyIntegrity();
    if (!integrity.ok && integrity.message) r.warn(integrity.message);

    const stats = bypassStats(records, entries);
    const shown = opts.limit && opts.limit > 0 ? records.slice(-opts.limit) : records;
    r.bypassList(shown, stats);
    return { ok: true, records: shown, stats };
  } catch (err) {
    return toFailure(err);
  }
}
