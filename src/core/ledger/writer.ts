import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { isErrnoException } from '../../utils/fs.js';
import { LedgerEntrySchema, type LedgerEntry, type LedgerEntryInput } from './types.js';

export class LedgerWriter {
  private nextSeq: number;
  private ledgerPath: string;
  /** The file ends in a partial line; the next entry starts on a fresh one. */
  private pendingNewline: boolean;

  private constructor(ledgerPath: string, state: LedgerState) {
    this.ledgerPath = ledgerPath;
    this.nextSeq = state.nextSeq;
    this.pendingNewline = state.partialTail;
  }

  static async open(ledgerPath: string): Promise<LedgerWriter> {
    await mkdir(dirname(ledgerPath), { recursive: true });
    return new LedgerWriter(ledgerPath, await readLedgerState(ledgerPath));
  }

  get path(): string {
    return this.ledgerPath;
  }

  async append(event: LedgerEntryInput): Promise<LedgerEntry> {
    const entry = LedgerEntrySchema.parse({
      ...event,
      seq: this.nextSeq,
      timestamp: new Date().toISOString()
    });

    // One JSON object per line (JSONL). Append-only.
    const fh = await open(this.ledgerPath, 'a');
    try {
      await fh.writeFile(`${this.pendingNewline ? '\n' : ''}${JSON.stringify(entry)}\n`, { encoding: 'utf8' });
      await fh.sync();
    } finally {
      await fh.close();
    }

    this.nextSeq += 1;
    this.pendingNewline = false;
    return entry;
  }
}

interface LedgerState {
  nextSeq: number;
  partialTail: boolean;
}

async function readLedgerState(ledgerPath: string): Promise<LedgerState> {
  let content: string;
  try {
    content = await readFile(ledgerPath, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return { nextSeq: 1, partialTail: false };
    throw err;
  }
  const partialTail = content.length > 0 && !content.endsWith('\n');

  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  // A trailing partial line (crash mid-write) is skipped.
  for (let i = lines.length - 1; i >= 0; i--) {
    try {
      const parsed: unknown = JSON.parse(lines[i]);
      if (parsed && typeof parsed === 'object' && 'seq' in parsed && typeof parsed.seq === 'number' && Number.isFinite(parsed.seq)) {
        return { nextSeq: parsed.seq + 1, partialTail };
      }
    } catch {
      continue;
    }
  }
  return { nextSeq: 1, partialTail };
}
