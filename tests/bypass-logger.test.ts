import { describe, expect, it } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import YAML from 'yaml';

import {
  bypassFileName,
  bypassStats,
  detectBypass,
  listBypasses,
  recordBypass
} from '../src/core/bypass/bypass-logger.js';
import { derivePathPatterns, slug, suggestExemptions } from '../src/core/bypass/suggestions.js';
import { BypassReasonRequiredError } from '../src/core/errors.js';
import { LedgerReader } from '../src/core/ledger/reader.js';
import type { LedgerEntry } from '../src/core/ledger/types.js';
import { LedgerWriter } from '../src/core/ledger/writer.js';
import { resolvePlan } from '../src/core/match/engine.js';
import { Logger } from '../src/utils/logger.js';
import { baseDocument, policyFrom, tempDir } from './policy-fixture.js';

const silent = new Logger({ level: 'error', sink: () => {} });

function featurePlan() {
  return resolvePlan(
    policyFrom(),
    { branch: 'feature/login', changedFiles: ['src/auth/login.ts', 'README.md'], stage: 'pre-push' },
    silent
  );
}

describe('detectBypass', () => {
  const policy = policyFrom();

  it('reads the configured variables', () => {
    expect(detectBypass(policy, { EMERGENCY_PUSH: 'TRUE', EMERGENCY_REASON: ' prod is down ' })).toEqual({
      envVar: 'EMERGENCY_PUSH',
      reasonEnvVar: 'EMERGENCY_REASON',
      reason: 'prod is down'
    });
    expect(detectBypass(policy, { EMERGENCY_PUSH: 'yes' })?.reason).toBe('');
  });

  it('ignores other values and disabled bypasses', () => {
    expect(detectBypass(policy, { EMERGENCY_PUSH: '0' })).toBeNull();
    expect(detectBypass(policy, {})).toBeNull();

    const disabled = policyFrom({ ...baseDocument(), emergency_bypass: { enabled: false } });
    expect(detectBypass(disabled, { EMERGENCY_PUSH: '1', EMERGENCY_REASON: 'x' })).toBeNull();

    const custom = policyFrom({ ...baseDocument(), emergency_bypass: { env_var: 'SKIP_GATES', reason_env_var: 'SKIP_WHY' } });
    expect(detectBypass(custom, { SKIP_GATES: '1', SKIP_WHY: 'release' })?.reason).toBe('release');
  });
});

describe('suggestExemptions', () => {
  it('reports a rule that only missed because of some files', () => {
    const plan = featurePlan();
    const suggestions = suggestExemptions(policyFrom(), {
      branch: plan.branch,
      changedFiles: plan.changedFiles,
      bypassedGates: ['lint', 'tests', 'coverage']
    });

    expect(suggestions.map((s) => s.kind)).toEqual(['existing_rule_paths_partial', 'proposed_rule']);
    expect(suggestions[0]).toEqual({
      kind: 'existing_rule_paths_partial',
      rule: 'docs-only',
      message: "Rule 'docs-only' would apply without 1 file(s) outside docs/**, **/*.md",
      gates: ['tests', 'coverage'],
      unmatchedFiles: ['src/auth/login.ts'],
      proposal: null
    });

    const proposed = suggestions[1];
    expect(proposed?.rule).toBe('proposed-readme-md');
    expect(proposed?.message).toBe("Add rule 'proposed-readme-md' to exempt lint, tests, coverage for README.md, src/**");
    expect(YAML.parse(proposed?.proposal ?? '')).toEqual({
      exemptions: [
        {
          name: 'proposed-readme-md',
          description: 'Suggested after an emergency bypass on feature/login',
          match: { paths: ['README.md', 'src/**'] },
          exempt_gates: ['lint', 'tests', 'coverage']
        }
      ]
    });
  });

  it('reports a rule that matched the files on another branch', () => {
    const policy = policyFrom({
      ...baseDocument(),
      exemptions: [
        { name: 'docs-on-main', match: { branches: ['main'], paths: ['docs/**'] }, exempt_gates: ['tests'] },
        { name: 'unrelated', match: { paths: ['docs/**'] }, exempt_gates: ['coverage'] }
      ]
    });

    const suggestions = suggestExemptions(policy, {
      branch: 'feature/x',
      changedFiles: ['docs/a.md'],
      bypassedGates: ['lint', 'tests']
    });

    expect(suggestions.map((s) => [s.kind, s.rule])).toEqual([
      ['existing_rule_branch_mismatch', 'docs-on-main'],
      ['proposed_rule', 'proposed-docs']
    ]);
    expect(suggestions[0]?.message).toBe(
      "Rule 'docs-on-main' covers these files but only on branches matching main (current: feature/x)"
    );
  });

  it('proposes nothing without files or gates', () => {
    expect(suggestExemptions(policyFrom(), { branch: 'main', changedFiles: [], bypassedGates: ['lint'] })).toEqual([]);
  });

  it('derives path globs from top-level directories', () => {
    expect(derivePathPatterns(['src/a.ts', 'src/b/c.ts', 'package.json', 'docs/x.md'])).toEqual([
      'docs/**',
      'package.json',
      'src/**'
    ]);
    expect(slug('  Jane O\'Neil ')).toBe('jane-o-neil');
    expect(slug('***')).toBe('unknown');
  });
});

describe('recordBypass', () => {
  it('writes the record and appends it to the ledger', async () => {
    const dir = await tempDir('gatewise-bypass-');
    const logDir = join(dir, '.emergency-bypasses');
    const ledger = await LedgerWriter.open(join(dir, '.gatewise', 'ledger.jsonl'));
    const policy = policyFrom();

    const { record, path } = await recordBypass({
      policy,
      request: { envVar: 'EMERGENCY_PUSH', reasonEnvVar: 'EMERGENCY_REASON', reason: 'prod is down' },
      user: 'Jane Doe',
      plan: featurePlan(),
      logDir,
      ledger,
      now: new Date('2026-03-01T12:34:56.789Z'),
      logger: silent
    });

    expect(path).toBe(join(logDir, '2026-03-01T12-34-56-789Z-jane-doe.json'));
    expect(record).toMatchObject({
      timestamp: '2026-03-01T12:34:56.789Z',
      user: 'Jane Doe',
      reason: 'prod is down',
      branch: 'feature/login',
      stage: 'pre-push',
      changedFiles: ['README.md', 'src/auth/login.ts'],
      bypassedGates: ['lint', 'tests', 'coverage']
    });
    expect(record.suggestions).toHaveLength(2);
    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual(record);

    const entries = await new LedgerReader(ledger.path).readAll();
    expect(entries.filter((e) => e.type === 'bypass_recorded').map((e) => e.data)).toEqual([
      {
        user: 'Jane Doe',
        reason: 'prod is down',
        branch: 'feature/login',
        recordPath: path,
        bypassedGates: ['lint', 'tests', 'coverage']
      }
    ]);
  });

  it('requires a reason', async () => {
    const dir = await tempDir('gatewise-bypass-');
    const attempt = recordBypass({
      policy: policyFrom(),
      request: { envVar: 'EMERGENCY_PUSH', reasonEnvVar: 'EMERGENCY_REASON', reason: '   ' },
      user: 'jane',
      plan: featurePlan(),
      logDir: dir,
      logger: silent
    });

    await expect(attempt).rejects.toBeInstanceOf(BypassReasonRequiredError);
    await expect(attempt).rejects.toThrow('Emergency bypass requires a reason (set EMERGENCY_REASON).');
  });
});

describe('listBypasses and bypassStats', () => {
  it('lists records oldest first and skips unreadable files', async () => {
    const dir = await tempDir('gatewise-bypass-');
    const policy = policyFrom();
    const request = { envVar: 'EMERGENCY_PUSH', reasonEnvVar: 'EMERGENCY_REASON', reason: 'hotfix' };

    for (const iso of ['2026-03-02T08:00:00.000Z', '2026-03-01T08:00:00.000Z']) {
      await recordBypass({ policy, request, user: 'sam', plan: featurePlan(), logDir: dir, now: new Date(iso), logger: silent });
    }
    await writeFile(join(dir, 'broken.json'), '{', 'utf8');
    await writeFile(join(dir, 'notes.txt'), 'ignored', 'utf8');

    const lines: string[] = [];
    const records = await listBypasses(dir, new Logger({ level: 'warn', sink: (l) => lines.push(l) }));

    expect(records.map((r) => r.timestamp)).toEqual(['2026-03-01T08:00:00.000Z', '2026-03-02T08:00:00.000Z']);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('Skipping unreadable bypass record broken.json');
    expect(bypassFileName(records[0]?.timestamp ?? '', 'sam')).toBe('2026-03-01T08-00-00-000Z-sam.json');
  });

  it('reports the bypass rate against completed runs', () => {
    const completed = (seq: number): LedgerEntry => ({
      seq,
      timestamp: '2026-03-01T08:00:00.000Z',
      type: 'run_completed',
      data: { runId: `r${seq}`, passed: true, failedCount: 0, totalCount: 1, durationMs: 1 }
    });
    const record = {
      timestamp: '2026-03-01T09:00:00.000Z',
      user: 'sam',
      reason: 'hotfix',
      branch: 'main',
      stage: null,
      changedFiles: [],
      bypassedGates: [],
      suggestions: []
    };

    expect(bypassStats([record], [completed(1), completed(2), completed(3)])).toEqual({ bypasses: 1, runs: 3, rate: 0.25 });
    expect(bypassStats([], [])).toEqual({ bypasses: 0, runs: 0, rate: 0 });
  });
});
