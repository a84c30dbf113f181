import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runCheckCommand } from '../src/cli/commands/check.js';
import { runInitCommand } from '../src/cli/commands/init.js';
import { QuietRenderer, setRenderer } from '../src/cli/ui/renderer.js';
import { DEFAULT_POLICY_PATH } from '../src/core/policy/loader.js';
import { tempDir } from './policy-fixture.js';

const templatePath = fileURLToPath(new URL('../templates/quality-gates.yaml', import.meta.url));

describe('gatewise init', () => {
  beforeEach(() => {
    setRenderer(new QuietRenderer());
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setRenderer(null);
  });

  it('writes the starter policy to the default location', async () => {
    const dir = await tempDir('gatewise-init-');

    const out = await runInitCommand({ cwd: dir });

    const target = join(dir, DEFAULT_POLICY_PATH);
    expect(out).toEqual({ ok: true, path: target });
    expect(await readFile(target, 'utf8')).toBe(await readFile(templatePath, 'utf8'));
  });

  it('writes a starter policy that validates', async () => {
    const dir = await tempDir('gatewise-init-');
    await runInitCommand({ cwd: dir });

    expect(await runCheckCommand({ cwd: dir, env: {} })).toEqual({ ok: true });
  });

  it('refuses to overwrite without --force', async () => {
    const dir = await tempDir('gatewise-init-');
    const target = join(dir, 'policy.yaml');
    await writeFile(target, 'version: "0"\n', 'utf8');

    const refused = await runInitCommand({ cwd: dir, path: 'policy.yaml' });
    expect(refused).toEqual({ ok: false, details: `${target} already exists (use --force to overwrite)` });
    expect(await readFile(target, 'utf8')).toBe('version: "0"\n');

    const forced = await runInitCommand({ cwd: dir, path: 'policy.yaml', force: true });
    expect(forced.ok).toBe(true);
    expect(await readFile(target, 'utf8')).toBe(await readFile(templatePath, 'utf8'));
  });
});
