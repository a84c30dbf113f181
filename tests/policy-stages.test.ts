import { describe, expect, it } from 'vitest';

import { UnknownStageError } from '../src/core/errors.js';
import { mergePolicyDocuments } from '../src/core/policy/merge.js';
import { applyStageRelaxations } from '../src/core/policy/relaxations.js';
import { detectStage, parseStage } from '../src/core/policy/stage.js';
import { Logger } from '../src/utils/logger.js';
import { baseDocument, policyFrom } from './policy-fixture.js';

function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger({ level: 'warn', json: true, sink: (l) => lines.push(l) }), lines };
}

describe('mergePolicyDocuments', () => {
  it('merges gates shallowly and replaces top-level keys wholesale', () => {
    const base = baseDocument();
    const merged = mergePolicyDocuments(base, {
      version: '2.0',
      gates: { lint: { required: false }, audit: { enabled: true } },
      execution_order: ['lint']
    });

    expect(merged.version).toBe('2.0');
    expect(merged.execution_order).toEqual(['lint']);
    expect(merged.gates).toEqual({
      ...base.gates,
      lint: { enabled: true, tool: 'sh', command: 'exit 0', required: false, fail_message: 'Fix lint errors' },
      audit: { enabled: true }
    });
    expect(merged.exemptions).toBe(base.exemptions);
  });

  it('does not mutate its inputs', () => {
    const base = baseDocument();
    const before = JSON.stringify(base);
    const override = { gates: { lint: { command: 'npx eslint .' } }, exemptions: [] };

    mergePolicyDocuments(base, override);

    expect(JSON.stringify(base)).toBe(before);
    expect(override).toEqual({ gates: { lint: { command: 'npx eslint .' } }, exemptions: [] });
  });
});

describe('applyStageRelaxations', () => {
  it('returns the policy unchanged for push-to-main and for no stage', () => {
    const policy = policyFrom();
    expect(applyStageRelaxations(policy, 'push-to-main')).toBe(policy);
    expect(applyStageRelaxations(policy, null)).toBe(policy);
  });

  it('applies the relaxations of the given stage without mutating the input', () => {
    const policy = policyFrom();

    const prePush = applyStageRelaxations(policy, 'pre-push');
    expect(prePush.gates.coverage?.threshold).toBe(60);
    expect(prePush.gates.coverage?.required).toBe(false);

    const pr = applyStageRelaxations(policy, 'pr');
    expect(pr.gates.coverage?.threshold).toBe(70);

    expect(policy.gates.coverage?.threshold).toBe(80);
    expect(pr.gates.lint).toEqual(policy.gates.lint);
  });

  it('warns about unknown keys and ill-typed values', () => {
    const doc = baseDocument();
    const policy = policyFrom({
      ...doc,
      gates: {
        ...doc.gates,
        lint: {
          enabled: true,
          tool: 'sh',
          command: 'exit 0',
          required: true,
          stage_relaxations: { pr: { retries: 3, timeout_seconds: 'soon', enabled: false } }
        }
      }
    });
    const { logger, lines } = captureLogger();

    const relaxed = applyStageRelaxations(policy, 'pr', logger);

    expect(relaxed.gates.lint?.enabled).toBe(false);
    expect(relaxed.gates.lint?.timeoutSeconds).toBe(300);
    const messages = lines.map((l) => JSON.parse(l).message);
    expect(messages).toEqual([
      "Unknown relaxation key 'retries' for gate 'lint' stage 'pr'",
      "Ignoring relaxation 'timeout_seconds' for gate 'lint' stage 'pr': unexpected value"
    ]);
  });
});

describe('stages', () => {
  it('parses valid stages and explains typos', () => {
    expect(parseStage(' pr ')).toBe('pr');
    expect(() => parseStage('pre_push')).toThrow(UnknownStageError);
    expect(() => parseStage('pre_push')).toThrow(
      "Unknown stage 'pre_push'. Valid stages: pr, pre-push, push-to-main.\nCheck for typos (e.g., 'pre_push' should be 'pre-push')."
    );
  });

  it('detects the stage from the environment', () => {
    expect(detectStage({})).toBeNull();
    expect(detectStage({ GATEWISE_STAGE: 'pre-push', GITHUB_ACTIONS: 'true', GITHUB_EVENT_NAME: 'pull_request' })).toBe('pre-push');
    expect(detectStage({ GITHUB_ACTIONS: 'true', GITHUB_EVENT_NAME: 'pull_request' })).toBe('pr');
    expect(detectStage({ GITHUB_ACTIONS: 'true', GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/heads/master' })).toBe('push-to-main');
    expect(detectStage({ GITHUB_ACTIONS: 'true', GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/heads/feature' })).toBeNull();
  });

  it('ignores an unknown GATEWISE_STAGE with a warning', () => {
    const { logger, lines } = captureLogger();

    expect(detectStage({ GATEWISE_STAGE: 'staging' }, logger)).toBeNull();
    expect(detectStage({ GATEWISE_STAGE: 'staging', GITHUB_ACTIONS: 'true', GITHUB_EVENT_NAME: 'pull_request' }, logger)).toBe('pr');
    expect(lines.map((l) => JSON.parse(l).message)).toEqual([
      "Ignoring GATEWISE_STAGE='staging'. Valid stages: pr, pre-push, push-to-main",
      "Ignoring GATEWISE_STAGE='staging'. Valid stages: pr, pre-push, push-to-main"
    ]);
  });
});
