import { describe, expect, it } from 'vitest';

import { findDependencyCycles, validatePolicy } from '../src/core/policy/validator.js';
import { baseDocument, policyFrom } from './policy-fixture.js';

function gate(extra: Record<string, unknown> = {}) {
  return { enabled: true, tool: 'sh', command: 'exit 0', required: true, ...extra };
}

describe('validatePolicy', () => {
  it('accepts the fixture policy', () => {
    expect(validatePolicy(policyFrom())).toEqual([]);
  });

  it('flags undefined and unordered dependencies', () => {
    const policy = policyFrom({
      version: '1',
      gates: {
        lint: gate({ depends_on: ['format', 'ghost'] }),
        format: gate()
      },
      execution_order: ['lint']
    });

    const errors = validatePolicy(policy);
    expect(errors.map((e) => e.rule)).toEqual(['depends_on.undefined', 'depends_on.unordered']);
    expect(errors[0]?.message).toBe("Gate 'lint' depends on undefined gates: ghost");
    expect(errors[1]?.message).toBe("Gate 'lint' depends on gates missing from execution_order: format");
  });

  it('flags duplicate order entries, empty commands and unknown relaxation stages', () => {
    const policy = policyFrom({
      version: '1',
      gates: {
        lint: { enabled: true, tool: 'sh', required: true, stage_relaxations: { pre_push: { required: false } } }
      },
      execution_order: ['lint', 'lint']
    });

    expect(validatePolicy(policy).map((e) => e.message)).toEqual([
      'execution_order lists gates more than once: lint',
      "Gate 'lint' has neither command nor commands",
      "Gate 'lint' declares relaxations for unknown stage 'pre_push'"
    ]);
  });

  it('joins named commands with &&', () => {
    const policy = policyFrom({
      version: '1',
      gates: {
        checks: { enabled: true, tool: 'sh', required: true, commands: { unit: 'npm test', e2e: 'npm run e2e' } }
      },
      execution_order: ['checks']
    });

    expect(policy.gates.checks?.command).toBe('npm test && npm run e2e');
    expect(validatePolicy(policy)).toEqual([]);
  });

  it('checks exemption rules', () => {
    const doc = baseDocument();
    const policy = policyFrom({
      ...doc,
      exemptions: [
        { name: 'dup', match: { branches: ['a/*'] }, exempt_gates: ['lint'] },
        { name: 'dup', match: { branches: ['b/*'] }, exempt_gates: ['lint'] },
        { name: 'no-predicate', exempt_gates: ['lint'] },
        { name: 'unknown', match: { paths: ['x/**'] }, exempt_gates: ['ghost'], thresholds: { phantom: 1 } },
        { name: 'conflict', match: { paths: ['y/**'] }, exempt_gates: ['tests'], required_gates: ['tests'] }
      ]
    });

    expect(validatePolicy(policy).map((e) => e.message)).toEqual([
      "Exemption rule 'dup' is declared more than once",
      "Exemption rule 'no-predicate' must match on branches or paths",
      "Exemption rule 'unknown' references undefined gates: ghost, phantom",
      "Exemption rule 'conflict' both exempts and requires: tests"
    ]);
  });
});

describe('findDependencyCycles', () => {
  it('returns each cycle as a closed path', () => {
    const policy = policyFrom({
      version: '1',
      gates: {
        a: gate({ depends_on: ['b'] }),
        b: gate({ depends_on: ['c'] }),
        c: gate({ depends_on: ['a'] }),
        d: gate({ depends_on: ['d'] })
      },
      execution_order: ['a', 'b', 'c', 'd']
    });

    expect(findDependencyCycles(policy)).toEqual([
      ['a', 'b', 'c', 'a'],
      ['d', 'd']
    ]);
  });

  it('ignores edges to undefined gates', () => {
    const policy = policyFrom({
      version: '1',
      gates: { a: gate({ depends_on: ['missing'] }) },
      execution_order: ['a']
    });
    expect(findDependencyCycles(policy)).toEqual([]);
  });
});
