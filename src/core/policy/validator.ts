import type { ZodIssue } from 'zod';

import type { ValidationError } from '../errors.js';
import { isStage } from './stage.js';
import { STAGES, type Policy } from './types.js';

/**
 * Semantic checks over a structurally valid policy. Every violation is reported;
 * an empty array means the policy is usable.
 */
export function validatePolicy(policy: Policy): ValidationError[] {
  const errors: ValidationError[] = [];
  const gateNames = new Set(Object.keys(policy.gates));

  // Execution order
  const undefinedInOrder = policy.executionOrder.filter((g) => !gateNames.has(g));
  if (undefinedInOrder.length > 0) {
    errors.push({
      rule: 'order.undefined',
      message: `execution_order references undefined gates: ${undefinedInOrder.join(', ')}`,
      details: { gates: undefinedInOrder }
    });
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const g of policy.executionOrder) {
    if (seen.has(g)) duplicates.add(g);
    seen.add(g);
  }
  if (duplicates.size > 0) {
    errors.push({
      rule: 'order.duplicate',
      message: `execution_order lists gates more than once: ${Array.from(duplicates).join(', ')}`
    });
  }

  // Gates
  for (const gate of Object.values(policy.gates)) {
    const missing = gate.dependsOn.filter((d) => !gateNames.has(d));
    if (missing.length > 0) {
      errors.push({
        rule: 'depends_on.undefined',
        message: `Gate '${gate.name}' depends on undefined gates: ${missing.join(', ')}`,
        details: { gate: gate.name, missing }
      });
    }

    if (seen.has(gate.name)) {
      const notOrdered = gate.dependsOn.filter((d) => gateNames.has(d) && !seen.has(d));
      if (notOrdered.length > 0) {
        errors.push({
          rule: 'depends_on.unordered',
          message: `Gate '${gate.name}' depends on gates missing from execution_order: ${notOrdered.join(', ')}`,
          details: { gate: gate.name, missing: notOrdered }
        });
      }
    }

    if (!gate.command.trim()) {
      errors.push({ rule: 'gate.command', message: `Gate '${gate.name}' has neither command nor commands` });
    }

    for (const stage of Object.keys(gate.stageRelaxations)) {
      if (!isStage(stage)) {
        errors.push({
          rule: 'gate.stage',
          message: `Gate '${gate.name}' declares relaxations for unknown stage '${stage}'`,
          details: { gate: gate.name, stage, validStages: STAGES }
        });
      }
    }
  }

  for (const cycle of findDependencyCycles(policy)) {
    errors.push({
      rule: 'depends_on.cycle',
      message: `Circular dependency: ${cycle.join(' -> ')}`,
      details: { cycle }
    });
  }

  // Exemption rules
  const ruleNames = new Set<string>();
  for (const rule of policy.exemptions) {
    if (ruleNames.has(rule.name)) {
      errors.push({ rule: 'exemption.duplicate', message: `Exemption rule '${rule.name}' is declared more than once` });
    }
    ruleNames.add(rule.name);

    if (rule.branches.length === 0 && rule.paths.length === 0) {
      errors.push({
        rule: 'exemption.predicate',
        message: `Exemption rule '${rule.name}' must match on branches or paths`
      });
    }

    const referenced = [...rule.exemptGates, ...rule.requiredGates, ...Object.keys(rule.thresholds)];
    const unknown = Array.from(new Set(referenced.filter((g) => !gateNames.has(g))));
    if (unknown.length > 0) {
      errors.push({
        rule: 'exemption.undefined',
        message: `Exemption rule '${rule.name}' references undefined gates: ${unknown.join(', ')}`,
        details: { rule: rule.name, gates: unknown }
      });
    }

    const conflicting = rule.exemptGates.filter((g) => rule.requiredGates.includes(g));
    if (conflicting.length > 0) {
      errors.push({
        rule: 'exemption.conflict',
        message: `Exemption rule '${rule.name}' both exempts and requires: ${conflicting.join(', ')}`
      });
    }
  }

  return errors;
}

/**
 * Find cycles in the `depends_on` graph. Each cycle is returned as a closed path
 * (`['a', 'b', 'a']`). Edges to undefined gates are ignored.
 */
export function findDependencyCycles(policy: Policy): string[][] {
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];
  const cycles: string[][] = [];

  const visit = (name: string) => {
    state.set(name, 'visiting');
    stack.push(name);
    for (const dep of policy.gates[name]?.dependsOn ?? []) {
      if (!(dep in policy.gates)) continue;
      const s = state.get(dep);
      if (s === 'visiting') {
        cycles.push([...stack.slice(stack.indexOf(dep)), dep]);
      } else if (s === undefined) {
        visit(dep);
      }
    }
    stack.pop();
    state.set(name, 'done');
  };

  for (const name of Object.keys(policy.gates)) {
    if (!state.has(name)) visit(name);
  }
  return cycles;
}

/**
 * Convert schema issues into validation errors with readable field paths.
 */
export function fromZodIssues(issues: ZodIssue[]): ValidationError[] {
  return issues.map((issue) => {
    const path = issue.path.join('.');
    if (isMissingField(issue)) {
      return {
        rule: 'schema.missing',
        message: `Missing required field '${path}'`,
        details: { path: issue.path }
      };
    }
    return {
      rule: 'schema',
      message: path ? `${path}: ${issue.message}` : issue.message,
      details: { path: issue.path, code: issue.code }
    };
  });
}

function isMissingField(issue: ZodIssue): boolean {
  if (issue.code === 'invalid_type') return issue.received === 'undefined';
  // A union reports each failed branch; the field is missing when every branch saw undefined.
  if (issue.code === 'invalid_union') {
    return issue.unionErrors.every((e) => e.issues.every(isMissingField));
  }
  return false;
}
