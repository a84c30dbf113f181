import { isAbsolute, resolve } from 'node:path';

import { fileExists, isPlainObject, readYaml } from '../../utils/fs.js';
import { getLogger, type Logger } from '../../utils/logger.js';
import { PolicyNotFoundError, PolicyValidationError } from '../errors.js';
import { mergePolicyDocuments } from './merge.js';
import { DEFAULT_OVERRIDE_FILE, RawPolicyDocument, toPolicy, type Policy } from './types.js';
import { fromZodIssues, validatePolicy } from './validator.js';

export const DEFAULT_POLICY_PATH = 'org-standards/config/quality-gates.yaml';

export interface LoadPolicyOptions {
  cwd?: string;
  /** Base document; defaults to GATEWISE_CONFIG, then DEFAULT_POLICY_PATH. */
  basePath?: string;
  /** Override document; defaults to the base document's `override_file`. */
  overridePath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Load the base policy, merge the optional repository override, and validate the result.
 *
 * Throws PolicyNotFoundError when the base document is missing and
 * PolicyValidationError (with every violation) when the merged document is invalid.
 */
export async function loadPolicy(opts: LoadPolicyOptions = {}): Promise<Policy> {
  const cwd = resolve(opts.cwd ?? process.cwd());
  const env = opts.env ?? process.env;
  const logger = opts.logger ?? getLogger();

  const basePath = resolveFrom(cwd, opts.basePath ?? (env.GATEWISE_CONFIG?.trim() || DEFAULT_POLICY_PATH));
  if (!(await fileExists(basePath))) throw new PolicyNotFoundError(basePath);

  const base = await readDocument(basePath);

  const declaredOverride = typeof base.override_file === 'string' && base.override_file ? base.override_file : DEFAULT_OVERRIDE_FILE;
  const overrideCandidate = resolveFrom(cwd, opts.overridePath ?? declaredOverride);
  let overridePath: string | null = null;
  let override: Record<string, unknown> = {};
  if (await fileExists(overrideCandidate)) {
    overridePath = overrideCandidate;
    override = await readDocument(overrideCandidate);
    logger.debug('Loaded policy override', { path: overrideCandidate });
  } else if (opts.overridePath) {
    logger.warn(`Override file not found, using base policy only: ${overrideCandidate}`);
  }

  const merged = mergePolicyDocuments(base, override);
  const parsed = RawPolicyDocument.safeParse(merged);
  if (!parsed.success) {
    throw new PolicyValidationError(basePath, fromZodIssues(parsed.error.issues));
  }

  const policy = toPolicy(parsed.data, { basePath, overridePath });
  const errors = validatePolicy(policy);
  if (errors.length > 0) throw new PolicyValidationError(basePath, errors);

  logger.debug('Loaded policy', {
    version: policy.version,
    gates: Object.keys(policy.gates).length,
    exemptions: policy.exemptions.length
  });
  return policy;
}

async function readDocument(path: string): Promise<Record<string, unknown>> {
  const doc = await readYaml(path);
  // An empty file parses to null; treat it as an empty document.
  if (doc == null) return {};
  if (!isPlainObject(doc)) {
    throw new PolicyValidationError(path, [{ rule: 'schema', message: `${path} must contain a YAML mapping` }]);
  }
  return doc;
}

function resolveFrom(cwd: string, p: string): string {
  return isAbsolute(p) ? p : resolve(cwd, p);
}
