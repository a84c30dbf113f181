import { getLogger, type Logger } from '../../utils/logger.js';
import { UnknownStageError } from '../errors.js';
import { STAGES, type Stage } from './types.js';

export function isStage(value: string): value is Stage {
  return STAGES.some((s) => s === value);
}

export function parseStage(value: string): Stage {
  const v = value.trim();
  if (!isStage(v)) throw new UnknownStageError(v, STAGES);
  return v;
}

/**
 * Work out the stage from the environment.
 *
 * A valid `GATEWISE_STAGE` wins; an invalid one is logged and ignored. Under GitHub
 * Actions a pull_request event is `pr` and a push to main/master is `push-to-main`.
 * Anything else returns null, which means the base configuration (the highest
 * standard) applies.
 */
export function detectStage(env: NodeJS.ProcessEnv = process.env, logger: Logger = getLogger()): Stage | null {
  const explicit = env.GATEWISE_STAGE?.trim();
  if (explicit) {
    if (isStage(explicit)) return explicit;
    logger.warn(`Ignoring GATEWISE_STAGE='${explicit}'. Valid stages: ${[...STAGES].sort().join(', ')}`);
  }

  if (env.GITHUB_ACTIONS === 'true') {
    if (env.GITHUB_EVENT_NAME === 'pull_request') return 'pr';
    if (env.GITHUB_REF === 'refs/heads/main' || env.GITHUB_REF === 'refs/heads/master') return 'push-to-main';
  }

  return null;
}
