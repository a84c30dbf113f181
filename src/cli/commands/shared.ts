import { GatewiseError, PolicyValidationError } from '../../core/errors.js';
import { getRenderer } from '../ui/renderer.js';

export interface CommandResult {
  ok: boolean;
  details?: string;
}

/**
 * Turn an expected failure into a command result. Policy validation errors are
 * rendered in full here; anything that is not a GatewiseError is rethrown.
 */
export function toFailure(err: unknown): CommandResult {
  if (err instanceof PolicyValidationError) {
    getRenderer().validationErrors(err.path, err.errors);
    return { ok: false, details: `${err.errors.length} validation error(s) in ${err.path}` };
  }
  if (err instanceof GatewiseError) return { ok: false, details: err.message };
  throw err;
}
