/**
 * Helpers shared by command handlers
 */

import { ValidationError } from '../errors.js';
import type { CommandResult } from '../types.js';

/**
 * Turn a declaration problem into a failed command result; anything else is
 * rethrown for the CLI to report
 */
export function validationFailure(err: unknown): CommandResult<never> {
  if (!(err instanceof ValidationError)) throw err;
  return {
    success: false,
    message: err.message,
    errors: err.issues.map((issue) => {
      const line = `[${issue.code}] ${issue.path}: ${issue.message}`;
      return issue.suggestions?.length ? `${line} (${issue.suggestions.join('; ')})` : line;
    }),
  };
}
