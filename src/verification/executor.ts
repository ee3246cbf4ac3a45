/**
 * Check Executor
 *
 * Runs checks in order and folds their results. A check that throws is
 * recorded as a FAIL and the remaining checks still run, so the operator
 * sees every problem in one report.
 */

import { Result } from './result.js';
import { errorMessage } from '../errors.js';
import { log } from '../logger.js';

export interface CheckEntry {
  name: string;
  check: () => Result;
}

export function runChecks(checks: readonly CheckEntry[]): Result {
  if (checks.length === 0) {
    return new Result('FAIL', 'No checks were executed.');
  }

  let result = new Result();

  for (const entry of checks) {
    try {
      const outcome = entry.check();
      log(`[Checks] ${entry.name}: ${outcome.empty ? 'no verdict' : outcome.severity}`);
      result = result.combine(outcome);
    } catch (err) {
      const message = errorMessage(err);
      log(`[Checks] ${entry.name} raised: ${message}`);
      result = result.combine(new Result('FAIL', `${entry.name} check failed with error: ${message}`));
    }
  }

  if (result.empty) {
    return new Result('FAIL', 'No check produced a verdict.');
  }

  return result;
}
