/**
 * Agent Version Gate
 *
 * Monitor checks match monmap names against machine hostnames, which older
 * agents do not report. Units below the minimum version stop the run.
 */

import type { UnitInfo } from '../types.js';
import { Result } from '../verification/result.js';

/** Numeric components of a dotted version (`2.9.42-ubuntu` -> [2, 9, 42]) */
export function parseVersion(version: string): number[] | undefined {
  const match = /^v?(\d+(?:\.\d+)*)/.exec(version.trim());
  return match ? match[1].split('.').map(part => parseInt(part, 10)) : undefined;
}

/** Negative, zero or positive as `a` is older than, equal to or newer than `b`. */
export function compareVersions(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function checkMinimumVersion(units: readonly UnitInfo[], minimum: string): Result {
  const required = parseVersion(minimum);
  if (!required) {
    return new Result('FAIL', `Minimum required version '${minimum}' is not a valid version.`);
  }

  const result = new Result();

  for (const unit of units) {
    if (!unit.agentVersion) {
      result.addPartial('FAIL', `Unit ${unit.id} did not report an agent version.`);
      continue;
    }

    const actual = parseVersion(unit.agentVersion);
    if (!actual) {
      result.addPartial('FAIL', `Unit ${unit.id} reports an unrecognized agent version '${unit.agentVersion}'.`);
    } else if (compareVersions(actual, required) < 0) {
      result.addPartial(
        'FAIL',
        `Unit ${unit.id} runs agent version ${unit.agentVersion}, minimum required is ${minimum}.`,
      );
    }
  }

  return result.orElse(new Result('OK', 'Minimum required version check passed.'));
}
