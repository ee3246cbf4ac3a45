/**
 * Replication Margin Check
 *
 * A pool with size=3 and min_size=2 stays writable after losing one replica.
 * The smallest such margin across an application's pools bounds how many of
 * its units may be down at once, counting units that are already inactive.
 */

import type { Fetched, PoolRecord } from '../types.js';
import { Result } from '../verification/result.js';

export interface ReplicationInput {
  application: string;
  pools: Fetched<PoolRecord[]>;
  /** Unit ids proposed for reboot/shutdown */
  removedUnits: readonly string[];
  /** Unit ids whose workload is not active */
  inactiveUnits: readonly string[];
}

/** Replica losses the weakest pool tolerates; undefined without pools. */
export function replicationMargin(pools: readonly PoolRecord[]): number | undefined {
  if (pools.length === 0) return undefined;
  return Math.min(...pools.map(p => p.size - p.minSize));
}

export function checkReplicationMargin(inputs: readonly ReplicationInput[]): Result {
  const result = new Result();

  for (const input of inputs) {
    if (!input.pools.ok) {
      result.addPartial('FAIL', `Replication data for '${input.application}' could not be obtained: ${input.pools.error}`);
      continue;
    }

    const margin = replicationMargin(input.pools.value);
    if (margin === undefined) continue;

    const down = new Set([...input.removedUnits, ...input.inactiveUnits]);
    if (down.size > margin) {
      result.addPartial(
        'FAIL',
        `The minimum number of replicas in '${input.application}' is ${margin} and it's not safe to `
        + `reboot/shutdown ${input.removedUnits.length} units. ${input.inactiveUnits.length} units are not active.`,
      );
    }
  }

  return result.orElse(new Result('OK', 'Minimum replica number check passed.'));
}
