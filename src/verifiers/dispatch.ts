/**
 * Picks the verification flow for the selected units' role, collects the
 * snapshot that flow needs and runs it.
 */

import type { Config } from '../config.js';
import type { Inventory } from '../types.js';
import type { Result } from '../verification/result.js';
import { resolveTargets } from '../inventory.js';
import { collectMonitorSnapshot, collectStorageSnapshot, type ClusterDataSource } from '../services/collector.js';
import { verifyStorageNodes } from './storage-node.js';
import { verifyClusterMembers } from './cluster-member.js';
import { log } from '../logger.js';

export type VerifyPolicy = Pick<Config, 'failureDomain' | 'minimumAgentVersion'>;

/** Reboot and shutdown share the same checks. */
export async function verifyUnits(
  policy: VerifyPolicy,
  inventory: Inventory,
  unitIds: readonly string[],
  source: ClusterDataSource,
): Promise<Result> {
  const { role, units } = resolveTargets(inventory, unitIds);
  log(`[Verify] ${units.length} ${role} unit(s): ${units.map(u => `${u.id}@${u.hostname}`).join(', ')}`);

  if (role === 'storage') {
    const snapshot = await collectStorageSnapshot(inventory, units, source);
    return verifyStorageNodes(snapshot, { failureDomain: policy.failureDomain });
  }

  const snapshot = await collectMonitorSnapshot(units, source);
  return verifyClusterMembers(snapshot, { minimumAgentVersion: policy.minimumAgentVersion });
}
