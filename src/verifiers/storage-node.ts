/**
 * Storage node (OSD host) verification.
 *
 * Health, replication margin and availability zone are independent: all
 * three run and are folded, so one report lists every problem.
 */

import type { StorageSnapshot, TopologyKind } from '../types.js';
import type { Result } from '../verification/result.js';
import { runChecks } from '../verification/executor.js';
import { checkClusterHealth } from '../checks/cluster-health.js';
import { checkReplicationMargin } from '../checks/replication.js';
import { checkAvailabilityZone } from '../checks/availability-zone.js';

export interface StoragePolicy {
  /** CRUSH failure domain of the replication rule */
  failureDomain: TopologyKind;
}

export function verifyStorageNodes(snapshot: StorageSnapshot, policy: StoragePolicy): Result {
  return runChecks([
    {
      name: 'ClusterHealth',
      check: () => checkClusterHealth(snapshot.health),
    },
    {
      name: 'ReplicationMargin',
      check: () => checkReplicationMargin(snapshot.applications.map(app => ({
        application: app.application,
        pools: app.pools,
        removedUnits: app.targets.map(u => u.id),
        inactiveUnits: app.inactiveUnits,
      }))),
    },
    {
      name: 'AvailabilityZone',
      check: () => checkAvailabilityZone(
        snapshot.applications.map(app => ({
          application: app.application,
          topology: app.topology,
          units: app.targets,
        })),
        policy.failureDomain,
      ),
    },
  ]);
}
