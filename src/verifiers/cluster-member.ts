/**
 * Monitor (cluster member) verification.
 *
 * The agent version gate runs first; quorum matching depends on hostnames
 * that older agents do not report, so a failed gate ends the run.
 */

import type { MonitorSnapshot } from '../types.js';
import type { Result } from '../verification/result.js';
import { runChecks } from '../verification/executor.js';
import { checkMinimumVersion } from '../checks/version.js';
import { checkQuorum } from '../checks/quorum.js';
import { checkClusterHealth } from '../checks/cluster-health.js';
import { log } from '../logger.js';

export interface MemberPolicy {
  minimumAgentVersion: string;
}

export function verifyClusterMembers(snapshot: MonitorSnapshot, policy: MemberPolicy): Result {
  const gate = runChecks([
    { name: 'AgentVersion', check: () => checkMinimumVersion(snapshot.targets, policy.minimumAgentVersion) },
  ]);
  if (!gate.success) {
    log('[Verify] Version gate failed, skipping quorum and health checks');
    return gate;
  }

  const removedHostnames = new Set(snapshot.targets.map(u => u.hostname));

  return gate.combine(runChecks([
    { name: 'Quorum', check: () => checkQuorum(snapshot.quorum, removedHostnames) },
    { name: 'ClusterHealth', check: () => checkClusterHealth(snapshot.health) },
  ]));
}
