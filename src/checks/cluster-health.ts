/**
 * Cluster Health Check
 *
 * Maps `ceph health` output from each monitor to a partial result:
 * HEALTH_OK passes, HEALTH_WARN and HEALTH_ERR fail, anything else fails as
 * an unknown state.
 */

import type { HealthReport } from '../types.js';
import { Result } from '../verification/result.js';
import { log } from '../logger.js';

export function checkClusterHealth(reports: readonly HealthReport[]): Result {
  if (reports.length === 0) {
    return new Result('FAIL', 'Ceph cluster status could not be obtained');
  }

  const result = new Result();

  for (const { unit, status } of reports) {
    if (!status.ok) {
      result.addPartial('FAIL', `${unit}: Ceph cluster status could not be obtained\n  ${status.error}`);
      continue;
    }

    const health = status.value;
    log(`[ClusterHealth] ${unit}: '${health}'`);

    if (health.includes('HEALTH_OK')) {
      result.addPartial('OK', `${unit}: Ceph cluster is healthy`);
    } else if (health.includes('HEALTH_WARN')) {
      result.addPartial('FAIL', `${unit}: Ceph cluster is in a warning state\n  ${health}`);
    } else if (health.includes('HEALTH_ERR')) {
      result.addPartial('FAIL', `${unit}: Ceph cluster is unhealthy\n  ${health}`);
    } else {
      result.addPartial('FAIL', `${unit}: Ceph cluster is in an unknown state\n  ${health}`);
    }
  }

  return result;
}
