/**
 * Availability Zone Check
 *
 * Asks the CRUSH tree whether the failure-domain ancestor of the hosts being
 * removed keeps enough free space to re-replicate their data.
 */

import type { Fetched, TopologyKind, UnitInfo } from '../types.js';
import { TopologyTree, formatNode, type AncestorGroup } from '../topology/tree.js';
import { InvalidArgumentError, NotFoundError } from '../errors.js';
import { Result } from '../verification/result.js';

export interface AvailabilityZoneInput {
  application: string;
  topology: Fetched<TopologyTree>;
  units: readonly Pick<UnitInfo, 'id' | 'hostname'>[];
}

/**
 * With failure-domain=host, losing hosts is absorbed by the whole root.
 * Every other failure domain already names the ancestor level.
 */
export function ancestorKindForFailureDomain(failureDomain: TopologyKind): TopologyKind {
  return failureDomain === 'host' ? 'root' : failureDomain;
}

function describeGroup(group: AncestorGroup): string {
  return `  ${formatNode(group.ancestor)}: ${group.remainingAvailKb} kB free after removing `
    + `${group.hosts.map(h => h.name).join(', ')} <= ${group.usedKb} kB to relocate`;
}

export function checkAvailabilityZone(
  inputs: readonly AvailabilityZoneInput[],
  failureDomain: TopologyKind,
): Result {
  const ancestorKind = ancestorKindForFailureDomain(failureDomain);
  const result = new Result();

  for (const { application, topology, units } of inputs) {
    if (!topology.ok) {
      result.addPartial('FAIL', `Topology of '${application}' could not be obtained: ${topology.error}`);
      continue;
    }

    const tree = topology.value;
    try {
      const assessment = tree.evaluateRemoval(units.map(u => u.hostname), ancestorKind);
      if (!assessment.safe) {
        const failing = assessment.groups.filter(g => !g.safe).map(describeGroup);
        result.addPartial(
          'FAIL',
          [
            `It's not safe to reboot/shutdown unit(s) ${units.map(u => u.id).join(', ')} `
            + `on host(s) ${units.map(u => u.hostname).join(', ')} in the availability zone '${tree}'.`,
            ...failing,
          ].join('\n'),
        );
      }
    } catch (err) {
      if (!(err instanceof InvalidArgumentError || err instanceof NotFoundError)) throw err;
      result.addPartial('FAIL', `Cannot verify availability zone of '${application}': ${err.message}`);
    }
  }

  return result.orElse(new Result('OK', 'Availability zone check passed.'));
}
