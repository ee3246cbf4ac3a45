/**
 * Monitor Quorum Check
 *
 * Each monitor reports the full monmap and the members currently in quorum.
 * Taking hosts down must leave a strict majority of the monmap online.
 */

import type { QuorumReport, QuorumStatus } from '../types.js';
import { parseQuorumStatus } from '../services/parsers.js';
import { MalformedDataError } from '../errors.js';
import { Result } from '../verification/result.js';
import { log } from '../logger.js';

export function quorumSurvives(status: QuorumStatus, removedHostnames: ReadonlySet<string>): boolean {
  const remainingOnline = [...status.onlineMembers].filter(name => !removedHostnames.has(name));
  return remainingOnline.length > Math.floor(status.knownMembers.size / 2);
}

export function checkQuorum(reports: readonly QuorumReport[], removedHostnames: ReadonlySet<string>): Result {
  const result = new Result();

  // one report per unit: several monitor applications may run separate clusters
  for (const { unit, payload } of reports) {
    if (!payload.ok) {
      result.addPartial('FAIL', `Quorum status could not be obtained from unit ${unit}: ${payload.error}`);
      continue;
    }

    let status: QuorumStatus;
    try {
      status = parseQuorumStatus(payload.value);
    } catch (err) {
      if (!(err instanceof MalformedDataError)) throw err;
      log(`[Quorum] Failed to parse quorum status from ${unit}: ${err.message}`);
      result.addPartial('FAIL', `Failed to parse quorum status from unit ${unit}.`);
      continue;
    }

    if (!quorumSurvives(status, removedHostnames)) {
      result.addPartial('FAIL', `Rebooting or shutting down the unit ${unit} will lose ceph-mon quorum`);
    }
  }

  return result.orElse(new Result('OK', 'Ceph-mon quorum check passed.'));
}
