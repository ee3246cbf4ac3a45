/**
 * Ceph CLI data source.
 *
 * Runs read-only `ceph` commands on a monitor unit's machine over SSH and
 * returns their raw output; parsing happens in the collector.
 */

import type { Config } from '../config.js';
import type { UnitInfo } from '../types.js';
import type { ClusterDataSource } from './collector.js';
import { sshExec, type SshSettings } from './ssh.js';
import { log } from '../logger.js';

export class SshCephDataSource implements ClusterDataSource {
  constructor(private readonly config: SshSettings & Pick<Config, 'cephCommand'>) {}

  private async ceph(unit: UnitInfo, args: string): Promise<string> {
    log(`[Ceph] ${unit.id} (${unit.address}): ceph ${args}`);
    const result = await sshExec(unit.address, `${this.config.cephCommand} ${args}`, this.config);
    if (result.code !== 0) {
      throw new Error(`ceph ${args} on ${unit.id} failed (code ${result.code}): ${result.stderr}`);
    }
    return result.stdout;
  }

  health(unit: UnitInfo): Promise<string> {
    return this.ceph(unit, 'health');
  }

  poolDetails(unit: UnitInfo): Promise<string> {
    return this.ceph(unit, 'osd pool ls detail --format json');
  }

  diskUsageTree(unit: UnitInfo): Promise<string> {
    return this.ceph(unit, 'osd df tree --format json');
  }

  quorumStatus(unit: UnitInfo): Promise<string> {
    return this.ceph(unit, 'quorum_status --format json');
  }
}
