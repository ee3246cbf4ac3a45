/**
 * Removal guard configuration.
 *
 * Settings come from environment variables; the operation and the units to
 * verify come from the command line.
 */

import { homedir } from 'os';
import { join } from 'path';
import { isTopologyKind, type Operation, type TopologyKind } from './types.js';
import { InvalidArgumentError } from './errors.js';

export const USAGE = 'Usage: ceph-removal-guard <reboot|shutdown> <unit> [unit...]';

export interface Config {
  /** What the operator is about to do */
  operation: Operation;
  /** Unit ids to verify, e.g. ceph-osd/0 */
  targets: string[];

  /** Inventory sources */
  inventoryPath: string;
  redisUrl?: string;
  inventoryStaleSeconds: number;

  /** Verdict audit trail */
  postgresUrl?: string;

  /** Remote Ceph commands on monitor hosts */
  sshUser: string;
  sshKeyPath: string;
  sshPort: number;
  cephCommand: string;
  commandTimeoutSeconds: number;

  /** Policy */
  failureDomain: TopologyKind;
  minimumAgentVersion: string;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv.slice(2),
): Config {
  const unknownFlag = argv.find(arg => arg.startsWith('-') && arg !== '--');
  if (unknownFlag !== undefined) {
    throw new InvalidArgumentError(`Unknown option '${unknownFlag}'. ${USAGE}`);
  }

  const [operation, ...targets] = argv.filter(arg => arg !== '--');
  if (operation !== 'reboot' && operation !== 'shutdown') {
    throw new InvalidArgumentError(`Unknown operation '${operation ?? ''}'. ${USAGE}`);
  }
  if (targets.length === 0) {
    throw new InvalidArgumentError(`No units given. ${USAGE}`);
  }

  const failureDomain = env.REPLICATION_FAILURE_DOMAIN ?? 'host';
  if (!isTopologyKind(failureDomain) || failureDomain === 'osd') {
    throw new InvalidArgumentError(`Unsupported replication failure domain '${failureDomain}'`);
  }

  return {
    operation,
    targets,

    inventoryPath: env.INVENTORY_PATH ?? './inventory.json',
    redisUrl: env.REDIS_URL,
    inventoryStaleSeconds: int('INVENTORY_STALE_SECONDS', env.INVENTORY_STALE_SECONDS, 300),

    postgresUrl: env.POSTGRES_URL,

    sshUser: env.SSH_USER ?? 'ubuntu',
    sshKeyPath: env.SSH_KEY_PATH ?? join(homedir(), '.ssh', 'id_ed25519'),
    sshPort: int('SSH_PORT', env.SSH_PORT, 22),
    cephCommand: env.CEPH_COMMAND ?? 'sudo ceph',
    commandTimeoutSeconds: int('COMMAND_TIMEOUT_SECONDS', env.COMMAND_TIMEOUT_SECONDS, 30),

    failureDomain,
    minimumAgentVersion: env.MIN_AGENT_VERSION ?? '2.8.10',
  };
}

function int(name: string, val: string | undefined, fallback: number): number {
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got '${val}'`);
  }
  return parsed;
}
