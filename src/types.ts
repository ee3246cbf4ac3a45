import type { TopologyTree } from './topology/tree.js';

/** CRUSH bucket types, highest rank first. `osd` is the device level. */
export const TOPOLOGY_KINDS = [
  'root',
  'region',
  'datacenter',
  'room',
  'pod',
  'pdu',
  'row',
  'rack',
  'chassis',
  'host',
  'osd',
] as const;

export type TopologyKind = (typeof TOPOLOGY_KINDS)[number];

export const TOPOLOGY_KIND_RANK: Record<TopologyKind, number> = {
  root: 10,
  region: 9,
  datacenter: 8,
  room: 7,
  pod: 6,
  pdu: 5,
  row: 4,
  rack: 3,
  chassis: 2,
  host: 1,
  osd: 0,
};

export function isTopologyKind(value: string): value is TopologyKind {
  return TOPOLOGY_KINDS.some(kind => kind === value);
}

/** One bucket or device from `ceph osd df tree` */
export interface TopologyNode {
  readonly id: number;
  readonly name: string;
  readonly kind: TopologyKind;
  readonly kindRank: number;
  readonly capacityKb: number;
  readonly usedKb: number;
  readonly availKb: number;
  readonly children?: readonly number[];
}

/** Replication settings of a single pool */
export interface PoolRecord {
  name?: string;
  size: number;
  minSize: number;
}

/** Monitor membership as seen by one monitor */
export interface QuorumStatus {
  knownMembers: ReadonlySet<string>;
  onlineMembers: ReadonlySet<string>;
}

export type UnitRole = 'storage' | 'monitor';

/** A deployed unit of an application, pinned to one machine */
export interface UnitInfo {
  id: string;
  application: string;
  hostname: string;
  address: string;
  workloadStatus: string;
  agentVersion?: string;
}

export interface ApplicationInfo {
  name: string;
  role: UnitRole;
  /** Monitor application serving a storage application */
  monitorApplication?: string;
  units: UnitInfo[];
}

/** Deployment inventory read from Redis or the inventory file */
export interface Inventory {
  timestamp: Date;
  applications: ApplicationInfo[];
  source: 'redis' | 'file';
}

/** Outcome of a remote fetch; failures are carried to the check that needs the value */
export type Fetched<T> = { ok: true; value: T } | { ok: false; error: string };

export interface HealthReport {
  unit: string;
  status: Fetched<string>;
}

export interface QuorumReport {
  unit: string;
  /** Raw `ceph quorum_status` output */
  payload: Fetched<string>;
}

export interface StorageApplicationSnapshot {
  application: string;
  targets: UnitInfo[];
  inactiveUnits: string[];
  pools: Fetched<PoolRecord[]>;
  topology: Fetched<TopologyTree>;
}

/** Everything the storage-node checks read, fetched once per run */
export interface StorageSnapshot {
  health: HealthReport[];
  applications: StorageApplicationSnapshot[];
}

/** Everything the monitor checks read, fetched once per run */
export interface MonitorSnapshot {
  targets: UnitInfo[];
  quorum: QuorumReport[];
  health: HealthReport[];
}

export type Operation = 'reboot' | 'shutdown';
