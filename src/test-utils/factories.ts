/**
 * Test factories. Every call returns fresh objects.
 */

import { vi } from 'vitest';
import type { Inventory, UnitInfo } from '../types.js';
import type { ClusterDataSource } from '../services/collector.js';

export function makeUnit(application: string, index: number, overrides: Partial<UnitInfo> = {}): UnitInfo {
  const prefix = application === 'ceph-mon' ? 'mon' : 'host';
  return {
    id: `${application}/${index}`,
    application,
    hostname: `${prefix}-${index}`,
    address: `10.0.${application === 'ceph-mon' ? 2 : 1}.${index + 10}`,
    workloadStatus: 'active',
    agentVersion: '2.9.42',
    ...overrides,
  };
}

/**
 * Three OSD units on host-0..2 served by ceph-mon, and three monitors on
 * mon-0..2 of which ceph-mon/0 is in maintenance.
 */
export function makeInventory(overrides: { osdStatuses?: string[]; monitorApplication?: string } = {}): Inventory {
  const osdStatuses = overrides.osdStatuses ?? ['active', 'active', 'active'];
  return {
    timestamp: new Date('2026-10-01T12:00:00Z'),
    source: 'file',
    applications: [
      {
        name: 'ceph-osd',
        role: 'storage',
        monitorApplication: 'monitorApplication' in overrides ? overrides.monitorApplication : 'ceph-mon',
        units: osdStatuses.map((workloadStatus, i) => makeUnit('ceph-osd', i, { workloadStatus })),
      },
      {
        name: 'ceph-mon',
        role: 'monitor',
        units: [
          makeUnit('ceph-mon', 0, { workloadStatus: 'maintenance' }),
          makeUnit('ceph-mon', 1),
          makeUnit('ceph-mon', 2),
        ],
      },
    ],
  };
}

/** `ceph osd df tree` for host-0..2 under one root: 500 kB used and 1000 kB free per host */
export function diskUsagePayload(rootAvailKb = 3000): string {
  const hosts = [0, 1, 2].map(i => ({
    id: -2 - i,
    name: `host-${i}`,
    type: 'host',
    type_id: 1,
    kb: 1500,
    kb_used: 500,
    kb_avail: 1000,
    children: [i],
  }));
  const osds = [0, 1, 2].map(i => ({
    id: i,
    name: `osd.${i}`,
    type: 'osd',
    type_id: 0,
    kb: 1500,
    kb_used: 500,
    kb_avail: 1000,
  }));
  const root = {
    id: -1,
    name: 'default',
    type: 'root',
    type_id: 10,
    kb: 4500,
    kb_used: 1500,
    kb_avail: rootAvailKb,
    children: [-2, -3, -4],
  };
  return JSON.stringify({ nodes: [root, ...hosts, ...osds], stray: [] });
}

export function quorumPayload(known: string[], online: string[] = known): string {
  return JSON.stringify({
    quorum_names: online,
    monmap: { mons: known.map(name => ({ name })) },
  });
}

/** In-process stand-in for the SSH data source */
export function makeSource() {
  return {
    health: vi.fn(async (_unit: UnitInfo) => 'HEALTH_OK'),
    poolDetails: vi.fn(async (_unit: UnitInfo) => JSON.stringify([{ pool_name: 'rbd', size: 3, min_size: 2 }])),
    diskUsageTree: vi.fn(async (_unit: UnitInfo) => diskUsagePayload()),
    quorumStatus: vi.fn(async (_unit: UnitInfo) => quorumPayload(['mon-0', 'mon-1', 'mon-2'])),
  } satisfies ClusterDataSource;
}
