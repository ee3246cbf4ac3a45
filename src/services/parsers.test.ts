/**
 * Payload Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { parseDiskUsageTree, parseInventory, parsePoolDetails, parseQuorumStatus } from './parsers.js';
import { MalformedDataError } from '../errors.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function diskUsagePayload(nodes: unknown[]): string {
  return JSON.stringify({ nodes, stray: [], summary: { total_kb: 3000 } });
}

const ROOT = { id: -1, name: 'default', type: 'root', type_id: 10, reweight: -1, kb: 3000, kb_used: 300, kb_avail: 2700, children: [-2] };
const HOST = { id: -2, name: 'host-0', type: 'host', type_id: 1, reweight: -1, kb: 3000, kb_used: 300, kb_avail: 2700, children: [0] };
const OSD = { id: 0, name: 'osd.0', type: 'osd', type_id: 0, reweight: 1, kb: 3000, kb_used: 300, kb_avail: 2700, utilization: 10 };

// ---------------------------------------------------------------------------
// Disk usage tree
// ---------------------------------------------------------------------------

describe('parseDiskUsageTree()', () => {
  it('maps ceph fields to topology nodes', () => {
    const nodes = parseDiskUsageTree(diskUsagePayload([ROOT, HOST, OSD]));

    expect(nodes).toEqual([
      { id: -1, name: 'default', kind: 'root', kindRank: 10, capacityKb: 3000, usedKb: 300, availKb: 2700, children: [-2] },
      { id: -2, name: 'host-0', kind: 'host', kindRank: 1, capacityKb: 3000, usedKb: 300, availKb: 2700, children: [0] },
      { id: 0, name: 'osd.0', kind: 'osd', kindRank: 0, capacityKb: 3000, usedKb: 300, availKb: 2700, children: undefined },
    ]);
  });

  it('rejects unknown bucket types', () => {
    expect(() => parseDiskUsageTree(diskUsagePayload([{ ...HOST, type: 'zone' }]))).toThrow(
      /^Malformed disk usage tree: nodes\.0\.type: Invalid enum value/,
    );
  });

  it('rejects negative capacities', () => {
    expect(() => parseDiskUsageTree(diskUsagePayload([{ ...OSD, kb_avail: -5 }]))).toThrow(MalformedDataError);
  });

  it('rejects output without nodes', () => {
    expect(() => parseDiskUsageTree('{}')).toThrow('Malformed disk usage tree: nodes: Required');
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseDiskUsageTree('Error EACCES: access denied')).toThrow(MalformedDataError);
  });
});

// ---------------------------------------------------------------------------
// Pools and quorum
// ---------------------------------------------------------------------------

describe('parsePoolDetails()', () => {
  it('reads size and min_size', () => {
    const payload = JSON.stringify([
      { pool_id: 1, pool_name: 'rbd', size: 3, min_size: 2, crush_rule: 0 },
      { pool_id: 2, pool_name: 'cinder', size: 2, min_size: 1, crush_rule: 0 },
    ]);
    expect(parsePoolDetails(payload)).toEqual([
      { name: 'rbd', size: 3, minSize: 2 },
      { name: 'cinder', size: 2, minSize: 1 },
    ]);
  });

  it('accepts an empty pool list', () => {
    expect(parsePoolDetails('[]')).toEqual([]);
  });

  it('names the missing field', () => {
    expect(() => parsePoolDetails(JSON.stringify([{ pool_name: 'rbd', size: 3 }]))).toThrow(
      'Malformed pool details: 0.min_size: Required',
    );
  });
});

describe('parseQuorumStatus()', () => {
  it('collects known and online members', () => {
    const status = parseQuorumStatus(JSON.stringify({
      quorum_names: ['mon-a', 'mon-b'],
      monmap: { mons: [{ name: 'mon-a' }, { name: 'mon-b' }, { name: 'mon-c' }] },
    }));

    expect([...status.knownMembers]).toEqual(['mon-a', 'mon-b', 'mon-c']);
    expect([...status.onlineMembers]).toEqual(['mon-a', 'mon-b']);
  });

  it('rejects a payload without quorum names', () => {
    expect(() => parseQuorumStatus(JSON.stringify({ monmap: { mons: [] } }))).toThrow(
      'Malformed quorum status: quorum_names: Required',
    );
  });
});

// ---------------------------------------------------------------------------
// Inventory
// ---------------------------------------------------------------------------

describe('parseInventory()', () => {
  const doc = {
    timestamp: '2026-10-01T12:00:00Z',
    applications: [
      {
        name: 'ceph-osd',
        role: 'storage',
        monitorApplication: 'ceph-mon',
        units: [{ id: 'ceph-osd/0', hostname: 'host-0', address: '10.0.0.10', workloadStatus: 'active' }],
      },
      {
        name: 'ceph-mon',
        role: 'monitor',
        units: [{ id: 'ceph-mon/0', hostname: 'mon-a', address: '10.0.0.20', workloadStatus: 'active', agentVersion: '2.9.1' }],
      },
    ],
  };

  it('attaches the application name to each unit', () => {
    const inventory = parseInventory(JSON.stringify(doc), 'file');

    expect(inventory.source).toBe('file');
    expect(inventory.timestamp.toISOString()).toBe('2026-10-01T12:00:00.000Z');
    expect(inventory.applications[0].units[0]).toEqual({
      id: 'ceph-osd/0',
      application: 'ceph-osd',
      hostname: 'host-0',
      address: '10.0.0.10',
      workloadStatus: 'active',
    });
    expect(inventory.applications[1].units[0].agentVersion).toBe('2.9.1');
  });

  it('rejects an unknown role', () => {
    const bad = { ...doc, applications: [{ ...doc.applications[0], role: 'gateway' }] };
    expect(() => parseInventory(JSON.stringify(bad), 'redis')).toThrow(/^Malformed inventory: applications\.0\.role/);
  });

  it('rejects a timestamp that is not ISO 8601', () => {
    expect(() => parseInventory(JSON.stringify({ ...doc, timestamp: 'yesterday' }), 'file')).toThrow(
      /^Malformed inventory: timestamp/,
    );
  });
});
