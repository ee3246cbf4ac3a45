/**
 * Payload parsers
 *
 * Validate raw JSON from Ceph commands and the inventory document and turn it
 * into the typed records the checks consume.
 */

import { z } from 'zod';
import type { Inventory, PoolRecord, QuorumStatus, TopologyNode } from '../types.js';
import { TOPOLOGY_KINDS } from '../types.js';
import { MalformedDataError } from '../errors.js';

const kb = z.number().int().nonnegative();

/** `ceph osd df tree --format json` */
const diskUsageTreeSchema = z.object({
  nodes: z.array(z.object({
    id: z.number().int(),
    name: z.string(),
    type: z.enum(TOPOLOGY_KINDS),
    type_id: z.number().int(),
    kb,
    kb_used: kb,
    kb_avail: kb,
    children: z.array(z.number().int()).optional(),
  })),
});

/** `ceph osd pool ls detail --format json` */
const poolDetailsSchema = z.array(z.object({
  pool_name: z.string().optional(),
  size: z.number().int(),
  min_size: z.number().int(),
}));

/** `ceph quorum_status --format json` */
const quorumStatusSchema = z.object({
  quorum_names: z.array(z.string()),
  monmap: z.object({
    mons: z.array(z.object({ name: z.string() })),
  }),
});

const inventorySchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  applications: z.array(z.object({
    name: z.string().min(1),
    role: z.enum(['storage', 'monitor']),
    monitorApplication: z.string().min(1).optional(),
    units: z.array(z.object({
      id: z.string().min(1),
      hostname: z.string().min(1),
      address: z.string().min(1),
      workloadStatus: z.string(),
      agentVersion: z.string().optional(),
    })),
  })),
});

function parseJson<S extends z.ZodTypeAny>(source: string, schema: S, payload: string): z.infer<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (err) {
    throw new MalformedDataError(source, err instanceof Error ? err.message : String(err));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new MalformedDataError(source, detail);
  }
  return parsed.data;
}

export function parseDiskUsageTree(payload: string): TopologyNode[] {
  const { nodes } = parseJson('disk usage tree', diskUsageTreeSchema, payload);
  return nodes.map(n => ({
    id: n.id,
    name: n.name,
    kind: n.type,
    kindRank: n.type_id,
    capacityKb: n.kb,
    usedKb: n.kb_used,
    availKb: n.kb_avail,
    children: n.children,
  }));
}

export function parsePoolDetails(payload: string): PoolRecord[] {
  return parseJson('pool details', poolDetailsSchema, payload).map(p => ({
    name: p.pool_name,
    size: p.size,
    minSize: p.min_size,
  }));
}

export function parseQuorumStatus(payload: string): QuorumStatus {
  const status = parseJson('quorum status', quorumStatusSchema, payload);
  return {
    knownMembers: new Set(status.monmap.mons.map(m => m.name)),
    onlineMembers: new Set(status.quorum_names),
  };
}

export function parseInventory(payload: string, source: Inventory['source']): Inventory {
  const doc = parseJson('inventory', inventorySchema, payload);
  return {
    timestamp: new Date(doc.timestamp),
    source,
    applications: doc.applications.map(app => ({
      name: app.name,
      role: app.role,
      monitorApplication: app.monitorApplication,
      units: app.units.map(u => ({ ...u, application: app.name })),
    })),
  };
}
