/**
 * CRUSH Topology Tree
 *
 * In-memory view of `ceph osd df tree`: buckets (root, rack, host, ...) that
 * aggregate the capacity of the OSDs below them. Built once per verification
 * run and never mutated; removal effects are computed arithmetically.
 */

import type { TopologyKind, TopologyNode } from '../types.js';
import { InvalidArgumentError, NotFoundError } from '../errors.js';
import { log } from '../logger.js';

/**
 * Ancestor kinds a host removal can be evaluated against. The ancestor matches
 * the replication failure domain, except that failure-domain=host uses root.
 */
export const SUPPORTED_ANCESTOR_KINDS: readonly TopologyKind[] = [
  'root',
  'region',
  'datacenter',
  'room',
  'pod',
  'pdu',
  'row',
  'rack',
  'chassis',
];

/** Hosts proposed for removal that share one ancestor */
export interface AncestorGroup {
  ancestor: TopologyNode;
  hosts: TopologyNode[];
  usedKb: number;
  availKb: number;
  /** Free space left under the ancestor once the hosts are gone */
  remainingAvailKb: number;
  safe: boolean;
}

export interface RemovalAssessment {
  safe: boolean;
  groups: AncestorGroup[];
}

export function formatNode(node: TopologyNode): string {
  return `${node.kindRank}-${node.name}(${node.id})`;
}

export class TopologyTree {
  private readonly nodes: readonly TopologyNode[];
  private readonly nameIndex = new Map<string, number>();
  /** child id -> index of its parent in `nodes` */
  private readonly parentIndex = new Map<number, number>();

  constructor(nodes: readonly TopologyNode[]) {
    this.nodes = Object.freeze([...nodes]);

    this.nodes.forEach((node, index) => {
      this.nameIndex.set(node.name, index);
      for (const child of node.children ?? []) {
        // first listing wins, same as a front-to-back scan
        if (!this.parentIndex.has(child)) this.parentIndex.set(child, index);
      }
    });
  }

  get size(): number {
    return this.nodes.length;
  }

  lookup(name: string): TopologyNode {
    const index = this.nameIndex.get(name);
    if (index === undefined) {
      throw new NotFoundError(`Node ${name} was not found.`);
    }
    return this.nodes[index];
  }

  /**
   * Nearest strict ancestor of `node` with the given kind, or undefined when
   * the node is disconnected or no such ancestor exists.
   */
  findAncestor(node: TopologyNode, requiredKind: TopologyKind): TopologyNode | undefined {
    const index = this.findAncestorIndex(node, requiredKind);
    return index === undefined ? undefined : this.nodes[index];
  }

  private findAncestorIndex(node: TopologyNode, requiredKind: TopologyKind): number | undefined {
    const visited = new Set<number>([node.id]);
    let parentIdx = this.parentIndex.get(node.id);

    while (parentIdx !== undefined) {
      const parent = this.nodes[parentIdx];
      if (parent.kind === requiredKind) return parentIdx;
      if (visited.has(parent.id)) return undefined;
      visited.add(parent.id);
      parentIdx = this.parentIndex.get(parent.id);
    }

    return undefined;
  }

  /**
   * Evaluate removing the named hosts.
   *
   * Hosts are grouped by their ancestor of `requiredAncestorKind`. A group is
   * unsafe when the ancestor's free space, minus the free space the hosts
   * contribute, does not exceed the data stored on those hosts. The boundary
   * is inclusive: equal values are unsafe.
   */
  evaluateRemoval(names: Iterable<string>, requiredAncestorKind: string): RemovalAssessment {
    const ancestorKind = SUPPORTED_ANCESTOR_KINDS.find(kind => kind === requiredAncestorKind);
    if (ancestorKind === undefined) {
      throw new InvalidArgumentError(`\`${requiredAncestorKind}\` is not a supported ancestor type`);
    }

    const hosts = [...new Set(names)].map(name => this.lookup(name));
    const nonHosts = hosts.filter(node => node.kind !== 'host');
    if (nonHosts.length > 0) {
      throw new InvalidArgumentError(
        `Removal can only be evaluated for host nodes, got ${nonHosts.map(formatNode).join(', ')}`,
      );
    }

    const grouped = new Map<number, TopologyNode[]>();
    for (const host of hosts) {
      const ancestorIdx = this.findAncestorIndex(host, ancestorKind);
      if (ancestorIdx === undefined) {
        throw new InvalidArgumentError(
          `An ancestor of type ${ancestorKind} for the host node ${formatNode(host)} could not be found.`,
        );
      }
      log(`[Topology] ancestor of ${formatNode(host)} is ${formatNode(this.nodes[ancestorIdx])}`);
      grouped.set(ancestorIdx, [...(grouped.get(ancestorIdx) ?? []), host]);
    }

    const groups = [...grouped.entries()]
      .sort(([a], [b]) => a - b)
      .map(([ancestorIdx, members]): AncestorGroup => {
        const ancestor = this.nodes[ancestorIdx];
        const usedKb = members.reduce((sum, h) => sum + h.usedKb, 0);
        const availKb = members.reduce((sum, h) => sum + h.availKb, 0);
        const remainingAvailKb = ancestor.availKb - availKb;
        const safe = remainingAvailKb > usedKb;

        if (!safe) {
          log(
            `[Topology] Lack of space ${remainingAvailKb} kB <= ${usedKb} kB under ${formatNode(ancestor)}; `
            + `${members.map(formatNode).join(',')} cannot be removed`,
          );
        }

        return { ancestor, hosts: members, usedKb, availKb, remainingAvailKb, safe };
      });

    return { safe: groups.every(g => g.safe), groups };
  }

  canRemove(names: Iterable<string>, requiredAncestorKind: string): boolean {
    return this.evaluateRemoval(names, requiredAncestorKind).safe;
  }

  /** Nodes ordered from the highest rank down, e.g. `10-default(-1),3-rack.0(-2)` */
  toString(): string {
    return [...this.nodes]
      .sort((a, b) => b.kindRank - a.kindRank)
      .map(formatNode)
      .join(',');
  }
}
