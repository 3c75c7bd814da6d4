import type { Interaction, NetworkId, NetworkMap, ProteinId } from "./types.js";

/**
 * Disjoint-set over protein ids with path compression. Union attaches the
 * root of the second argument under the root of the first; no rank is kept.
 */
export class UnionFind {
  private parent = new Map<ProteinId, ProteinId>();

  add(id: ProteinId): void {
    if (!this.parent.has(id)) this.parent.set(id, id);
  }

  has(id: ProteinId): boolean {
    return this.parent.has(id);
  }

  get size(): number {
    return this.parent.size;
  }

  find(id: ProteinId): ProteinId {
    let root = this.parentOf(id);
    let current = id;
    while (root !== current) {
      current = root;
      root = this.parentOf(current);
    }

    // Path compression
    current = id;
    while (current !== root) {
      const next = this.parentOf(current);
      this.parent.set(current, root);
      current = next;
    }

    return root;
  }

  union(a: ProteinId, b: ProteinId): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA !== rootB) this.parent.set(rootB, rootA);
  }

  connected(a: ProteinId, b: ProteinId): boolean {
    return this.find(a) === this.find(b);
  }

  /** Members grouped by root, in the order proteins were added. */
  groups(): Map<ProteinId, ProteinId[]> {
    const groups = new Map<ProteinId, ProteinId[]>();
    for (const id of this.parent.keys()) {
      const root = this.find(id);
      const members = groups.get(root);
      if (members) {
        members.push(id);
      } else {
        groups.set(root, [id]);
      }
    }
    return groups;
  }

  private parentOf(id: ProteinId): ProteinId {
    const parent = this.parent.get(id);
    if (parent === undefined) {
      throw new Error(`Protein "${id}" has no interactions and belongs to no network`);
    }
    return parent;
  }
}

/**
 * Build the union-find state for the proteins that appear in any interaction,
 * merging interactions in input order.
 */
export function buildUnionFind(interactions: readonly Interaction[]): UnionFind {
  const uf = new UnionFind();
  for (const [a, b] of interactions) {
    uf.add(a);
    uf.add(b);
  }
  for (const [a, b] of interactions) {
    uf.union(a, b);
  }
  return uf;
}

/**
 * Find connected networks among the proteins touched by the given
 * interactions. Proteins with no interaction do not appear in any network.
 */
export function findConnectedNetworks(
  interactions: readonly Interaction[]
): ProteinId[][] {
  return [...buildUnionFind(interactions).groups().values()];
}

/** Number networks 0..k-1 in enumeration order and map each member to its id. */
export function buildNetworkMap(networks: readonly ProteinId[][]): NetworkMap {
  const map = new Map<ProteinId, NetworkId>();
  networks.forEach((members, networkId) => {
    for (const protein of members) {
      map.set(protein, networkId);
    }
  });
  return map;
}
