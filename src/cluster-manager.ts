/* cluster-manager.ts — Head election, nearest-head formation and backup selection */

import type { Cluster, ClusterTable, EnergyAccount, NodeId, PositionOracle, RandomSource } from './types';

export interface JoinResult {
  nodeId: NodeId;
  headId: NodeId;
  distance: number;
}

const NONE: ReadonlySet<NodeId> = new Set();

/**
 * Build a fresh cluster table for this round.
 *
 * One sample is drawn per node, in order, even for nodes that cannot win,
 * so a seeded source replays identically whatever the energy state.
 * An empty table is a valid outcome.
 */
export function electHeads(
  nodeIds: Iterable<NodeId>,
  ledger: EnergyAccount,
  probability: number,
  eligibilityFloor: number,
  random: RandomSource,
  excluded: ReadonlySet<NodeId> = NONE,
): ClusterTable {
  const table: ClusterTable = new Map();
  for (const id of nodeIds) {
    const sample = random();
    if (excluded.has(id)) continue;
    const remaining = ledger.remaining(id);
    if (remaining === undefined) continue;
    if (sample <= probability && remaining > eligibilityFloor) {
      table.set(id, { headId: id, members: [] });
    }
  }
  return table;
}

/**
 * Member with strictly the highest remaining energy; the first one seen wins
 * ties. Members with no energy left never qualify.
 */
export function selectBackup(cluster: Cluster, ledger: EnergyAccount): NodeId | undefined {
  let backup: NodeId | undefined;
  let maxEnergy = 0;
  for (const member of cluster.members) {
    const energy = ledger.remaining(member);
    if (energy !== undefined && energy > maxEnergy) {
      maxEnergy = energy;
      backup = member;
    }
  }
  return backup;
}

/** Refresh every cluster's backup. Only meaningful once formation has run. */
export function assignBackups(table: ClusterTable, ledger: EnergyAccount): void {
  for (const cluster of table.values()) {
    const backup = selectBackup(cluster, ledger);
    if (backup === undefined) {
      delete cluster.backupHeadId;
    } else {
      cluster.backupHeadId = backup;
    }
  }
}

export type FormationErrorHandler = (nodeId: NodeId, err: unknown) => void;

/**
 * Attach every non-head node to its closest head (first head in table
 * order on ties). Nodes stay unassigned when there are no heads.
 *
 * When `onError` is given, a node whose distance lookup throws is reported
 * and left unassigned while formation continues; without it the error
 * propagates.
 */
export function formClusters(
  nodeIds: Iterable<NodeId>,
  table: ClusterTable,
  oracle: PositionOracle,
  excluded: ReadonlySet<NodeId> = NONE,
  onError?: FormationErrorHandler,
): JoinResult[] {
  const joins: JoinResult[] = [];
  if (table.size === 0) return joins;

  for (const id of nodeIds) {
    if (table.has(id) || excluded.has(id)) continue;

    let minDistance = Number.POSITIVE_INFINITY;
    let closest: Cluster | undefined;
    try {
      for (const cluster of table.values()) {
        const d = oracle.distance(id, cluster.headId);
        if (d < minDistance) {
          minDistance = d;
          closest = cluster;
        }
      }
    } catch (err) {
      if (!onError) throw err;
      onError(id, err);
      continue;
    }

    if (closest && !closest.members.includes(id)) {
      closest.members.push(id);
      joins.push({ nodeId: id, headId: closest.headId, distance: minDistance });
    }
  }
  return joins;
}

/**
 * Hand a cluster over to its backup. The dead head's entry is replaced by
 * one keyed on the backup, carrying the remaining members.
 * Returns the new head, or undefined when there is no backup.
 */
export function promoteBackup(table: ClusterTable, headId: NodeId): NodeId | undefined {
  const cluster = table.get(headId);
  if (!cluster || cluster.backupHeadId === undefined) return undefined;

  const newHead = cluster.backupHeadId;
  table.delete(headId);
  table.set(newHead, {
    headId: newHead,
    members: cluster.members.filter(m => m !== newHead),
  });
  return newHead;
}

/** Cluster the node heads or belongs to, if any */
export function clusterOf(table: ClusterTable, nodeId: NodeId): Cluster | undefined {
  const led = table.get(nodeId);
  if (led) return led;
  for (const cluster of table.values()) {
    if (cluster.members.includes(nodeId)) return cluster;
  }
  return undefined;
}

export function memberCount(table: ClusterTable): number {
  let count = 0;
  for (const cluster of table.values()) count += cluster.members.length;
  return count;
}
