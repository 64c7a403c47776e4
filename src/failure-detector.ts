/* failure-detector.ts — Prune nodes whose energy has fallen to the death floor */

import type { ClusterTable, EnergyAccount, NodeId } from './types';

/**
 * Remove every exhausted node from all member lists and backup slots, not
 * only the cluster it was last assigned to. Exhausted nodes are added to
 * `failed`; only nodes failing for the first time are returned.
 *
 * Dead heads keep their table entry: they are not re-elected once the
 * table is rebuilt, and promotion is the caller's decision.
 */
export function checkFailures(
  nodeIds: Iterable<NodeId>,
  ledger: EnergyAccount,
  deathFloor: number,
  table: ClusterTable,
  failed: Set<NodeId>,
): NodeId[] {
  const newlyFailed: NodeId[] = [];
  const dead = new Set<NodeId>();

  for (const id of nodeIds) {
    const remaining = ledger.remaining(id);
    if (remaining !== undefined && remaining > deathFloor) continue;
    dead.add(id);
    if (!failed.has(id)) {
      failed.add(id);
      newlyFailed.push(id);
    }
  }

  if (dead.size === 0) return newlyFailed;

  for (const cluster of table.values()) {
    cluster.members = cluster.members.filter(m => !dead.has(m));
    if (cluster.backupHeadId !== undefined && dead.has(cluster.backupHeadId)) {
      delete cluster.backupHeadId;
    }
  }
  return newlyFailed;
}

/** Heads in the table that are among the failed nodes */
export function deadHeads(table: ClusterTable, failed: ReadonlySet<NodeId>): NodeId[] {
  return [...table.keys()].filter(id => failed.has(id));
}
