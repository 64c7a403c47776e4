/* position.ts — Static position oracle (node placement is an external concern) */

import { SINK_ID, type NodeId, type PositionOracle, type Vec2 } from './types';
import { UnknownNodeError } from './errors';

export class GridPositionOracle implements PositionOracle {
  private readonly positions = new Map<NodeId, Vec2>();

  constructor(positions: Iterable<[NodeId, Vec2]>, sink: Vec2 = { x: 0, y: 0 }) {
    for (const [id, pos] of positions) {
      this.positions.set(id, { ...pos });
    }
    this.positions.set(SINK_ID, { ...sink });
  }

  positionOf(nodeId: NodeId): Vec2 | undefined {
    const pos = this.positions.get(nodeId);
    return pos ? { ...pos } : undefined;
  }

  distance(a: NodeId, b: NodeId): number {
    const pa = this.positions.get(a);
    if (!pa) throw new UnknownNodeError(a);
    const pb = this.positions.get(b);
    if (!pb) throw new UnknownNodeError(b);
    const dx = pa.x - pb.x;
    const dy = pa.y - pb.y;
    return Math.sqrt(dx * dx + dy * dy);
  }
}

/** Node i at (spacing·i, spacing·i) — the diagonal test layout */
export function diagonalLayout(count: number, spacing = 10): Array<[NodeId, Vec2]> {
  const layout: Array<[NodeId, Vec2]> = [];
  for (let i = 0; i < count; i++) {
    layout.push([i, { x: spacing * i, y: spacing * i }]);
  }
  return layout;
}
