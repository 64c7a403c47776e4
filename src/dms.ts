/* dms.ts — Distance/priority-sensitive transmission power policy (DMS) */

import type { DmsPolicy, DmsProfileName, NodeId, Role, TransmissionContext } from './types';
import { DEFAULT_BASE_POWER } from './config';

/** Energy charged per unit of transmit power, by sender role */
export const COST_FACTOR: Record<Role, number> = {
  member: 0.1,
  head: 0.2,   // heads relay aggregated traffic to the sink
};

type Multipliers = Omit<DmsPolicy, 'basePower' | 'longRangeThreshold' | 'shortRangeThreshold'>;

/**
 * The two tiering variants found in deployments.
 * `distance` boosts long links to 1.5×; `priority` caps them at 1.2× and
 * lets urgent traffic override distance at 1.5×.
 */
export const DMS_PROFILES: Record<DmsProfileName, Multipliers> = {
  distance: { longRangeMultiplier: 1.5, midRangeMultiplier: 1.2, shortRangeMultiplier: 0.8, priorityMultiplier: 0 },
  priority: { longRangeMultiplier: 1.2, midRangeMultiplier: 1.2, shortRangeMultiplier: 0.8, priorityMultiplier: 1.5 },
};

export function dmsPolicy(profile: DmsProfileName, basePower = DEFAULT_BASE_POWER): DmsPolicy {
  return {
    basePower,
    longRangeThreshold: 50.0,
    shortRangeThreshold: 20.0,
    ...DMS_PROFILES[profile],
  };
}

/** Transmit power level for a link of `distance` meters */
export function power(distance: number, context: TransmissionContext, policy: DmsPolicy): number {
  if (context.highPriority && policy.priorityMultiplier > 0) {
    return policy.basePower * policy.priorityMultiplier;
  }
  if (distance > policy.longRangeThreshold) return policy.basePower * policy.longRangeMultiplier;
  if (distance > policy.shortRangeThreshold) return policy.basePower * policy.midRangeMultiplier;
  return policy.basePower * policy.shortRangeMultiplier;
}

export function energyCharge(distance: number, context: TransmissionContext, policy: DmsPolicy): number {
  return COST_FACTOR[context.role] * power(distance, context, policy);
}

/** Every `every`-th node id (0, every, 2·every, …) carries urgent traffic */
export function isHighPriority(nodeId: NodeId, every: number): boolean {
  return every > 0 && nodeId % every === 0;
}
