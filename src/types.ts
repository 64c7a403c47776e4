/* types.ts — Shared TypeScript types for the LEACH-DMS clustering engine */

export type NodeId = number;

/** Reserved identifier the position oracle resolves to the sink (base station) */
export const SINK_ID: NodeId = -1;

export type Role = 'member' | 'head';
export type DmsProfileName = 'distance' | 'priority';
export type SchedulerPhase = 'idle' | 'electing' | 'forming' | 'communicating' | 'failure-checking';

export interface Vec2 {
  x: number;
  y: number;
}

export interface Cluster {
  headId: NodeId;
  backupHeadId?: NodeId;
  members: NodeId[];
}

/** headId → Cluster, iterated in election order */
export type ClusterTable = Map<NodeId, Cluster>;

export interface TransmissionContext {
  role: Role;
  highPriority?: boolean;
}

export interface DmsPolicy {
  basePower: number;
  longRangeThreshold: number;
  shortRangeThreshold: number;
  longRangeMultiplier: number;
  midRangeMultiplier: number;
  shortRangeMultiplier: number;
  /** 0 disables the priority override */
  priorityMultiplier: number;
}

/** Capability every energy-accounting strategy offers */
export interface EnergyAccount {
  remaining(nodeId: NodeId): number | undefined;
  drain(nodeId: NodeId, amount: number): void;
}

export interface PositionOracle {
  distance(a: NodeId, b: NodeId): number;
}

export type RandomSource = () => number;

export interface EnergyReport {
  time: number;
  nodeId: NodeId;
  remainingEnergy: number;
}

export interface ReportSink {
  append(report: EnergyReport): void;
}

export interface SimEvent {
  time: number;
  round: number;
  type: 'election' | 'no-heads' | 'join' | 'backup' | 'transmit' | 'low_energy'
      | 'node_fail' | 'promotion' | 'report' | 'summary' | 'error' | 'info';
  message: string;
  nodeId?: NodeId;
}

export interface SimLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export interface ClusterState {
  headId: NodeId;
  backupHeadId: NodeId | null;
  members: NodeId[];
}

export interface NodeEnergyState {
  nodeId: NodeId;
  remaining: number;
  capacity: number;
  role: Role | 'orphan' | 'failed';
}

export interface SimStats {
  headCount: number;
  memberCount: number;
  orphanCount: number;
  aliveCount: number;
  failedCount: number;
  totalEnergy: number;
  avgEnergy: number;
  firstDeathTime: number | null;
  firstDeathRound: number | null;
  transmissions: Record<Role, number>;
}

export interface SimSnapshot {
  time: number;
  round: number;
  phase: SchedulerPhase;
  running: boolean;
  clusters: ClusterState[];
  nodes: NodeEnergyState[];
  stats: SimStats;
}
