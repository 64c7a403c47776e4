/* round-scheduler.ts — Discrete-event state machine driving the LEACH-DMS rounds */

import {
  SINK_ID,
  type ClusterState,
  type ClusterTable,
  type DmsPolicy,
  type NodeEnergyState,
  type NodeId,
  type PositionOracle,
  type RandomSource,
  type ReportSink,
  type Role,
  type SchedulerPhase,
  type SimEvent,
  type SimLogger,
  type SimSnapshot,
} from './types';
import { resolveConfig, type SimConfig, type SimConfigInput } from './config';
import { EnergyLedger, RadioEnergyLedger } from './energy-ledger';
import { dmsPolicy, energyCharge, isHighPriority, power } from './dms';
import { assignBackups, electHeads, formClusters, promoteBackup } from './cluster-manager';
import { checkFailures, deadHeads } from './failure-detector';
import { EventQueue } from './event-queue';
import { RepeatingTask, TaskRegistry } from './repeating-task';
import { EnergyReporter, MemoryReportSink } from './energy-reporter';
import { GridPositionOracle, diagonalLayout } from './position';
import { Recorder } from './recorder';
import { xorshift32 } from './random';

/** Everything one simulation mutates, owned by a single scheduler */
export interface SimulationState {
  readonly nodeIds: readonly NodeId[];
  readonly ledger: EnergyLedger;
  clusters: ClusterTable;
  readonly failed: Set<NodeId>;
  round: number;
  phase: SchedulerPhase;
  firstDeathTime: number | null;
  firstDeathRound: number | null;
  readonly transmissions: Record<Role, number>;
}

export interface RoundSchedulerOptions {
  config?: SimConfigInput;
  oracle?: PositionOracle;
  random?: RandomSource;
  logger?: SimLogger;
  sink?: ReportSink;
  recorder?: Recorder;
}

export const consoleLogger: SimLogger = {
  info: message => console.log(message),
  warn: message => console.warn(message),
  error: (message, err) => console.error(message, err ?? ''),
};

type LogLevel = 'info' | 'warn' | 'error';

const EVENT_TAGS: Record<SimEvent['type'], string> = {
  election: 'ROUND',
  'no-heads': 'ROUND',
  join: 'ROUND',
  backup: 'ROUND',
  transmit: 'COMM',
  low_energy: 'ENERGY',
  report: 'ENERGY',
  summary: 'ENERGY',
  node_fail: 'FAIL',
  promotion: 'FAIL',
  error: 'TICK',
  info: 'SIM',
};

const fmt = (energy: number | undefined): string => (energy ?? 0).toFixed(2);

export class RoundScheduler {
  readonly config: SimConfig;
  readonly state: SimulationState;
  readonly oracle: PositionOracle;
  readonly policy: DmsPolicy;
  readonly reportSink: ReportSink;
  readonly recorder: Recorder;

  private readonly queue: EventQueue;
  private readonly tasks = new TaskRegistry();
  private readonly reporter: EnergyReporter;
  private readonly random: RandomSource;
  private readonly logger: SimLogger;
  private readonly lowEnergyNotified = new Set<NodeId>();
  private events: SimEvent[] = [];
  private interFires = 0;
  private started = false;
  private stopped = false;

  constructor(options: RoundSchedulerOptions = {}) {
    this.config = resolveConfig(options.config ?? {});
    const { config } = this;

    const nodeIds: NodeId[] = [];
    for (let i = 0; i < config.nodeCount; i++) nodeIds.push(i);

    const ledger = config.energyModel === 'radio'
      ? new RadioEnergyLedger(config.radio)
      : new EnergyLedger();
    ledger.initialize(nodeIds, config.initialEnergy);

    this.state = {
      nodeIds,
      ledger,
      clusters: new Map(),
      failed: new Set(),
      round: 0,
      phase: 'idle',
      firstDeathTime: null,
      firstDeathRound: null,
      transmissions: { member: 0, head: 0 },
    };

    this.oracle = options.oracle ?? new GridPositionOracle(diagonalLayout(config.nodeCount, config.spacing), config.sink);
    this.random = options.random ?? xorshift32(config.seed);
    this.logger = options.logger ?? consoleLogger;
    this.policy = dmsPolicy(config.dmsProfile, config.basePower);
    this.reportSink = options.sink ?? new MemoryReportSink();
    this.recorder = options.recorder ?? new Recorder();

    this.reporter = new EnergyReporter(this.reportSink, config.reportDropFraction);
    this.reporter.seed(ledger);

    this.queue = new EventQueue((err, label, time) => this.reportError(err, label, time));

    if (config.backupOrdering === 'at-election') {
      this.addEvent('info', 'Backups are selected before formation; clusters will have no backup head', undefined, 'warn');
    }
  }

  get now(): number { return this.queue.now; }
  get round(): number { return this.state.round; }
  get phase(): SchedulerPhase { return this.state.phase; }
  get clusters(): ClusterTable { return this.state.clusters; }
  get ledger(): EnergyLedger { return this.state.ledger; }
  get isRunning(): boolean { return this.started && !this.stopped; }

  /** Arm the round, failure-check, report and summary cadences */
  start(): void {
    if (this.started) return;
    this.started = true;
    const { intervals } = this.config;

    this.tasks.add(SINK_ID, 'round', new RepeatingTask(this.queue, intervals.round, () => this.runRound(), 'round')).start();
    this.tasks.add(SINK_ID, 'failure-check', new RepeatingTask(this.queue, intervals.failureCheck, () => this.runFailureCheck(), 'failure-check')).start();
    this.tasks.add(SINK_ID, 'report', new RepeatingTask(this.queue, intervals.report, () => this.runReport(), 'report')).start();
    this.tasks.add(SINK_ID, 'summary', new RepeatingTask(this.queue, intervals.summary, () => this.runSummary(), 'summary')).start();
  }

  /** Process every event up to sim time `until`; returns the number executed */
  run(until: number): number {
    if (this.stopped) return 0;
    this.start();
    return this.queue.runUntil(until);
  }

  advance(duration: number): number {
    return this.run(this.now + duration);
  }

  /** External stop signal */
  stop(): void {
    this.stopped = true;
    this.queue.stop();
  }

  resume(): void {
    this.stopped = false;
  }

  /** Cancel every pending action; the scheduler cannot be restarted afterwards */
  dispose(): void {
    this.stop();
    this.tasks.cancelAll();
    this.queue.clear();
  }

  // ── Round: electing → forming → communicating, one event ─────

  runRound(): void {
    const { config, state } = this;
    state.round++;
    this.tasks.cancelRoles(['member', 'head']);

    state.phase = 'electing';
    state.clusters = electHeads(
      state.nodeIds,
      state.ledger,
      config.clusterHeadProbability,
      config.eligibilityFloor,
      this.random,
      state.failed,
    );
    if (config.backupOrdering === 'at-election') {
      // literal ordering: member lists are still empty, so no backup is ever found
      assignBackups(state.clusters, state.ledger);
    }
    if (state.clusters.size === 0) {
      this.addEvent('no-heads', `Round ${state.round}: no cluster heads elected`);
    }
    for (const headId of state.clusters.keys()) {
      this.addEvent('election', `Node ${headId} elected as cluster head with energy: ${fmt(state.ledger.remaining(headId))}`, headId);
    }

    state.phase = 'forming';
    const joins = formClusters(state.nodeIds, state.clusters, this.oracle, state.failed,
      (nodeId, err) => this.reportError(err, `formation:${nodeId}`, this.now));
    for (const join of joins) {
      this.addEvent('join', `Node ${join.nodeId} joined cluster with head ${join.headId}`, join.nodeId);
    }
    if (config.backupOrdering === 'after-formation') {
      assignBackups(state.clusters, state.ledger);
      for (const cluster of state.clusters.values()) {
        if (cluster.backupHeadId === undefined) continue;
        this.addEvent('backup', `Node ${cluster.backupHeadId} is backup for cluster head ${cluster.headId}`, cluster.backupHeadId);
      }
    }

    state.phase = 'communicating';
    for (const cluster of state.clusters.values()) {
      for (const member of cluster.members) {
        this.fireFirst(this.startMemberTask(member, cluster.headId), `intra:${member}`);
      }
      this.fireFirst(this.startHeadTask(cluster.headId), `inter:${cluster.headId}`);
    }

    state.phase = 'idle';
    this.recorder.record(this.getSnapshot());
  }

  runFailureCheck(): NodeId[] {
    const { config, state } = this;
    state.phase = 'failure-checking';

    const newlyFailed = checkFailures(state.nodeIds, state.ledger, config.deathFloor, state.clusters, state.failed);
    for (const id of newlyFailed) {
      this.tasks.cancelNode(id);
      if (state.firstDeathTime === null) {
        state.firstDeathTime = this.now;
        state.firstDeathRound = state.round;
      }
      this.addEvent('node_fail', `Node ${id} has failed due to low energy`, id, 'warn');
    }

    if (config.promoteBackupOnHeadDeath) {
      for (const headId of deadHeads(state.clusters, state.failed)) {
        this.promote(headId);
      }
    }

    state.phase = 'idle';
    return newlyFailed;
  }

  runReport(): void {
    for (const report of this.reporter.report(this.now, this.state.ledger)) {
      this.addEvent('report', `Node ${report.nodeId} energy level: ${fmt(report.remainingEnergy)} J`, report.nodeId);
    }
  }

  runSummary(): void {
    const summary = this.reporter.summary(this.now, this.state.ledger);
    this.addEvent('summary', `Average node energy level: ${fmt(summary.avgEnergy)} J`);
  }

  /** Remove raw energy from a node outside the protocol (fault injection) */
  drainNode(nodeId: NodeId, amount: number): boolean {
    if (!this.state.ledger.has(nodeId)) return false;
    this.state.ledger.consume(nodeId, amount);
    this.noteEnergy(nodeId);
    return true;
  }

  // ── Communication tasks ────────────────────────────────────

  private startMemberTask(member: NodeId, headId: NodeId): RepeatingTask {
    const task = new RepeatingTask(
      this.queue,
      this.config.intervals.intra,
      () => this.transmitToHead(member, headId),
      `intra:${member}`,
    );
    return this.tasks.add(member, 'member', task);
  }

  private startHeadTask(headId: NodeId): RepeatingTask {
    const task = new RepeatingTask(
      this.queue,
      this.config.intervals.inter,
      () => this.transmitToSink(headId),
      `inter:${headId}`,
    );
    return this.tasks.add(headId, 'head', task);
  }

  /** First fire inside the round event; a throwing task keeps its cadence and the round goes on */
  private fireFirst(task: RepeatingTask, label: string): void {
    try {
      task.startNow();
    } catch (err) {
      this.reportError(err, label, this.now);
    }
  }

  private transmitToHead(member: NodeId, headId: NodeId): void {
    const { state } = this;
    const cluster = state.clusters.get(headId);
    if (state.failed.has(member) || !cluster || !cluster.members.includes(member)) {
      this.tasks.cancel(member, 'member');
      return;
    }

    const distance = this.oracle.distance(member, headId);
    const context = { role: 'member' as const, highPriority: isHighPriority(member, this.config.highPriorityEvery) };
    state.ledger.drain(member, energyCharge(distance, context, this.policy));
    state.transmissions.member++;
    this.noteEnergy(member);

    if (state.ledger instanceof RadioEnergyLedger) {
      state.ledger.chargeReceive(headId);
      this.noteEnergy(headId);
    }
  }

  private transmitToSink(headId: NodeId): void {
    const { state } = this;
    if (state.failed.has(headId) || !state.clusters.has(headId)) {
      this.tasks.cancel(headId, 'head');
      return;
    }

    const distance = this.oracle.distance(headId, SINK_ID);
    const context = { role: 'head' as const, highPriority: isHighPriority(headId, this.config.highPriorityEvery) };
    state.ledger.drain(headId, energyCharge(distance, context, this.policy));
    state.transmissions.head++;
    this.interFires++;

    // accounting runs every fire, only the log line is sampled
    if (this.interFires % this.config.interLogEvery === 0) {
      this.addEvent(
        'transmit',
        `Cluster Head ${headId} sends aggregated data to Base Station with power level: ${power(distance, context, this.policy)}`,
        headId,
      );
    }
    this.noteEnergy(headId);
  }

  private promote(deadHeadId: NodeId): void {
    const newHead = promoteBackup(this.state.clusters, deadHeadId);
    if (newHead === undefined) return;

    this.tasks.cancelNode(deadHeadId);
    this.tasks.cancel(newHead, 'member');
    this.addEvent('promotion', `Backup ${newHead} takes over the cluster of failed head ${deadHeadId}`, newHead, 'warn');

    const cluster = this.state.clusters.get(newHead);
    if (!cluster) return;
    for (const member of cluster.members) {
      this.startMemberTask(member, newHead).start();
    }
    this.startHeadTask(newHead).start();
  }

  private noteEnergy(nodeId: NodeId): void {
    const remaining = this.state.ledger.remaining(nodeId);
    if (remaining === undefined || remaining >= this.config.lowEnergyLogThreshold) return;
    if (this.lowEnergyNotified.has(nodeId)) return;
    this.lowEnergyNotified.add(nodeId);
    this.addEvent('low_energy', `Node ${nodeId} energy level: ${fmt(remaining)} J`, nodeId, 'warn');
  }

  // ── Events & snapshots ─────────────────────────────────────

  private reportError(err: unknown, label: string, time: number): void {
    const message = err instanceof Error ? err.message : String(err);
    this.pushEvent('error', `Error in ${label} at t=${time}: ${message}`);
    this.logger.error(`[TICK] Error in ${label} at t=${time}:`, err);
  }

  private pushEvent(type: SimEvent['type'], message: string, nodeId?: NodeId): void {
    const event: SimEvent = { time: this.now, round: this.state.round, type, message };
    if (nodeId !== undefined) event.nodeId = nodeId;
    this.events.push(event);
    if (this.events.length > this.config.maxEvents) {
      this.events = this.events.slice(-this.config.maxEvents);
    }
  }

  private addEvent(type: SimEvent['type'], message: string, nodeId?: NodeId, level: LogLevel = 'info'): void {
    this.pushEvent(type, message, nodeId);
    this.logger[level](`[${EVENT_TAGS[type]}] ${message}`);
  }

  getEventHistory(): SimEvent[] {
    return this.events.map(e => ({ ...e }));
  }

  getSnapshot(): SimSnapshot {
    const { state } = this;
    const memberIds = new Set<NodeId>();
    const clusters: ClusterState[] = [];
    for (const cluster of state.clusters.values()) {
      for (const m of cluster.members) memberIds.add(m);
      clusters.push({
        headId: cluster.headId,
        backupHeadId: cluster.backupHeadId ?? null,
        members: [...cluster.members],
      });
    }

    const nodes: NodeEnergyState[] = state.ledger.snapshot().map(({ nodeId, remaining, capacity }) => {
      let role: NodeEnergyState['role'] = 'orphan';
      if (state.failed.has(nodeId)) role = 'failed';
      else if (state.clusters.has(nodeId)) role = 'head';
      else if (memberIds.has(nodeId)) role = 'member';
      return { nodeId, remaining, capacity, role };
    });

    const count = (role: NodeEnergyState['role']) => nodes.filter(n => n.role === role).length;

    return {
      time: this.now,
      round: state.round,
      phase: state.phase,
      running: this.isRunning,
      clusters,
      nodes,
      stats: {
        headCount: state.clusters.size,
        memberCount: memberIds.size,
        orphanCount: count('orphan'),
        aliveCount: nodes.length - state.failed.size,
        failedCount: state.failed.size,
        totalEnergy: state.ledger.totalRemaining(),
        avgEnergy: state.ledger.averageRemaining(),
        firstDeathTime: state.firstDeathTime,
        firstDeathRound: state.firstDeathRound,
        transmissions: { ...state.transmissions },
      },
    };
  }
}
