/* controller.ts — Owns the live scheduler for the monitor server (pause, reset, fault injection) */

import type { EnergyReport, NodeId, SimLogger, SimSnapshot } from './types';
import type { SimConfigInput } from './config';
import { RoundScheduler, consoleLogger } from './round-scheduler';
import { MemoryReportSink } from './energy-reporter';

export class SimulationController {
  private scheduler: RoundScheduler;
  private sink = new MemoryReportSink();
  private paused = false;

  constructor(
    private config: SimConfigInput = {},
    private readonly logger: SimLogger = consoleLogger,
  ) {
    this.scheduler = this.create();
  }

  get sim(): RoundScheduler { return this.scheduler; }
  get isPaused(): boolean { return this.paused; }

  /** Wall-clock tick: advance `duration` sim units unless paused */
  tick(duration = 1): SimSnapshot {
    if (!this.paused) this.scheduler.advance(duration);
    return this.getSnapshot();
  }

  /** Manual stepping, honoured even while paused */
  advance(duration: number): SimSnapshot {
    this.scheduler.advance(duration);
    return this.getSnapshot();
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  /**
   * Replace the simulation with a fresh one. Overrides are merged into the
   * current configuration; invalid values throw InvalidConfigError and leave
   * the running simulation untouched.
   */
  reset(overrides: SimConfigInput = {}): SimSnapshot {
    const next = { ...this.config, ...overrides };
    const sink = new MemoryReportSink();
    const scheduler = new RoundScheduler({ config: next, logger: this.logger, sink });

    this.scheduler.dispose();
    this.config = next;
    this.sink = sink;
    this.scheduler = scheduler;
    this.scheduler.start();
    this.logger.info(`[SIM] Simulation reset (${scheduler.config.nodeCount} nodes, profile ${scheduler.config.dmsProfile})`);
    return this.getSnapshot();
  }

  drain(nodeId: NodeId, amount: number): boolean {
    return this.scheduler.drainNode(nodeId, amount);
  }

  getSnapshot(): SimSnapshot {
    const snapshot = this.scheduler.getSnapshot();
    return { ...snapshot, running: snapshot.running && !this.paused };
  }

  getReports(): EnergyReport[] {
    return this.sink.all();
  }

  private create(): RoundScheduler {
    const scheduler = new RoundScheduler({ config: this.config, logger: this.logger, sink: this.sink });
    scheduler.start();
    return scheduler;
  }
}
