/* energy-reporter.ts — Threshold-suppressed energy reports for observers */

import type { EnergyReport, NodeId, ReportSink } from './types';
import type { EnergyLedger } from './energy-ledger';
import { DEFAULT_REPORT_DROP_FRACTION } from './config';

const MAX_REPORTS = 5000;

/** Append-only in-memory sink; oldest tuples fall off past `maxReports` */
export class MemoryReportSink implements ReportSink {
  private readonly reports: EnergyReport[] = [];

  constructor(private readonly maxReports = MAX_REPORTS) {}

  append(report: EnergyReport): void {
    this.reports.push({ ...report });
    if (this.reports.length > this.maxReports) {
      this.reports.splice(0, this.reports.length - this.maxReports);
    }
  }

  all(): EnergyReport[] {
    return this.reports.map(r => ({ ...r }));
  }

  forNode(nodeId: NodeId): EnergyReport[] {
    return this.reports.filter(r => r.nodeId === nodeId).map(r => ({ ...r }));
  }

  get size(): number { return this.reports.length; }
}

export interface EnergySummary {
  time: number;
  totalEnergy: number;
  avgEnergy: number;
}

/**
 * Emits a node's energy only once it has dropped `dropFraction` of its last
 * reported value, so observers are not flooded with every drain.
 */
export class EnergyReporter {
  private readonly lastReported = new Map<NodeId, number>();

  constructor(
    private readonly sink: ReportSink,
    private readonly dropFraction = DEFAULT_REPORT_DROP_FRACTION,
  ) {}

  /**
   * Take the current levels as the baseline without emitting anything.
   * Unlike an unseeded reporter, the first report then lists only nodes that
   * already dropped `dropFraction` below their starting energy.
   */
  seed(ledger: EnergyLedger): void {
    for (const { nodeId, remaining } of ledger.snapshot()) {
      this.lastReported.set(nodeId, remaining);
    }
  }

  report(time: number, ledger: EnergyLedger): EnergyReport[] {
    const emitted: EnergyReport[] = [];
    for (const { nodeId, remaining } of ledger.snapshot()) {
      const last = this.lastReported.get(nodeId);
      if (last !== undefined) {
        // an empty node has nothing left to drop
        if (last <= 0) continue;
        if (last - remaining < last * this.dropFraction) continue;
      }
      const tuple: EnergyReport = { time, nodeId, remainingEnergy: remaining };
      this.sink.append(tuple);
      this.lastReported.set(nodeId, remaining);
      emitted.push(tuple);
    }
    return emitted;
  }

  summary(time: number, ledger: EnergyLedger): EnergySummary {
    return {
      time,
      totalEnergy: ledger.totalRemaining(),
      avgEnergy: ledger.averageRemaining(),
    };
  }

  lastReportedFor(nodeId: NodeId): number | undefined {
    return this.lastReported.get(nodeId);
  }
}
