import { describe, it, expect } from 'vitest';
import { RoundScheduler, type RoundSchedulerOptions } from '../src/round-scheduler';
import { MemoryReportSink } from '../src/energy-reporter';
import { GridPositionOracle, diagonalLayout } from '../src/position';
import { constantRandom } from '../src/random';
import { SINK_ID, type NodeId, type PositionOracle, type SimEvent } from '../src/types';
import { forcedHeadRandom, silentLogger } from './helpers';

/** Node 0 heads every round; nodes 1–9 are its members */
function forcedHead(options: RoundSchedulerOptions = {}): RoundScheduler {
  return new RoundScheduler({ random: forcedHeadRandom(), logger: silentLogger(), ...options });
}

function eventsOf(sim: RoundScheduler, type: SimEvent['type']): SimEvent[] {
  return sim.getEventHistory().filter(e => e.type === type);
}

/** Diagonal layout whose distance lookups start failing for one node on demand */
class BreakableOracle implements PositionOracle {
  private readonly inner = new GridPositionOracle(diagonalLayout(10));
  broken: NodeId | null = null;

  distance(a: NodeId, b: NodeId): number {
    if (a === this.broken || b === this.broken) throw new Error(`position of ${this.broken} lost`);
    return this.inner.distance(a, b);
  }
}

describe('RoundScheduler', () => {

  // ── Election & formation ───────────────────────────────

  describe('round', () => {
    it('elects, forms and assigns a backup in one event', () => {
      const sim = forcedHead();

      sim.runRound();

      expect(sim.round).toBe(1);
      expect(sim.phase).toBe('idle');
      expect(sim.clusters.get(0)).toEqual({ headId: 0, members: [1, 2, 3, 4, 5, 6, 7, 8, 9], backupHeadId: 1 });
      expect(eventsOf(sim, 'election').map(e => e.message)).toEqual(['Node 0 elected as cluster head with energy: 100.00']);
      expect(eventsOf(sim, 'join')).toHaveLength(9);
      expect(eventsOf(sim, 'backup').map(e => e.message)).toEqual(['Node 1 is backup for cluster head 0']);
    });

    it('fires every communication task once at round start', () => {
      const sim = forcedHead();

      sim.runRound();

      expect(sim.ledger.remaining(1)).toBeCloseTo(99.92);   // 14.1 m, 0.8 power
      expect(sim.ledger.remaining(2)).toBeCloseTo(99.88);   // 28.3 m, 1.2 power
      expect(sim.ledger.remaining(9)).toBeCloseTo(99.85);   // 127 m, 1.5 power
      expect(sim.ledger.remaining(0)).toBeCloseTo(99.84);   // head at the sink
      expect(sim.getSnapshot().stats.transmissions).toEqual({ member: 9, head: 1 });
    });

    it('makes every node a head when p = 1', () => {
      const sim = new RoundScheduler({
        config: { clusterHeadProbability: 1 },
        random: constantRandom(0.5),
        logger: silentLogger(),
      });

      sim.runRound();
      const snapshot = sim.getSnapshot();

      expect(snapshot.stats.headCount).toBe(10);
      expect(snapshot.stats.memberCount).toBe(0);
      expect(snapshot.clusters.every(c => c.members.length === 0 && c.backupHeadId === null)).toBe(true);
    });

    it('records a round with no heads', () => {
      const sim = new RoundScheduler({
        config: { clusterHeadProbability: 0 },
        random: constantRandom(0.5),
        logger: silentLogger(),
      });

      sim.runRound();

      expect(sim.clusters.size).toBe(0);
      expect(eventsOf(sim, 'no-heads').map(e => e.message)).toEqual(['Round 1: no cluster heads elected']);
      expect(sim.getSnapshot().stats.orphanCount).toBe(10);
      expect(sim.ledger.totalRemaining()).toBe(1000);
    });

    it('never finds a backup when backups are assigned at election time', () => {
      const sim = forcedHead({ config: { backupOrdering: 'at-election' } });

      sim.runRound();

      expect(sim.clusters.get(0)?.backupHeadId).toBeUndefined();
      expect(eventsOf(sim, 'backup')).toEqual([]);
      expect(eventsOf(sim, 'info').map(e => e.message)).toEqual([
        'Backups are selected before formation; clusters will have no backup head',
      ]);
    });
  });

  // ── Timeline ───────────────────────────────────────────

  describe('timeline', () => {
    it('runs the first round at t = 20', () => {
      const sim = forcedHead();

      sim.run(19);
      expect(sim.round).toBe(0);
      expect(sim.clusters.size).toBe(0);

      sim.run(20);
      expect(sim.round).toBe(1);
      expect(sim.now).toBe(20);
    });

    it('members send every time unit, heads every five', () => {
      const sim = forcedHead();

      sim.run(25);

      expect(sim.ledger.remaining(1)).toBeCloseTo(99.52);
      expect(sim.ledger.remaining(0)).toBeCloseTo(99.68);
      expect(sim.getSnapshot().stats.transmissions).toEqual({ member: 54, head: 2 });
    });

    it('restarts communication on re-election without double firing', () => {
      const sim = forcedHead();

      sim.run(40);

      expect(sim.round).toBe(2);
      expect(sim.ledger.remaining(1)).toBeCloseTo(98.32);
      expect(sim.ledger.remaining(0)).toBeCloseTo(99.2);
    });

    it('logs only every fifth head transmission', () => {
      const sim = forcedHead();

      sim.run(40);

      expect(eventsOf(sim, 'transmit').map(e => e.message)).toEqual([
        'Cluster Head 0 sends aggregated data to Base Station with power level: 0.8',
      ]);
    });

    it('records one replay frame per round', () => {
      const sim = forcedHead();

      sim.run(40);

      expect(sim.recorder.getInfo()).toEqual({ totalRecorded: 2, bufferedFrames: 2, oldestRound: 1, newestRound: 2 });
      expect(sim.recorder.getRange(2, 2)[0].time).toBe(40);
    });

    it('is deterministic for a given seed', () => {
      const a = new RoundScheduler({ config: { seed: 99 }, logger: silentLogger() });
      const b = new RoundScheduler({ config: { seed: 99 }, logger: silentLogger() });

      a.run(100);
      b.run(100);

      expect(a.getSnapshot()).toEqual(b.getSnapshot());
      expect(a.getEventHistory()).toEqual(b.getEventHistory());
    });

    it('summarizes average energy every 100 units', () => {
      const sim = forcedHead();

      sim.run(100);

      const summaries = eventsOf(sim, 'summary');
      expect(summaries).toHaveLength(1);
      expect(summaries[0].time).toBe(100);
      expect(summaries[0].message).toMatch(/^Average node energy level: \d+\.\d{2} J$/);
    });

    it('stop halts processing until resumed', () => {
      const sim = forcedHead();
      sim.run(20);

      sim.stop();
      expect(sim.isRunning).toBe(false);
      expect(sim.run(30)).toBe(0);
      expect(sim.now).toBe(20);

      sim.resume();
      expect(sim.run(30)).toBeGreaterThan(0);
      expect(sim.now).toBe(30);
    });
  });

  // ── Failures ───────────────────────────────────────────

  describe('failures', () => {
    it('fails a drained member at the next check and stops its traffic', () => {
      const sim = forcedHead();
      sim.run(20);
      sim.drainNode(1, 96);

      sim.run(30);
      const stats = sim.getSnapshot().stats;

      expect(sim.ledger.remaining(1)).toBeCloseTo(3.2);
      expect(stats.failedCount).toBe(1);
      expect(stats.firstDeathTime).toBe(30);
      expect(stats.firstDeathRound).toBe(1);
      expect(sim.clusters.get(0)?.members).toEqual([2, 3, 4, 5, 6, 7, 8, 9]);
      expect(sim.clusters.get(0)?.backupHeadId).toBeUndefined();
      expect(eventsOf(sim, 'node_fail').map(e => e.message)).toEqual(['Node 1 has failed due to low energy']);

      sim.run(35);
      expect(sim.ledger.remaining(1)).toBeCloseTo(3.2);
    });

    it('excludes failed nodes from later rounds', () => {
      const sim = new RoundScheduler({
        config: { clusterHeadProbability: 1 },
        random: constantRandom(0),
        logger: silentLogger(),
      });
      sim.drainNode(3, 96);

      sim.run(20);

      expect([...sim.clusters.keys()]).toEqual([0, 1, 2, 4, 5, 6, 7, 8, 9]);
      expect(sim.getSnapshot().nodes[3].role).toBe('failed');
    });

    it('warns once when a node runs low', () => {
      const sim = forcedHead();
      sim.run(20);

      sim.drainNode(4, 92);
      sim.run(22);

      expect(eventsOf(sim, 'low_energy').map(e => e.message)).toEqual(['Node 4 energy level: 7.85 J']);
    });

    it('ignores drains for unknown nodes', () => {
      const sim = forcedHead();
      expect(sim.drainNode(42, 10)).toBe(false);
    });

    it('promotes the backup when its head dies', () => {
      const sim = forcedHead({ config: { promoteBackupOnHeadDeath: true } });
      sim.run(20);
      sim.drainNode(0, 96);

      sim.run(30);

      expect(sim.clusters.has(0)).toBe(false);
      expect(sim.clusters.get(1)).toEqual({ headId: 1, members: [2, 3, 4, 5, 6, 7, 8, 9] });
      expect(eventsOf(sim, 'promotion').map(e => e.message)).toEqual(['Backup 1 takes over the cluster of failed head 0']);
      expect(sim.ledger.remaining(1)).toBeCloseTo(99.2);

      sim.run(34);
      expect(sim.ledger.remaining(1)).toBeCloseTo(99.2);
      sim.run(35);
      expect(sim.ledger.remaining(1)).toBeCloseTo(99.04);
    });

    it('leaves the cluster headless without promotion', () => {
      const sim = forcedHead();
      sim.run(20);
      sim.drainNode(0, 96);

      sim.run(30);

      expect(sim.clusters.has(0)).toBe(true);
      expect(eventsOf(sim, 'promotion')).toEqual([]);
      expect(sim.getSnapshot().nodes[0].role).toBe('failed');
    });

    it('absorbs a throwing task and keeps the rest running', () => {
      const oracle = new BreakableOracle();
      const logger = silentLogger();
      const sim = new RoundScheduler({ oracle, random: forcedHeadRandom(), logger });
      sim.run(20);

      oracle.broken = 7;
      sim.run(22);

      expect(eventsOf(sim, 'error').map(e => e.message)).toEqual([
        'Error in intra:7 at t=21: position of 7 lost',
        'Error in intra:7 at t=22: position of 7 lost',
      ]);
      expect(logger.error).toHaveBeenCalledTimes(2);
      expect(sim.ledger.remaining(1)).toBeCloseTo(99.76);
    });
    it('completes a round when one node cannot be located during formation', () => {
      const oracle = new BreakableOracle();
      const sim = new RoundScheduler({ oracle, random: forcedHeadRandom(), logger: silentLogger() });
      sim.run(39);

      oracle.broken = 7;
      sim.run(45);

      expect(eventsOf(sim, 'error').map(e => e.message)).toEqual(['Error in formation:7 at t=40: position of 7 lost']);
      expect(sim.round).toBe(2);
      expect(sim.clusters.get(0)).toEqual({ headId: 0, members: [1, 2, 3, 4, 5, 6, 8, 9], backupHeadId: 1 });
      expect(sim.recorder.getInfo().totalRecorded).toBe(2);
      expect(sim.ledger.remaining(1)).toBeCloseTo(97.92);
      expect(sim.ledger.remaining(8)).toBeCloseTo(96.1);
      expect(sim.ledger.remaining(0)).toBeCloseTo(99.04);
      expect(sim.ledger.remaining(7)).toBeCloseTo(97);
    });

    it('starts the remaining tasks when one first fire throws', () => {
      const oracle = new BreakableOracle();
      const sim = new RoundScheduler({ oracle, random: forcedHeadRandom(), logger: silentLogger() });
      sim.run(39);

      oracle.broken = SINK_ID;
      sim.run(40);

      expect(eventsOf(sim, 'error').map(e => e.message)).toEqual(['Error in inter:0 at t=40: position of -1 lost']);
      expect(sim.recorder.getInfo().totalRecorded).toBe(2);
      expect(sim.ledger.remaining(1)).toBeCloseTo(98.32);
      expect(sim.ledger.remaining(0)).toBeCloseTo(99.36);
    });
  });

  // ── Energy models & profiles ───────────────────────────

  describe('energy models', () => {
    it('charges transmit and receive currents under the radio model', () => {
      const sim = forcedHead({ config: { energyModel: 'radio' } });

      sim.runRound();

      expect(sim.ledger.remaining(1)).toBeCloseTo(99.99592, 5);
      expect(sim.ledger.remaining(0)).toBeCloseTo(99.47884, 5);
    });

    it('applies the priority multiplier to every fifth node', () => {
      const sim = forcedHead({ config: { dmsProfile: 'priority' } });

      sim.runRound();

      expect(sim.ledger.remaining(5)).toBeCloseTo(99.85);
      expect(sim.ledger.remaining(6)).toBeCloseTo(99.88);
      expect(sim.ledger.remaining(0)).toBeCloseTo(99.7);
    });
  });

  // ── Reports & event log ────────────────────────────────

  describe('reporting', () => {
    it('reports only nodes that dropped 5% since their last report', () => {
      const sink = new MemoryReportSink();
      const sim = new RoundScheduler({ random: forcedHeadRandom(), logger: silentLogger(), sink });
      sim.run(20);
      sim.drainNode(2, 10);

      sim.run(50);
      const reports = sink.all();

      expect(reports).toHaveLength(1);
      expect(reports[0].time).toBe(50);
      expect(reports[0].nodeId).toBe(2);
      expect(reports[0].remainingEnergy).toBeCloseTo(86.4);
    });

    it('keeps the event log bounded', () => {
      const sim = forcedHead({ config: { maxEvents: 5 } });

      sim.runRound();

      const history = sim.getEventHistory();
      expect(history).toHaveLength(5);
      expect(history[4].message).toBe('Node 1 is backup for cluster head 0');
    });

    it('passes tagged lines to the logger', () => {
      const logger = silentLogger();
      const sim = new RoundScheduler({ random: forcedHeadRandom(), logger });

      sim.runRound();

      expect(logger.info).toHaveBeenCalledWith('[ROUND] Node 0 elected as cluster head with energy: 100.00');
    });
  });
});
