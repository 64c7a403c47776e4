/* energy-ledger.ts — Per-node remaining energy, the single source of truth for liveness */

import type { EnergyAccount, NodeId } from './types';
import { UnknownNodeError } from './errors';
import { DEFAULT_RADIO } from './config';

interface EnergyEntry {
  remaining: number;
  capacity: number;
}

/**
 * Manual energy accounting. `drain` amounts are energy units.
 *
 * Unknown ids are tolerated everywhere except `require`: drains are
 * ignored and `remaining` answers `undefined`.
 */
export class EnergyLedger implements EnergyAccount {
  protected readonly entries = new Map<NodeId, EnergyEntry>();

  initialize(nodeIds: Iterable<NodeId>, capacity: number): void {
    const cap = Math.max(0, capacity);
    for (const id of nodeIds) {
      this.entries.set(id, { remaining: cap, capacity: cap });
    }
  }

  drain(nodeId: NodeId, amount: number): void {
    this.consume(nodeId, amount);
  }

  remaining(nodeId: NodeId): number | undefined {
    return this.entries.get(nodeId)?.remaining;
  }

  /** Strict lookup for callers that cannot continue without the node */
  require(nodeId: NodeId): number {
    const entry = this.entries.get(nodeId);
    if (!entry) throw new UnknownNodeError(nodeId);
    return entry.remaining;
  }

  capacity(nodeId: NodeId): number | undefined {
    return this.entries.get(nodeId)?.capacity;
  }

  has(nodeId: NodeId): boolean {
    return this.entries.has(nodeId);
  }

  nodeIds(): NodeId[] {
    return [...this.entries.keys()];
  }

  get size(): number { return this.entries.size; }

  totalRemaining(): number {
    let total = 0;
    for (const entry of this.entries.values()) total += entry.remaining;
    return total;
  }

  averageRemaining(): number {
    return this.entries.size > 0 ? this.totalRemaining() / this.entries.size : 0;
  }

  snapshot(): Array<{ nodeId: NodeId; remaining: number; capacity: number }> {
    return [...this.entries].map(([nodeId, e]) => ({ nodeId, remaining: e.remaining, capacity: e.capacity }));
  }

  /** Remove raw energy units, bypassing any strategy conversion */
  consume(nodeId: NodeId, joules: number): void {
    const entry = this.entries.get(nodeId);
    if (!entry) return;
    if (!Number.isFinite(joules) || joules <= 0) return;
    entry.remaining = Math.max(0, entry.remaining - joules);
  }
}

export interface RadioEnergyParams {
  txCurrentA: number;
  rxCurrentA: number;
  supplyVoltageV: number;
  txDurationS: number;
}

/**
 * Delegated radio model: a drain is a transmission at `amount` power-level
 * units, converted to joules through the transmit current draw.
 */
export class RadioEnergyLedger extends EnergyLedger {
  private readonly params: RadioEnergyParams;

  constructor(params: Partial<RadioEnergyParams> = {}) {
    super();
    this.params = { ...DEFAULT_RADIO, ...params };
  }

  drain(nodeId: NodeId, amount: number): void {
    this.consume(nodeId, this.transmitJoules(amount));
  }

  /** Charge the receive current for `durationS` seconds (one transmit slot by default) */
  chargeReceive(nodeId: NodeId, durationS = this.params.txDurationS): void {
    this.consume(nodeId, this.params.rxCurrentA * this.params.supplyVoltageV * durationS);
  }

  transmitJoules(amount: number): number {
    const { txCurrentA, supplyVoltageV, txDurationS } = this.params;
    return amount * txCurrentA * supplyVoltageV * txDurationS;
  }
}
