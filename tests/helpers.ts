import { vi } from 'vitest';
import type { RandomSource, SimLogger } from '../src/types';

export function silentLogger(): SimLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Replays `samples` in order, then keeps returning `rest` */
export function sequenceRandom(samples: number[], rest = 0.99): RandomSource {
  let i = 0;
  return () => (i < samples.length ? samples[i++] : rest);
}

/** With 10 nodes, node 0 draws 0 every round and everyone else 0.99 */
export function forcedHeadRandom(nodeCount = 10): RandomSource {
  let i = 0;
  return () => (i++ % nodeCount === 0 ? 0 : 0.99);
}
