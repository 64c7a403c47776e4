/* random.ts — Seedable PRNG so elections replay deterministically */

import type { RandomSource } from './types';

/** xorshift32 generator yielding samples in [0, 1) */
export function xorshift32(seed: number): RandomSource {
  let state = seed | 0 || 0x9e3779b9;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

/** Always returns the same sample — handy for forcing or blocking elections */
export function constantRandom(value: number): RandomSource {
  return () => value;
}
