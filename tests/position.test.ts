import { describe, it, expect } from 'vitest';
import { GridPositionOracle, diagonalLayout } from '../src/position';
import { constantRandom, xorshift32 } from '../src/random';
import { UnknownNodeError } from '../src/errors';
import { SINK_ID } from '../src/types';

describe('GridPositionOracle', () => {
  it('places node i at (10i, 10i) on the diagonal layout', () => {
    const oracle = new GridPositionOracle(diagonalLayout(10));

    expect(oracle.positionOf(3)).toEqual({ x: 30, y: 30 });
    expect(oracle.distance(0, 1)).toBeCloseTo(14.142, 3);
    expect(oracle.distance(0, 9)).toBeCloseTo(127.279, 3);
  });

  it('measures distance to the sink', () => {
    const oracle = new GridPositionOracle(diagonalLayout(3), { x: 0, y: 20 });

    expect(oracle.distance(0, SINK_ID)).toBe(20);
    expect(oracle.distance(2, SINK_ID)).toBe(20);
  });

  it('throws for unknown nodes', () => {
    const oracle = new GridPositionOracle(diagonalLayout(2));

    expect(() => oracle.distance(0, 5)).toThrow(UnknownNodeError);
    expect(oracle.positionOf(5)).toBeUndefined();
  });

  it('copies positions in and out', () => {
    const pos = { x: 1, y: 2 };
    const oracle = new GridPositionOracle([[0, pos]]);
    pos.x = 50;

    const out = oracle.positionOf(0);
    expect(out).toEqual({ x: 1, y: 2 });
  });
});

describe('random sources', () => {
  it('xorshift32 replays the same sequence for the same seed', () => {
    const a = xorshift32(42);
    const b = xorshift32(42);
    const seqA = Array.from({ length: 10 }, () => a());
    const seqB = Array.from({ length: 10 }, () => b());

    expect(seqA).toEqual(seqB);
  });

  it('xorshift32 differs between seeds and stays in [0, 1)', () => {
    const a = xorshift32(1);
    const b = xorshift32(2);
    const seqA = Array.from({ length: 100 }, () => a());
    const seqB = Array.from({ length: 100 }, () => b());

    expect(seqA).not.toEqual(seqB);
    for (const v of [...seqA, ...seqB]) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('a zero seed still produces samples', () => {
    const r = xorshift32(0);
    expect(r()).not.toBe(0);
  });

  it('constantRandom always returns its value', () => {
    const r = constantRandom(0.25);
    expect([r(), r(), r()]).toEqual([0.25, 0.25, 0.25]);
  });
});
