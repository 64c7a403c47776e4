/**
 * recorder.ts — Ring-buffer snapshot recorder for replay
 *
 * Stores the snapshot taken at the end of each clustering round so
 * observers can replay the cluster history by round range.
 */

import type { SimSnapshot } from './types';

export interface RecordedFrame {
  round: number;
  time: number;
  snapshot: SimSnapshot;
}

const MAX_FRAMES = 3000;

export class Recorder {
  private frames: RecordedFrame[] = [];
  private writeIndex = 0;
  private totalRecorded = 0;

  constructor(private readonly maxFrames = MAX_FRAMES) {}

  record(snapshot: SimSnapshot): void {
    const frame: RecordedFrame = {
      round: snapshot.round,
      time: snapshot.time,
      snapshot,
    };

    if (this.frames.length < this.maxFrames) {
      this.frames.push(frame);
    } else {
      this.frames[this.writeIndex] = frame;
    }

    this.writeIndex = (this.writeIndex + 1) % this.maxFrames;
    this.totalRecorded++;
  }

  getRange(fromRound: number, toRound: number): RecordedFrame[] {
    return this.frames
      .filter(f => f.round >= fromRound && f.round <= toRound)
      .sort((a, b) => a.round - b.round);
  }

  /** Cluster layout in effect at sim time `time`: the latest round started at or before it */
  frameAt(time: number): RecordedFrame | undefined {
    let best: RecordedFrame | undefined;
    for (const frame of this.frames) {
      if (frame.time > time) continue;
      if (!best || frame.round > best.round) best = frame;
    }
    return best;
  }

  getRecent(count: number): RecordedFrame[] {
    const sorted = [...this.frames].sort((a, b) => a.round - b.round);
    return sorted.slice(-count);
  }

  getInfo(): { totalRecorded: number; bufferedFrames: number; oldestRound: number; newestRound: number } {
    if (this.frames.length === 0) {
      return { totalRecorded: 0, bufferedFrames: 0, oldestRound: 0, newestRound: 0 };
    }
    const sorted = [...this.frames].sort((a, b) => a.round - b.round);
    return {
      totalRecorded: this.totalRecorded,
      bufferedFrames: this.frames.length,
      oldestRound: sorted[0].round,
      newestRound: sorted[sorted.length - 1].round,
    };
  }

  clear(): void {
    this.frames = [];
    this.writeIndex = 0;
    this.totalRecorded = 0;
  }
}
