/* event-queue.ts — Discrete-event queue: timestamp order, FIFO among equal timestamps */

export type EventCallback = () => void;

export interface EventHandle {
  readonly time: number;
  cancel(): void;
  readonly cancelled: boolean;
}

interface ScheduledEvent {
  time: number;
  seq: number;
  label: string;
  callback: EventCallback;
  cancelled: boolean;
}

/** (time, seq) ordering — seq breaks ties in enqueue order */
function before(a: ScheduledEvent, b: ScheduledEvent): boolean {
  return a.time < b.time || (a.time === b.time && a.seq < b.seq);
}

/** Binary min-heap over scheduled events */
class EventHeap {
  private readonly data: ScheduledEvent[] = [];

  get size(): number { return this.data.length; }

  peek(): ScheduledEvent | undefined { return this.data[0]; }

  push(event: ScheduledEvent): void {
    this.data.push(event);
    this.bubbleUp(this.data.length - 1);
  }

  pop(): ScheduledEvent | undefined {
    const top = this.data[0];
    const last = this.data.pop();
    if (last && this.data.length > 0) {
      this.data[0] = last;
      this.sinkDown(0);
    }
    return top;
  }

  clear(): void { this.data.length = 0; }

  private bubbleUp(i: number): void {
    const node = this.data[i];
    while (i > 0) {
      const parentIdx = (i - 1) >> 1;
      if (!before(node, this.data[parentIdx])) break;
      this.data[i] = this.data[parentIdx];
      i = parentIdx;
    }
    this.data[i] = node;
  }

  private sinkDown(i: number): void {
    const length = this.data.length;
    const node = this.data[i];
    while (true) {
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      let smallest = i;

      if (left < length && before(this.data[left], this.data[smallest])) {
        smallest = left;
      }
      if (right < length && before(this.data[right], this.data[smallest])) {
        smallest = right;
      }
      if (smallest === i) break;
      this.data[i] = this.data[smallest];
      this.data[smallest] = node;
      i = smallest;
    }
  }
}

export type EventErrorHandler = (err: unknown, label: string, time: number) => void;

/**
 * Single-threaded simulation clock. Each callback runs to completion; one
 * that throws is reported to `onError` and the loop moves on.
 */
export class EventQueue {
  private readonly heap = new EventHeap();
  private seq = 0;
  private clock = 0;
  private stopRequested = false;

  constructor(private readonly onError?: EventErrorHandler) {}

  get now(): number { return this.clock; }

  /** Events waiting to fire, including cancelled ones not yet drained */
  get pending(): number { return this.heap.size; }

  schedule(delay: number, callback: EventCallback, label = 'event'): EventHandle {
    if (!Number.isFinite(delay) || delay < 0) {
      throw new RangeError(`Event delay must be a non-negative number, got ${delay}`);
    }
    return this.enqueue(this.clock + delay, callback, label);
  }

  scheduleAt(time: number, callback: EventCallback, label = 'event'): EventHandle {
    if (!Number.isFinite(time) || time < this.clock) {
      throw new RangeError(`Cannot schedule at ${time}, clock is already at ${this.clock}`);
    }
    return this.enqueue(time, callback, label);
  }

  /** External stop signal — the running loop returns after the current event */
  stop(): void {
    this.stopRequested = true;
  }

  /**
   * Run every event with time ≤ endTime. The clock ends at endTime unless a
   * stop was requested. Returns the number of callbacks executed.
   */
  runUntil(endTime: number): number {
    this.stopRequested = false;
    let executed = 0;

    while (!this.stopRequested) {
      const next = this.heap.peek();
      if (!next || next.time > endTime) break;
      this.heap.pop();
      if (next.cancelled) continue;
      this.clock = next.time;
      this.execute(next);
      executed++;
    }

    if (!this.stopRequested && endTime > this.clock) {
      this.clock = endTime;
    }
    return executed;
  }

  clear(): void {
    this.heap.clear();
  }

  private enqueue(time: number, callback: EventCallback, label: string): EventHandle {
    const event: ScheduledEvent = { time, seq: this.seq++, label, callback, cancelled: false };
    this.heap.push(event);
    return {
      time,
      cancel: () => { event.cancelled = true; },
      get cancelled() { return event.cancelled; },
    };
  }

  private execute(event: ScheduledEvent): void {
    try {
      event.callback();
    } catch (err) {
      if (!this.onError) throw err;
      this.onError(err, event.label, event.time);
    }
  }
}
