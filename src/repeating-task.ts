/* repeating-task.ts — Cancellable self-rescheduling actions keyed by (nodeId, role) */

import type { EventHandle, EventQueue } from './event-queue';
import type { NodeId, Role } from './types';

export class CancellationToken {
  private isCancelled = false;

  get cancelled(): boolean { return this.isCancelled; }

  cancel(): void {
    this.isCancelled = true;
  }
}

/**
 * Fires `action` every `interval` until its token is cancelled. The token is
 * checked at the top of every fire, before anything is re-enqueued.
 */
export class RepeatingTask {
  readonly token = new CancellationToken();
  private fires = 0;
  private pending: EventHandle | null = null;

  constructor(
    private readonly queue: EventQueue,
    readonly interval: number,
    private readonly action: (fireCount: number) => void,
    private readonly label = 'task',
  ) {}

  get fireCount(): number { return this.fires; }

  /** First fire after `firstDelay` */
  start(firstDelay = this.interval): void {
    this.scheduleNext(firstDelay);
  }

  /** First fire right now, inside the caller's event */
  startNow(): void {
    this.fire();
  }

  cancel(): void {
    this.token.cancel();
    this.pending?.cancel();
    this.pending = null;
  }

  private fire(): void {
    this.pending = null;
    if (this.token.cancelled) return;
    this.fires++;
    try {
      this.action(this.fires);
    } finally {
      if (!this.token.cancelled) this.scheduleNext(this.interval);
    }
  }

  private scheduleNext(delay: number): void {
    this.pending = this.queue.schedule(delay, () => this.fire(), this.label);
  }
}

export type TaskRole = Role | 'round' | 'failure-check' | 'report' | 'summary';

function taskKey(nodeId: NodeId, role: TaskRole): string {
  return `${role}:${nodeId}`;
}

/** Live repeating tasks, at most one per (nodeId, role) */
export class TaskRegistry {
  private readonly tasks = new Map<string, RepeatingTask>();

  get size(): number { return this.tasks.size; }

  /** Register a task, cancelling whatever held the same key */
  add(nodeId: NodeId, role: TaskRole, task: RepeatingTask): RepeatingTask {
    const key = taskKey(nodeId, role);
    this.tasks.get(key)?.cancel();
    this.tasks.set(key, task);
    return task;
  }

  get(nodeId: NodeId, role: TaskRole): RepeatingTask | undefined {
    return this.tasks.get(taskKey(nodeId, role));
  }

  has(nodeId: NodeId, role: TaskRole): boolean {
    const task = this.tasks.get(taskKey(nodeId, role));
    return task !== undefined && !task.token.cancelled;
  }

  cancel(nodeId: NodeId, role: TaskRole): void {
    const key = taskKey(nodeId, role);
    this.tasks.get(key)?.cancel();
    this.tasks.delete(key);
  }

  /** Cancel both communication roles of a node */
  cancelNode(nodeId: NodeId): void {
    this.cancel(nodeId, 'member');
    this.cancel(nodeId, 'head');
  }

  /** Cancel every task whose role is in `roles` */
  cancelRoles(roles: readonly TaskRole[]): void {
    for (const [key, task] of this.tasks) {
      if (roles.some(r => key.startsWith(`${r}:`))) {
        task.cancel();
        this.tasks.delete(key);
      }
    }
  }

  cancelAll(): void {
    for (const task of this.tasks.values()) task.cancel();
    this.tasks.clear();
  }
}
