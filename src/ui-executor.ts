// src/ui-executor.ts — Single logical thread for binder state and completions

import type { RecentsEventBus } from './event-bus';

export type UiTask = () => void;
export type DrainScheduler = (drain: () => void) => void;

/**
 * Serializes every mutation of slot bindings and the attachment index.
 *
 * Task sources may do their work anywhere, but completions must be posted
 * here. The binder's stale-completion check relies on this ordering and
 * holds no locks of its own.
 */
export class UiExecutor {
  private queue: UiTask[] = [];
  private drainScheduled = false;
  private schedule: DrainScheduler;
  private bus: RecentsEventBus | null;

  constructor(bus: RecentsEventBus | null = null, schedule: DrainScheduler = (drain) => { setImmediate(drain); }) {
    this.bus = bus;
    this.schedule = schedule;
  }

  /** Queue a task; a drain is scheduled if none is pending */
  post(task: UiTask): void {
    this.queue.push(task);
    this.scheduleDrain();
  }

  /** Run queued tasks until the queue is empty, including ones posted meanwhile */
  flush(): number {
    this.drainScheduled = false;
    let ran = 0;
    while (this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) break;
      ran++;
      try {
        task();
      } catch (err) {
        if (!this.bus) {
          // Whatever is still queued runs on the next drain
          this.scheduleDrain();
          throw err;
        }
        this.bus.emit('executor:error', err instanceof Error ? err.message : String(err));
      }
    }
    return ran;
  }

  get pending(): number {
    return this.queue.length;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled || this.queue.length === 0) return;
    this.drainScheduled = true;
    this.schedule(() => {
      this.flush();
    });
  }
}
