// src/task-holder.ts — A reusable slot: one view plus the record it currently shows

import type { TaskItemView } from './task-item-view';
import type { TaskRecord } from './types';

let nextSlotId = 1;

export class TaskHolder<V extends TaskItemView = TaskItemView> {
  readonly id: number;
  readonly itemView: V;
  private task: TaskRecord | null = null;

  constructor(itemView: V) {
    this.id = nextSlotId++;
    this.itemView = itemView;
  }

  /** The record this slot is bound to, or null for an unbound or placeholder slot */
  getTask(): TaskRecord | null {
    return this.task;
  }

  /** Binds to a record and shows placeholder visuals until enrichment arrives */
  bindTask(task: TaskRecord): void {
    this.task = task;
    this.itemView.resetToEmptyUi();
  }

  /** Shows the loading visual with no record behind it */
  bindEmptyUi(): void {
    this.task = null;
    this.itemView.resetToEmptyUi();
  }
}
