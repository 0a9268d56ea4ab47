// src/item-binder.ts — Binds the capped task list onto recycled slots

import type { ActionDispatcher } from './action-controller';
import type { RecentsEventBus } from './event-bus';
import { TaskHolder } from './task-holder';
import type { SlotInflater, TaskItemView } from './task-item-view';
import type { TaskSource } from './task-source';
import type { EnrichmentKind } from './types';

export const DEFAULT_MAX_VISIBLE = 6;

export interface ItemBinderOptions {
  maxVisible?: number;
}

/**
 * Decides what each slot shows; the hosting runtime decides which slots exist.
 *
 * Enrichment completions capture the record key at request time and write
 * into the slot only if the slot is still bound to that key when they run.
 * Completions for a slot that has since been rebound are dropped, and the
 * load is not reissued if the slot later returns to the original record.
 * All calls, completions included, must come from the UI executor.
 */
export class ItemBinder {
  readonly maxVisible: number;
  private source: TaskSource;
  private dispatcher: ActionDispatcher;
  private bus: RecentsEventBus;
  private showingLoadingUi = false;
  // Task key → attached slot
  private attachedByKey = new Map<number, TaskHolder>();
  private attachedHolders = new Set<TaskHolder>();

  constructor(source: TaskSource, dispatcher: ActionDispatcher, bus: RecentsEventBus, options: ItemBinderOptions = {}) {
    this.source = source;
    this.dispatcher = dispatcher;
    this.bus = bus;
    this.maxVisible = options.maxVisible ?? DEFAULT_MAX_VISIBLE;
  }

  /**
   * Switches every position to the loading visual, or back to real data.
   * Already bound slots are untouched; the caller asks the host to rebind.
   */
  setLoadingMode(enabled: boolean): void {
    if (this.showingLoadingUi === enabled) return;
    this.showingLoadingUi = enabled;
    this.bus.emit('mode:loading', enabled);
  }

  get loadingMode(): boolean {
    return this.showingLoadingUi;
  }

  count(): number {
    if (this.showingLoadingUi) {
      // Show loading version of all items.
      return this.maxVisible;
    }
    return Math.min(this.source.currentList().length, this.maxVisible);
  }

  /** Wraps freshly inflated visuals in a slot whose activation launches its current task */
  createSlot<V extends TaskItemView>(inflater: SlotInflater<V>): TaskHolder<V> {
    const holder = new TaskHolder<V>(inflater.inflate());
    holder.itemView.setOnActivate(() => this.dispatcher.launch(holder));
    this.bus.emit('slot:created', holder.id);
    return holder;
  }

  bind(holder: TaskHolder, position: number): void {
    if (this.showingLoadingUi) {
      this.unindex(holder);
      holder.bindEmptyUi();
      this.bus.emit('slot:placeholder', holder.id, position);
      return;
    }

    const tasks = this.source.currentList();
    if (position >= tasks.length) {
      // Task list has updated since count() was read.
      this.bus.emit('bind:stale-position', holder.id, position, tasks.length);
      return;
    }

    const task = tasks[position];
    const token = task.key;
    this.unindex(holder);
    holder.bindTask(task);
    if (this.attachedHolders.has(holder)) {
      this.attachedByKey.set(task.key, holder);
    }
    this.bus.emit('slot:bound', holder.id, task.key, position);

    this.source.loadIconAndLabel(task, () => {
      if (!this.stillBound(holder, token, 'icon-label')) return;
      holder.itemView.setIcon(task.icon);
      holder.itemView.setLabel(task.label);
      this.bus.emit('enrichment:applied', holder.id, task.key, 'icon-label');
    });
    this.source.loadThumbnail(task, () => {
      if (!this.stillBound(holder, token, 'thumbnail')) return;
      holder.itemView.setThumbnail(task.thumbnail);
      this.bus.emit('enrichment:applied', holder.id, task.key, 'thumbnail');
    });
  }

  onSlotAttached(holder: TaskHolder): void {
    this.attachedHolders.add(holder);
    const task = holder.getTask();
    if (!task) return;
    this.attachedByKey.set(task.key, holder);
    this.bus.emit('slot:attached', holder.id, task.key);
  }

  onSlotDetached(holder: TaskHolder): void {
    this.attachedHolders.delete(holder);
    const task = holder.getTask();
    if (!task) return;
    this.unindex(holder);
    this.bus.emit('slot:detached', holder.id, task.key);
  }

  /** The attached slot showing the task with this key, if any */
  lookupAttachedSlot(key: number): TaskHolder | undefined {
    return this.attachedByKey.get(key);
  }

  private stillBound(holder: TaskHolder, token: number, kind: EnrichmentKind): boolean {
    if (holder.getTask()?.key === token) return true;
    this.bus.emit('enrichment:dropped', holder.id, token, kind);
    return false;
  }

  // Drops the holder's current key from the index, unless another slot has since claimed it.
  // Another attached slot still showing that key takes the entry over.
  private unindex(holder: TaskHolder): void {
    const task = holder.getTask();
    if (!task || this.attachedByKey.get(task.key) !== holder) return;
    this.attachedByKey.delete(task.key);
    for (const other of this.attachedHolders) {
      if (other !== holder && other.getTask()?.key === task.key) {
        this.attachedByKey.set(task.key, other);
        return;
      }
    }
  }
}
