// src/recycler-host.ts — Slot pool and visible window, driving the binder

import type { ItemBinder } from './item-binder';
import type { TaskHolder } from './task-holder';
import type { SlotInflater, TaskItemView } from './task-item-view';

export interface VisibleSlot<V extends TaskItemView> {
  position: number;
  holder: TaskHolder<V>;
}

/**
 * Stands in for the list virtualization runtime: it decides which positions
 * are on screen, recycles slots that scroll away and asks the binder to fill
 * them. Slot content is always the binder's call.
 */
export class RecyclerHost<V extends TaskItemView = TaskItemView> {
  private binder: ItemBinder;
  private inflater: SlotInflater<V>;
  private viewportSize: number;
  private offset = 0;
  // window[i] shows position offset + i
  private window: TaskHolder<V>[] = [];
  private scrap: TaskHolder<V>[] = [];
  private created = 0;

  constructor(binder: ItemBinder, inflater: SlotInflater<V>, viewportSize: number) {
    this.binder = binder;
    this.inflater = inflater;
    this.viewportSize = viewportSize;
  }

  /** Fills the window from the current offset, creating slots only when scrap is empty */
  layout(): void {
    this.offset = this.clampOffset(this.offset);
    const wanted = this.windowLength();
    while (this.window.length > wanted) {
      this.recycleLast();
    }
    while (this.window.length < wanted) {
      this.window.push(this.obtain(this.offset + this.window.length));
    }
  }

  /** Moves the window; returns how many positions it actually moved */
  scrollBy(delta: number): number {
    const next = this.clampOffset(this.offset + delta);
    const moved = next - this.offset;
    if (moved === 0) return 0;

    if (Math.abs(moved) >= this.window.length) {
      while (this.window.length > 0) this.recycleLast();
      this.offset = next;
      this.layout();
      return moved;
    }

    if (moved > 0) {
      for (let i = 0; i < moved; i++) {
        const holder = this.window.shift();
        if (holder) this.recycle(holder);
      }
      this.offset = next;
      this.layout();
    } else {
      for (let i = 0; i < -moved; i++) this.recycleLast();
      this.offset = next;
      const entering: TaskHolder<V>[] = [];
      for (let i = 0; i < -moved; i++) {
        entering.push(this.obtain(this.offset + i));
      }
      this.window.unshift(...entering);
    }
    return moved;
  }

  /** Rebinds every visible slot in place, then trims or grows the window */
  notifyDataSetChanged(): void {
    this.offset = this.clampOffset(this.offset);
    const wanted = this.windowLength();
    while (this.window.length > wanted) {
      this.recycleLast();
    }
    this.window.forEach((holder, i) => {
      this.binder.bind(holder, this.offset + i);
    });
    this.layout();
  }

  visibleSlots(): VisibleSlot<V>[] {
    return this.window.map((holder, i) => ({ position: this.offset + i, holder }));
  }

  get scrollOffset(): number {
    return this.offset;
  }

  get scrapSize(): number {
    return this.scrap.length;
  }

  get slotsCreated(): number {
    return this.created;
  }

  private obtain(position: number): TaskHolder<V> {
    let holder = this.scrap.pop();
    if (!holder) {
      holder = this.binder.createSlot(this.inflater);
      this.created++;
    }
    this.binder.bind(holder, position);
    this.binder.onSlotAttached(holder);
    return holder;
  }

  private recycle(holder: TaskHolder<V>): void {
    this.binder.onSlotDetached(holder);
    this.scrap.push(holder);
  }

  private recycleLast(): void {
    const holder = this.window.pop();
    if (holder) this.recycle(holder);
  }

  private windowLength(): number {
    return Math.max(0, Math.min(this.viewportSize, this.binder.count() - this.offset));
  }

  private clampOffset(offset: number): number {
    const maxOffset = Math.max(0, this.binder.count() - this.viewportSize);
    return Math.max(0, Math.min(maxOffset, offset));
  }
}
