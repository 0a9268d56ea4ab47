// src/task-list-loader.ts — In-process task source with cached, delayed enrichment

import type { RecentsEventBus } from './event-bus';
import { DEFAULT_ICON } from './task-item-view';
import type { TaskSource } from './task-source';
import type { UiExecutor } from './ui-executor';
import type { TaskCatalogEntry, TaskIcon, TaskRecord, Thumbnail } from './types';

export interface LoaderOptions {
  /** Simulated background time per uncached load; 0 completes on the next drain */
  latencyMs?: number;
}

interface IconAndLabel {
  icon: TaskIcon;
  label: string;
}

function byRecency(a: TaskRecord, b: TaskRecord): number {
  return b.lastActiveTime - a.lastActiveTime;
}

export class RecentsLoader implements TaskSource {
  private catalog = new Map<number, TaskCatalogEntry>();
  private tasks: TaskRecord[] = [];
  private iconCache = new Map<number, IconAndLabel>();
  private thumbnailCache = new Map<number, Thumbnail>();
  private timers = new Set<ReturnType<typeof setTimeout>>();
  private executor: UiExecutor;
  private bus: RecentsEventBus;
  private latencyMs: number;

  constructor(entries: TaskCatalogEntry[], executor: UiExecutor, bus: RecentsEventBus, options: LoaderOptions = {}) {
    this.executor = executor;
    this.bus = bus;
    this.latencyMs = options.latencyMs ?? 0;
    this.refresh(entries);
  }

  currentList(): readonly TaskRecord[] {
    return this.tasks;
  }

  /**
   * Rebuilds the list from the catalog, or from `entries` when given.
   * Records whose key survives keep their identity and loaded fields.
   */
  refresh(entries?: TaskCatalogEntry[]): void {
    if (entries) {
      this.catalog = new Map(entries.map((e) => [e.id, { ...e }]));
      for (const key of new Set([...this.iconCache.keys(), ...this.thumbnailCache.keys()])) {
        if (!this.catalog.has(key)) this.evict(key);
      }
    }

    const existing = new Map(this.tasks.map((t) => [t.key, t]));
    const next: TaskRecord[] = [];
    for (const entry of this.catalog.values()) {
      const kept = existing.get(entry.id);
      if (kept) {
        kept.lastActiveTime = entry.lastActiveTime;
        next.push(kept);
      } else {
        next.push({
          key: entry.id,
          packageName: entry.packageName,
          lastActiveTime: entry.lastActiveTime,
          icon: null,
          label: null,
          thumbnail: null,
        });
      }
    }
    this.tasks = next.sort(byRecency);
    this.bus.emit('list:refreshed', this.tasks.length);
  }

  /** Marks a task as the most recently used one */
  moveToFront(key: number): void {
    const entry = this.catalog.get(key);
    if (!entry || this.tasks[0]?.key === key) return;
    const newest = this.tasks.reduce((max, t) => Math.max(max, t.lastActiveTime), 0);
    entry.lastActiveTime = newest + 1;
    this.refresh();
  }

  removeTask(key: number): boolean {
    if (!this.catalog.delete(key)) return false;
    this.evict(key);
    this.refresh();
    return true;
  }

  /** Removes every task; returns how many were removed */
  clearAllTasks(): number {
    const removed = this.catalog.size;
    this.catalog.clear();
    this.iconCache.clear();
    this.thumbnailCache.clear();
    this.refresh();
    return removed;
  }

  loadIconAndLabel(record: TaskRecord, onComplete: () => void): void {
    const cached = this.iconCache.get(record.key);
    if (cached) {
      this.executor.post(() => {
        record.icon = cached.icon;
        record.label = cached.label;
        onComplete();
      });
      return;
    }

    this.inBackground(() => {
      const entry = this.catalog.get(record.key);
      const loaded: IconAndLabel = entry
        ? { icon: entry.icon, label: entry.label }
        : { icon: DEFAULT_ICON, label: record.packageName };
      if (entry) this.iconCache.set(record.key, loaded);
      record.icon = loaded.icon;
      record.label = loaded.label;
      onComplete();
    });
  }

  loadThumbnail(record: TaskRecord, onComplete: () => void): void {
    const cached = this.thumbnailCache.get(record.key);
    if (cached) {
      this.executor.post(() => {
        record.thumbnail = cached;
        onComplete();
      });
      return;
    }

    this.inBackground(() => {
      const entry = this.catalog.get(record.key);
      const loaded: Thumbnail = { lines: entry ? [...entry.preview] : [] };
      if (entry) this.thumbnailCache.set(record.key, loaded);
      record.thumbnail = loaded;
      onComplete();
    });
  }

  /** Loads still waiting on their simulated latency */
  get inFlight(): number {
    return this.timers.size;
  }

  /** Cancels pending background work; their completions never fire */
  dispose(): void {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
  }

  private inBackground(work: () => void): void {
    if (this.latencyMs <= 0) {
      this.executor.post(work);
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.executor.post(work);
    }, this.latencyMs);
    this.timers.add(timer);
  }

  private evict(key: number): void {
    this.iconCache.delete(key);
    this.thumbnailCache.delete(key);
  }
}
