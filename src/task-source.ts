// src/task-source.ts — Contract between the binder and whatever supplies task data

import type { TaskRecord } from './types';

/**
 * Supplies recent tasks and enriches them asynchronously.
 *
 * Loads write their results onto the record itself before `onComplete`
 * runs, and `onComplete` must be invoked on the UI executor. A load that
 * fails is resolved by the source (default icon, package name as label);
 * the binder has no failure channel and never times out a load.
 */
export interface TaskSource {
  /** Snapshot of the current list, most recent first; may change between calls */
  currentList(): readonly TaskRecord[];
  loadIconAndLabel(record: TaskRecord, onComplete: () => void): void;
  loadThumbnail(record: TaskRecord, onComplete: () => void): void;
}
