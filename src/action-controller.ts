// src/action-controller.ts — User actions on slots: launch, dismiss, clear

import type { RecentsEventBus } from './event-bus';
import { DEFAULT_MAX_VISIBLE } from './item-binder';
import type { TaskHolder } from './task-holder';
import type { RecentsLoader } from './task-list-loader';
import type { TaskRecord } from './types';

/** Receives the launch gesture for a slot */
export interface ActionDispatcher {
  launch(holder: TaskHolder): void;
}

export type ListChangedHook = (reason: 'launched' | 'dismissed' | 'cleared') => void;

export interface ActionControllerOptions {
  /** How many launches `launchHistory` keeps */
  historyLimit?: number;
}

export class TaskActionController implements ActionDispatcher {
  private loader: RecentsLoader;
  private bus: RecentsEventBus;
  private launched: TaskRecord[] = [];
  private historyLimit: number;
  private onListChanged: ListChangedHook | null;

  constructor(
    loader: RecentsLoader,
    bus: RecentsEventBus,
    onListChanged: ListChangedHook | null = null,
    options: ActionControllerOptions = {},
  ) {
    this.loader = loader;
    this.bus = bus;
    this.onListChanged = onListChanged;
    this.historyLimit = options.historyLimit ?? DEFAULT_MAX_VISIBLE;
  }

  /** Hook the host uses to rebind after the list changes */
  setListChangedHook(hook: ListChangedHook | null): void {
    this.onListChanged = hook;
  }

  /** Launches whatever the slot shows right now; placeholder slots do nothing */
  launch(holder: TaskHolder): void {
    const task = holder.getTask();
    if (!task) return;
    this.launched.push(task);
    if (this.launched.length > this.historyLimit) this.launched.shift();
    this.loader.moveToFront(task.key);
    this.bus.emit('task:launched', task.key, task.packageName);
    this.onListChanged?.('launched');
  }

  dismiss(holder: TaskHolder): void {
    const task = holder.getTask();
    if (!task || !this.loader.removeTask(task.key)) return;
    this.bus.emit('task:dismissed', task.key);
    this.onListChanged?.('dismissed');
  }

  clearAll(): void {
    const removed = this.loader.clearAllTasks();
    this.bus.emit('task:cleared', removed);
    this.onListChanged?.('cleared');
  }

  /** The latest launches, oldest first */
  get launchHistory(): readonly TaskRecord[] {
    return this.launched;
  }
}
