// src/recents.ts — Wire bus, executor, loader, controller, binder and host together

import { TaskActionController } from './action-controller';
import { loadCatalog } from './catalog';
import type { RecentsConfig } from './config';
import { RecentsEventBus } from './event-bus';
import { ItemBinder } from './item-binder';
import { RecyclerHost } from './recycler-host';
import { textInflater } from './task-item-view';
import type { TextTaskItemView } from './task-item-view';
import { RecentsLoader } from './task-list-loader';
import type { TaskCatalogEntry } from './types';
import { UiExecutor } from './ui-executor';
import type { DrainScheduler } from './ui-executor';

export interface Recents {
  bus: RecentsEventBus;
  executor: UiExecutor;
  loader: RecentsLoader;
  controller: TaskActionController;
  binder: ItemBinder;
  host: RecyclerHost<TextTaskItemView>;
  /** Toggles placeholder mode and rebinds the visible window */
  setLoadingMode(enabled: boolean): void;
  /** Re-reads the catalog, restoring dismissed tasks, and rebinds */
  reload(): void;
  /** Resolves once no load is waiting on latency and the executor queue is empty */
  whenIdle(pollMs?: number): Promise<void>;
  dispose(): void;
}

export interface RecentsDeps {
  entries?: TaskCatalogEntry[];
  schedule?: DrainScheduler;
}

export function createRecents(config: RecentsConfig, deps: RecentsDeps = {}): Recents {
  const bus = new RecentsEventBus({ logPath: config.logPath ?? undefined });
  const executor = new UiExecutor(bus, deps.schedule);
  const readEntries = (): TaskCatalogEntry[] => deps.entries ?? loadCatalog(config.catalogPath);
  const entries = readEntries();
  const loader = new RecentsLoader(entries, executor, bus, { latencyMs: config.latencyMs });
  const controller = new TaskActionController(loader, bus, null, { historyLimit: config.maxVisible });
  const binder = new ItemBinder(loader, controller, bus, { maxVisible: config.maxVisible });
  const host = new RecyclerHost<TextTaskItemView>(binder, textInflater, config.viewport);

  controller.setListChangedHook(() => host.notifyDataSetChanged());

  return {
    bus,
    executor,
    loader,
    controller,
    binder,
    host,
    setLoadingMode(enabled: boolean) {
      binder.setLoadingMode(enabled);
      host.notifyDataSetChanged();
    },
    reload() {
      loader.refresh(readEntries());
      host.notifyDataSetChanged();
    },
    whenIdle(pollMs = 10) {
      return new Promise<void>((resolve) => {
        const check = (): void => {
          if (loader.inFlight === 0 && executor.pending === 0) {
            resolve();
            return;
          }
          setTimeout(check, pollMs);
        };
        check();
      });
    },
    dispose() {
      loader.dispose();
    },
  };
}
