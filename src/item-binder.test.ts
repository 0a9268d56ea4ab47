import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ItemBinder } from './item-binder';
import { RecentsEventBus } from './event-bus';
import { textInflater } from './task-item-view';
import type { ActionDispatcher } from './action-controller';
import type { TaskHolder } from './task-holder';
import type { TaskSource } from './task-source';
import type { TaskRecord } from './types';

interface PendingLoad {
  record: TaskRecord;
  complete: () => void;
}

/** Task source whose completions fire only when the test says so */
class ManualTaskSource implements TaskSource {
  tasks: TaskRecord[] = [];
  iconLoads: PendingLoad[] = [];
  thumbnailLoads: PendingLoad[] = [];

  currentList(): readonly TaskRecord[] {
    return this.tasks;
  }

  loadIconAndLabel(record: TaskRecord, onComplete: () => void): void {
    this.iconLoads.push({
      record,
      complete: () => {
        record.icon = { glyph: String(record.key), color: 'cyan' };
        record.label = `Label ${record.key}`;
        onComplete();
      },
    });
  }

  loadThumbnail(record: TaskRecord, onComplete: () => void): void {
    this.thumbnailLoads.push({
      record,
      complete: () => {
        record.thumbnail = { lines: [`thumb ${record.key}`] };
        onComplete();
      },
    });
  }
}

function task(key: number): TaskRecord {
  return { key, packageName: `pkg.${key}`, lastActiveTime: key, icon: null, label: null, thumbnail: null };
}

describe('ItemBinder', () => {
  let source: ManualTaskSource;
  let dispatcher: ActionDispatcher & { launch: ReturnType<typeof vi.fn> };
  let bus: RecentsEventBus;
  let binder: ItemBinder;

  beforeEach(() => {
    source = new ManualTaskSource();
    dispatcher = { launch: vi.fn() };
    bus = new RecentsEventBus();
    binder = new ItemBinder(source, dispatcher, bus);
  });

  describe('count', () => {
    it('is the list length while under the cap', () => {
      source.tasks = [task(1), task(2)];
      expect(binder.count()).toBe(2);
    });

    it('is capped at maxVisible', () => {
      source.tasks = Array.from({ length: 10 }, (_, i) => task(i + 1));
      expect(binder.count()).toBe(6);
    });

    it('honors a configured cap', () => {
      binder = new ItemBinder(source, dispatcher, bus, { maxVisible: 3 });
      source.tasks = [task(1), task(2), task(3), task(4)];
      expect(binder.count()).toBe(3);
    });

    it('reports the full cap in loading mode regardless of list length', () => {
      source.tasks = [task(1), task(2)];
      binder.setLoadingMode(true);
      expect(binder.count()).toBe(6);
    });

    it('treats repeated loading-mode toggles as one', () => {
      binder.setLoadingMode(true);
      binder.setLoadingMode(true);
      expect(binder.count()).toBe(6);
      expect(bus.getRecent().filter((e) => e.type === 'mode:loading')).toHaveLength(1);
    });
  });

  describe('bind', () => {
    it('shows placeholders at once and applies enrichment when it arrives', () => {
      source.tasks = [task(1), task(2)];
      const holder = binder.createSlot(textInflater);

      binder.bind(holder, 0);
      expect(holder.getTask()?.key).toBe(1);
      expect(holder.itemView.content).toEqual({ icon: { glyph: '□', color: 'gray' }, label: '', thumbnail: [], loading: true });

      source.iconLoads[0].complete();
      expect(holder.itemView.content.label).toBe('Label 1');
      expect(holder.itemView.content.icon).toEqual({ glyph: '1', color: 'cyan' });

      source.thumbnailLoads[0].complete();
      expect(holder.itemView.content.thumbnail).toEqual(['thumb 1']);
    });

    it('drops a completion for a record the slot no longer shows', () => {
      source.tasks = [task(1), task(2)];
      const holder = binder.createSlot(textInflater);

      binder.bind(holder, 0);
      source.iconLoads[0].complete();
      binder.bind(holder, 1);
      source.thumbnailLoads[0].complete();

      expect(holder.getTask()?.key).toBe(2);
      expect(holder.itemView.content.thumbnail).toEqual([]);
      expect(holder.itemView.content.label).toBe('');
      const dropped = bus.getRecent().filter((e) => e.type === 'enrichment:dropped');
      expect(dropped.map((e) => e.args)).toEqual([[holder.id, 1, 'thumbnail']]);
    });

    it('keeps the newer record whatever order completions arrive in', () => {
      source.tasks = [task(1), task(2)];
      const holder = binder.createSlot(textInflater);

      binder.bind(holder, 0);
      binder.bind(holder, 1);
      source.iconLoads[1].complete();
      source.iconLoads[0].complete();

      expect(holder.itemView.content.label).toBe('Label 2');
      expect(holder.itemView.content.icon).toEqual({ glyph: '2', color: 'cyan' });
    });

    it('leaves the slot alone when the position is past the end of the list', () => {
      source.tasks = [task(1)];
      const holder = binder.createSlot(textInflater);
      binder.bind(holder, 0);
      source.iconLoads[0].complete();
      const before = holder.itemView.content;

      source.tasks = [];
      expect(() => binder.bind(holder, 1)).not.toThrow();

      expect(holder.itemView.content).toBe(before);
      expect(holder.getTask()?.key).toBe(1);
      expect(source.iconLoads).toHaveLength(1);
      const stale = bus.getRecent().filter((e) => e.type === 'bind:stale-position');
      expect(stale.map((e) => e.args)).toEqual([[holder.id, 1, 0]]);
    });

    it('binds placeholders without fetching anything in loading mode', () => {
      source.tasks = [task(1), task(2)];
      binder.setLoadingMode(true);

      const holders = Array.from({ length: binder.count() }, () => binder.createSlot(textInflater));
      holders.forEach((h, i) => binder.bind(h, i));

      expect(holders).toHaveLength(6);
      expect(holders.every((h) => h.getTask() === null && h.itemView.content.loading)).toBe(true);
      expect(source.iconLoads).toHaveLength(0);
      expect(source.thumbnailLoads).toHaveLength(0);
    });
  });

  describe('createSlot', () => {
    it('launches the task bound at activation time', () => {
      source.tasks = [task(1), task(2)];
      const launchedKeys: Array<number | undefined> = [];
      dispatcher.launch.mockImplementation((h: TaskHolder) => {
        launchedKeys.push(h.getTask()?.key);
      });
      const holder = binder.createSlot(textInflater);

      binder.bind(holder, 0);
      binder.bind(holder, 1);
      holder.itemView.activate();

      expect(dispatcher.launch).toHaveBeenCalledWith(holder);
      expect(launchedKeys).toEqual([2]);
    });
  });

  describe('attachment index', () => {
    it('ignores attach and detach of an unbound slot', () => {
      const holder = binder.createSlot(textInflater);
      binder.onSlotAttached(holder);
      binder.onSlotDetached(holder);
      expect(binder.lookupAttachedSlot(1)).toBeUndefined();
    });

    it('tracks a bound slot from attach until detach', () => {
      source.tasks = [task(1)];
      const holder = binder.createSlot(textInflater);
      binder.bind(holder, 0);

      expect(binder.lookupAttachedSlot(1)).toBeUndefined();
      binder.onSlotAttached(holder);
      expect(binder.lookupAttachedSlot(1)).toBe(holder);
      binder.onSlotDetached(holder);
      expect(binder.lookupAttachedSlot(1)).toBeUndefined();
    });

    it('does not remove the entry another slot has claimed for the same key', () => {
      source.tasks = [task(1)];
      const first = binder.createSlot(textInflater);
      const second = binder.createSlot(textInflater);
      binder.bind(first, 0);
      binder.onSlotAttached(first);
      binder.bind(second, 0);
      binder.onSlotAttached(second);

      binder.onSlotDetached(first);

      expect(binder.lookupAttachedSlot(1)).toBe(second);
    });

    it('hands the entry to the older slot when the newer one showing the same key detaches', () => {
      source.tasks = [task(1), task(2)];
      const older = binder.createSlot(textInflater);
      const newer = binder.createSlot(textInflater);
      binder.bind(older, 0);
      binder.onSlotAttached(older);
      binder.bind(newer, 0);
      binder.onSlotAttached(newer);
      expect(binder.lookupAttachedSlot(1)).toBe(newer);

      binder.onSlotDetached(newer);
      expect(binder.lookupAttachedSlot(1)).toBe(older);

      binder.bind(older, 1);
      expect(binder.lookupAttachedSlot(1)).toBeUndefined();
      expect(binder.lookupAttachedSlot(2)).toBe(older);
    });

    it('moves the entry when an attached slot is rebound in place', () => {
      source.tasks = [task(1), task(2)];
      const holder = binder.createSlot(textInflater);
      binder.bind(holder, 0);
      binder.onSlotAttached(holder);

      binder.bind(holder, 1);

      expect(binder.lookupAttachedSlot(1)).toBeUndefined();
      expect(binder.lookupAttachedSlot(2)).toBe(holder);
    });

    it('drops the entry when an attached slot turns into a placeholder', () => {
      source.tasks = [task(1)];
      const holder = binder.createSlot(textInflater);
      binder.bind(holder, 0);
      binder.onSlotAttached(holder);

      binder.setLoadingMode(true);
      binder.bind(holder, 0);

      expect(binder.lookupAttachedSlot(1)).toBeUndefined();
    });

    it('indexes a slot that was attached before it was bound', () => {
      source.tasks = [task(1)];
      const holder = binder.createSlot(textInflater);
      binder.onSlotAttached(holder);
      binder.bind(holder, 0);
      expect(binder.lookupAttachedSlot(1)).toBe(holder);
    });
  });
});
