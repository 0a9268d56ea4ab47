// tui/hooks/useRecents.ts — Re-read the slot window whenever the bus reports a change

import { useState, useEffect } from 'react';
import type { Recents } from '../../recents';
import type { ItemContent } from '../../task-item-view';
import type { EventEntry } from '../../types';

export interface SlotSnapshot {
  slotId: number;
  position: number;
  content: ItemContent;
}

export interface RecentsData {
  slots: SlotSnapshot[];
  loading: boolean;
  listSize: number;
  count: number;
  slotsCreated: number;
  scrapSize: number;
  events: EventEntry[];
  totalEvents: number;
}

const MAX_EVENTS = 50;

function readRecents(recents: Recents): RecentsData {
  const { binder, host, loader, bus } = recents;
  return {
    slots: host.visibleSlots().map(({ position, holder }) => ({
      slotId: holder.id,
      position,
      content: holder.itemView.content,
    })),
    loading: binder.loadingMode,
    listSize: loader.currentList().length,
    count: binder.count(),
    slotsCreated: host.slotsCreated,
    scrapSize: host.scrapSize,
    events: bus.getRecent(MAX_EVENTS),
    totalEvents: bus.total,
  };
}

export function useRecents(recents: Recents): RecentsData {
  // Synchronous initial read — data ready before first paint
  const [data, setData] = useState<RecentsData>(() => readRecents(recents));

  useEffect(() => {
    const unsubscribe = recents.bus.onEntry(() => {
      setData(readRecents(recents));
    });
    setData(readRecents(recents));
    return unsubscribe;
  }, [recents]);

  return data;
}
