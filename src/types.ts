// src/types.ts — Core type definitions for the recents binder

// Terminal-safe icon colors (chalk@4 named colors)
export type IconColor = 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';

// Which enrichment a completion carries
export type EnrichmentKind = 'icon-label' | 'thumbnail';

// Severity attached to every bus entry
export type Severity = 'debug' | 'info' | 'warning';

/** App icon as drawn in a terminal cell */
export interface TaskIcon {
  glyph: string;
  color: IconColor;
}

/** Session preview, one string per rendered row */
export interface Thumbnail {
  lines: string[];
}

/**
 * One recently used application session.
 * Identity is the integer `key`; the enrichment fields start empty and are
 * written in place by the task source before it fires a completion.
 */
export interface TaskRecord {
  readonly key: number;
  readonly packageName: string;
  lastActiveTime: number;
  icon: TaskIcon | null;
  label: string | null;
  thumbnail: Thumbnail | null;
}

/** Static description a loader resolves records from */
export interface TaskCatalogEntry {
  id: number;
  packageName: string;
  label: string;
  icon: TaskIcon;
  preview: string[];
  lastActiveTime: number;
}

/** Typed event signatures for the recents event bus */
export interface RecentsEvents {
  'list:refreshed': (size: number) => void;
  'mode:loading': (enabled: boolean) => void;
  'slot:created': (slotId: number) => void;
  'slot:bound': (slotId: number, taskKey: number, position: number) => void;
  'slot:placeholder': (slotId: number, position: number) => void;
  'slot:attached': (slotId: number, taskKey: number) => void;
  'slot:detached': (slotId: number, taskKey: number) => void;
  'bind:stale-position': (slotId: number, position: number, listSize: number) => void;
  'enrichment:applied': (slotId: number, taskKey: number, kind: EnrichmentKind) => void;
  'enrichment:dropped': (slotId: number, taskKey: number, kind: EnrichmentKind) => void;
  'task:launched': (taskKey: number, packageName: string) => void;
  'task:dismissed': (taskKey: number) => void;
  'task:cleared': (count: number) => void;
  'executor:error': (message: string) => void;
}

export type RecentsEventName = keyof RecentsEvents;

/** One entry in the bus history and JSONL log */
export interface EventEntry {
  id: number;
  type: RecentsEventName;
  severity: Severity;
  slotId: number | null;
  taskKey: number | null;
  args: unknown[];
  createdAt: number;
}
