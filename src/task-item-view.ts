// src/task-item-view.ts — Slot visuals: capability interface + terminal view model

import type { TaskIcon, Thumbnail } from './types';

export const DEFAULT_ICON: TaskIcon = { glyph: '□', color: 'gray' };
export const LOADING_LABEL = 'loading…';

/** What the layout system must offer for a slot's visuals */
export interface TaskItemView {
  setIcon(icon: TaskIcon | null): void;
  setLabel(label: string | null): void;
  setThumbnail(thumbnail: Thumbnail | null): void;
  /** Generic loading visual, shown before any data or in placeholder mode */
  resetToEmptyUi(): void;
  setOnActivate(handler: (() => void) | null): void;
}

/** Materializes new slot visuals on request */
export interface SlotInflater<V extends TaskItemView = TaskItemView> {
  inflate(): V;
}

export interface ItemContent {
  icon: TaskIcon;
  label: string;
  thumbnail: string[];
  loading: boolean;
}

function emptyContent(): ItemContent {
  return { icon: DEFAULT_ICON, label: '', thumbnail: [], loading: true };
}

/**
 * In-memory view rendered by the terminal UI.
 * Every setter replaces `content` with a new object so React sees the change.
 */
export class TextTaskItemView implements TaskItemView {
  private current: ItemContent = emptyContent();
  private onActivate: (() => void) | null = null;

  get content(): Readonly<ItemContent> {
    return this.current;
  }

  setIcon(icon: TaskIcon | null): void {
    this.update({ icon: icon ?? DEFAULT_ICON, loading: false });
  }

  setLabel(label: string | null): void {
    this.update({ label: label ?? '', loading: false });
  }

  setThumbnail(thumbnail: Thumbnail | null): void {
    this.update({ thumbnail: thumbnail ? [...thumbnail.lines] : [] });
  }

  resetToEmptyUi(): void {
    this.current = emptyContent();
  }

  setOnActivate(handler: (() => void) | null): void {
    this.onActivate = handler;
  }

  /** Simulates the user's activation gesture */
  activate(): void {
    this.onActivate?.();
  }

  private update(patch: Partial<ItemContent>): void {
    this.current = { ...this.current, ...patch };
  }
}

/** Inflater for terminal views */
export const textInflater: SlotInflater<TextTaskItemView> = {
  inflate: () => new TextTaskItemView(),
};
