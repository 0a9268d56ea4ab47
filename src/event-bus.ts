// src/event-bus.ts — Typed event bus with in-memory history and JSONL log

import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';
import type { EventEntry, RecentsEventName, RecentsEvents, Severity } from './types';

type EventCallback<K extends RecentsEventName> = RecentsEvents[K];
type EntryListener = (entry: EventEntry) => void;

const DEFAULT_HISTORY = 200;

export interface EventBusOptions {
  /** Append every entry to this JSONL file */
  logPath?: string;
  /** Entries kept for getRecent() */
  historySize?: number;
}

/**
 * Typed event bus with:
 * - Type-safe emit/on via RecentsEvents
 * - Every event recorded in a bounded history for the UI and the CLI
 * - Optional JSONL log, one line per event
 */
export class RecentsEventBus {
  private emitter: EventEmitter;
  private history: EventEntry[] = [];
  private entryListeners = new Set<EntryListener>();
  private nextId = 1;
  private historySize: number;
  private logPath: string | null;

  constructor(options: EventBusOptions = {}) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(50);
    this.historySize = options.historySize ?? DEFAULT_HISTORY;
    this.logPath = options.logPath ?? null;

    if (this.logPath) {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    }
  }

  /** Type-safe event emission — records the entry, appends JSONL, then emits in-memory */
  emit<K extends RecentsEventName>(event: K, ...args: Parameters<EventCallback<K>>): void {
    const entry: EventEntry = {
      id: this.nextId++,
      type: event,
      severity: this.inferSeverity(event),
      slotId: this.inferSlotId(event, args),
      taskKey: this.inferTaskKey(event, args),
      args,
      createdAt: Date.now(),
    };

    this.history.push(entry);
    if (this.history.length > this.historySize) {
      this.history = this.history.slice(-this.historySize);
    }

    this.appendJsonl(entry);

    this.emitter.emit(event, ...args);
    for (const listener of this.entryListeners) listener(entry);
  }

  /** Type-safe event subscription */
  on<K extends RecentsEventName>(event: K, listener: EventCallback<K>): void {
    this.emitter.on(event, listener as (...args: unknown[]) => void);
  }

  /** One-time listener */
  once<K extends RecentsEventName>(event: K, listener: EventCallback<K>): void {
    this.emitter.once(event, listener as (...args: unknown[]) => void);
  }

  /** Remove a specific listener */
  off<K extends RecentsEventName>(event: K, listener: EventCallback<K>): void {
    this.emitter.off(event, listener as (...args: unknown[]) => void);
  }

  /** Receive every entry regardless of type; returns the unsubscribe function */
  onEntry(listener: EntryListener): () => void {
    this.entryListeners.add(listener);
    return () => {
      this.entryListeners.delete(listener);
    };
  }

  /** Most recent entries, oldest first */
  getRecent(limit: number = 50): EventEntry[] {
    return this.history.slice(-limit);
  }

  /** Count of entries emitted since construction */
  get total(): number {
    return this.nextId - 1;
  }

  // --- Private helpers ---

  private inferSeverity(event: RecentsEventName): Severity {
    if (event === 'executor:error') return 'warning';
    if (event === 'enrichment:dropped' || event === 'bind:stale-position') return 'debug';
    return 'info';
  }

  private inferSlotId(event: RecentsEventName, args: unknown[]): number | null {
    if (event.startsWith('slot:') || event.startsWith('bind:') || event.startsWith('enrichment:')) {
      return typeof args[0] === 'number' ? args[0] : null;
    }
    return null;
  }

  private inferTaskKey(event: RecentsEventName, args: unknown[]): number | null {
    if (event === 'task:launched' || event === 'task:dismissed') {
      return typeof args[0] === 'number' ? args[0] : null;
    }
    if (event === 'slot:bound' || event === 'slot:attached' || event === 'slot:detached' || event.startsWith('enrichment:')) {
      return typeof args[1] === 'number' ? args[1] : null;
    }
    return null;
  }

  private appendJsonl(entry: EventEntry): void {
    if (!this.logPath) return;
    try {
      const line = {
        ts: new Date(entry.createdAt).toISOString(),
        type: entry.type,
        severity: entry.severity,
        slot: entry.slotId,
        task: entry.taskKey,
        args: entry.args,
      };
      fs.appendFileSync(this.logPath, JSON.stringify(line) + '\n');
    } catch {
      // Non-critical — the log must never break binding
    }
  }
}
