// src/catalog.ts — Read and validate the task catalog JSON

import fs from 'fs';
import path from 'path';
import type { IconColor, TaskCatalogEntry } from './types';

export const BUNDLED_CATALOG = path.join(__dirname, '..', 'data', 'recent-tasks.json');

const ICON_COLORS: readonly IconColor[] = ['red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white', 'gray'];

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIconColor(value: unknown): value is IconColor {
  return ICON_COLORS.some((c) => c === value);
}

function parseEntry(raw: unknown, where: string): TaskCatalogEntry {
  if (!isRecord(raw)) throw new CatalogError(`${where}: expected an object`);
  const { id, packageName, label, icon, preview, lastActiveTime } = raw;

  if (typeof id !== 'number' || !Number.isInteger(id)) throw new CatalogError(`${where}: id must be an integer`);
  if (typeof packageName !== 'string' || packageName === '') throw new CatalogError(`${where}: packageName is required`);
  if (typeof label !== 'string') throw new CatalogError(`${where}: label must be a string`);
  if (typeof lastActiveTime !== 'number') throw new CatalogError(`${where}: lastActiveTime must be a number`);
  if (!isRecord(icon)) throw new CatalogError(`${where}: icon must be an object`);
  const { glyph, color } = icon;
  if (typeof glyph !== 'string' || !isIconColor(color)) {
    throw new CatalogError(`${where}: icon needs a glyph and one of ${ICON_COLORS.join(', ')}`);
  }
  if (!Array.isArray(preview) || !preview.every((l): l is string => typeof l === 'string')) {
    throw new CatalogError(`${where}: preview must be an array of strings`);
  }

  return {
    id,
    packageName,
    label,
    icon: { glyph, color },
    preview,
    lastActiveTime,
  };
}

/** Validates parsed JSON; `source` names the input in error messages */
export function parseCatalog(raw: unknown, source: string = 'catalog'): TaskCatalogEntry[] {
  if (!Array.isArray(raw)) throw new CatalogError(`${source}: expected an array of tasks`);

  const entries = raw.map((item, i) => parseEntry(item, `${source}[${i}]`));
  const seen = new Set<number>();
  for (const e of entries) {
    if (seen.has(e.id)) throw new CatalogError(`${source}: duplicate task id ${e.id}`);
    seen.add(e.id);
  }
  return entries;
}

export function loadCatalog(filePath: string = BUNDLED_CATALOG): TaskCatalogEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`${filePath}: ${reason}`);
  }
  return parseCatalog(raw, path.basename(filePath));
}
