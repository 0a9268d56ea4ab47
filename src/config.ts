// src/config.ts — Resolve runtime settings from CLI options, environment and defaults

import { BUNDLED_CATALOG } from './catalog';
import { DEFAULT_MAX_VISIBLE } from './item-binder';

export const DEFAULT_VIEWPORT = 4;
export const DEFAULT_LATENCY_MS = 150;

export interface RecentsConfig {
  maxVisible: number;
  viewport: number;
  latencyMs: number;
  logPath: string | null;
  catalogPath: string;
}

/** Raw option strings as commander hands them over */
export type ConfigOptions = {
  maxVisible?: string;
  viewport?: string;
  latency?: string;
  log?: string;
  catalog?: string;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function resolveConfig(options: ConfigOptions = {}, env: NodeJS.ProcessEnv = process.env): RecentsConfig {
  return {
    maxVisible: parseInteger('max-visible', options.maxVisible ?? env.RECENTS_MAX_VISIBLE, DEFAULT_MAX_VISIBLE, 1),
    viewport: parseInteger('viewport', options.viewport ?? env.RECENTS_VIEWPORT, DEFAULT_VIEWPORT, 1),
    latencyMs: parseInteger('latency', options.latency ?? env.RECENTS_LATENCY_MS, DEFAULT_LATENCY_MS, 0),
    logPath: options.log || env.RECENTS_LOG || null,
    catalogPath: options.catalog || env.RECENTS_CATALOG || BUNDLED_CATALOG,
  };
}
