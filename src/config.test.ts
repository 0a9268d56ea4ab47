import { describe, it, expect } from 'vitest';
import { ConfigError, resolveConfig } from './config';
import { BUNDLED_CATALOG } from './catalog';

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      maxVisible: 6,
      viewport: 4,
      latencyMs: 150,
      logPath: null,
      catalogPath: BUNDLED_CATALOG,
    });
  });

  it('reads the environment', () => {
    const config = resolveConfig({}, {
      RECENTS_MAX_VISIBLE: '8',
      RECENTS_VIEWPORT: '3',
      RECENTS_LATENCY_MS: '0',
      RECENTS_LOG: '/tmp/recents.jsonl',
      RECENTS_CATALOG: '/tmp/tasks.json',
    });
    expect(config).toEqual({
      maxVisible: 8,
      viewport: 3,
      latencyMs: 0,
      logPath: '/tmp/recents.jsonl',
      catalogPath: '/tmp/tasks.json',
    });
  });

  it('prefers command line options over the environment', () => {
    const config = resolveConfig({ maxVisible: '2', latency: '25' }, { RECENTS_MAX_VISIBLE: '8', RECENTS_LATENCY_MS: '300' });
    expect(config.maxVisible).toBe(2);
    expect(config.latencyMs).toBe(25);
  });

  it('rejects a cap below one', () => {
    expect(() => resolveConfig({ maxVisible: '0' }, {})).toThrow(ConfigError);
    expect(() => resolveConfig({ maxVisible: '0' }, {})).toThrow('max-visible must be an integer >= 1, got "0"');
  });

  it('rejects values that are not integers', () => {
    expect(() => resolveConfig({ viewport: '2.5' }, {})).toThrow('viewport must be an integer >= 1, got "2.5"');
    expect(() => resolveConfig({}, { RECENTS_LATENCY_MS: 'soon' })).toThrow('latency must be an integer >= 0, got "soon"');
  });
});
