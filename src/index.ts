#!/usr/bin/env node
// src/index.ts — CLI entry point

import { Command } from 'commander';
import { ConfigError, resolveConfig } from './config';
import type { ConfigOptions, RecentsConfig } from './config';
import { CatalogError } from './catalog';
import { createRecents } from './recents';
import { runTui } from './tui/cli';
import { colors, formatArgs, paintIcon, severityIcon } from './tui/theme';
import { DEFAULT_ICON } from './task-item-view';

const program = new Command();

program
  .name('recents')
  .description('Recent task sessions bound to a recycled pool of terminal slots')
  .version('1.0.0')
  .option('-m, --max-visible <count>', 'Cap on displayable tasks (env RECENTS_MAX_VISIBLE)')
  .option('-w, --viewport <count>', 'Slots attached at once (env RECENTS_VIEWPORT)')
  .option('-l, --latency <ms>', 'Simulated load latency (env RECENTS_LATENCY_MS)')
  .option('--log <path>', 'Append every event to this JSONL file (env RECENTS_LOG)')
  .option('--catalog <path>', 'Task catalog JSON (env RECENTS_CATALOG)');

function config(): RecentsConfig {
  try {
    return resolveConfig(program.opts<ConfigOptions>());
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(colors.error(`Invalid configuration: ${err.message}`));
      process.exit(1);
    }
    throw err;
  }
}

function fail(err: unknown): never {
  if (err instanceof CatalogError || err instanceof ConfigError) {
    console.error(colors.error(err.message));
    process.exit(1);
  }
  throw err;
}

// --- list ---

program
  .command('list')
  .description('Print the capped task list')
  .action(() => {
    const cfg = config();
    try {
      const recents = createRecents(cfg);
      const tasks = recents.loader.currentList();
      const count = recents.binder.count();

      if (count === 0) {
        console.log('No recent tasks');
        return;
      }

      console.log(`${colors.header('Recent tasks')} ${colors.muted(`(${count} of ${tasks.length}, cap ${cfg.maxVisible})`)}`);
      tasks.slice(0, count).forEach((t, i) => {
        console.log(`  ${i}  ${t.key}  ${t.packageName}  ${colors.muted(new Date(t.lastActiveTime).toISOString())}`);
      });
      recents.dispose();
    } catch (err) {
      fail(err);
    }
  });

// --- simulate ---

program
  .command('simulate')
  .description('Scroll and rebind while loads are in flight, then print the event log')
  .option('-s, --scroll <positions>', 'Positions to scroll right after the first layout', '2')
  .action(async (opts: { scroll: string }) => {
    const cfg = config();
    try {
      const recents = createRecents(cfg);
      const { host, binder, bus } = recents;

      host.layout();
      host.scrollBy(parseInt(opts.scroll, 10) || 0);
      await recents.whenIdle();

      recents.setLoadingMode(true);
      recents.setLoadingMode(false);
      await recents.whenIdle();

      for (const e of bus.getRecent(bus.total)) {
        console.log(`${severityIcon[e.severity]} ${e.type} ${colors.muted(formatArgs(e.args))}`);
      }

      const entries = bus.getRecent(bus.total);
      const applied = entries.filter((e) => e.type === 'enrichment:applied').length;
      const dropped = entries.filter((e) => e.type === 'enrichment:dropped').length;
      console.log('');
      console.log(`${colors.header('Visible')} ${colors.muted(`(count ${binder.count()}, slots ${host.slotsCreated})`)}`);
      for (const { position, holder } of host.visibleSlots()) {
        const { content } = holder.itemView;
        const icon = paintIcon(content.loading ? DEFAULT_ICON : content.icon);
        console.log(`  #${position} slot ${holder.id}  ${icon} ${content.label}  ${colors.muted(content.thumbnail[0] ?? '')}`);
      }
      console.log(`Enrichment applied: ${applied}, dropped as stale: ${dropped}`);
      recents.dispose();
    } catch (err) {
      fail(err);
    }
  });

// --- tui ---

program
  .command('tui')
  .description('Interactive recents view')
  .action(async () => {
    const cfg = config();
    try {
      await runTui(cfg);
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
