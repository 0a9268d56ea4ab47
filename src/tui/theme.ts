// tui/theme.ts — ANSI-16 safe color palette + symbols
// Only named colors — works on PuTTY, macOS Terminal.app, Linux, SSH

import chalk from 'chalk';
import type { IconColor, Severity, TaskIcon } from '../types';

// --- Colors (chalk@4 named colors = ANSI-16) ---

export const colors = {
  error: chalk.red,
  info: chalk.cyan,
  muted: chalk.gray,
  bold: chalk.bold,
  dim: chalk.dim,

  // Composite
  header: chalk.bold.cyan,
  value: chalk.white,
} as const;

const iconPaint: Record<IconColor, (text: string) => string> = {
  red: chalk.red,
  green: chalk.green,
  yellow: chalk.yellow,
  blue: chalk.blue,
  magenta: chalk.magenta,
  cyan: chalk.cyan,
  white: chalk.white,
  gray: chalk.gray,
};

// --- Severity icons ---

export const severityIcon: Record<Severity, string> = {
  debug: chalk.gray('[.]'),
  info: chalk.cyan('[i]'),
  warning: chalk.yellow('[!]'),
};

// --- Mode badge ---

export function modeBadge(loading: boolean): string {
  return loading ? chalk.yellow('LOADING') : chalk.green('LIVE');
}

// --- Formatting helpers ---

export function paintIcon(icon: TaskIcon): string {
  return iconPaint[icon.color](icon.glyph);
}

export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 1) + '…';
}

export function formatTimestamp(ts: number): string {
  const d = new Date(ts);
  return `${String(d.getHours()).padStart(2, '0')}:${String(d.getMinutes()).padStart(2, '0')}:${String(d.getSeconds()).padStart(2, '0')}`;
}

export function formatArgs(args: unknown[]): string {
  return args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ');
}
