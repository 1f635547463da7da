/**
 * CLI Output Utilities
 *
 * Provides structured output support for JSON and human-readable formats.
 * @module @prepuller/cli/output
 */

import chalk from 'chalk';

/**
 * Output format type
 */
export type OutputFormat = 'json' | 'table' | 'plain';

/**
 * Check whether a string names an output format
 */
export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'table' || value === 'plain';
}

/**
 * Global output format setting (can be overridden per command)
 */
let globalOutputFormat: OutputFormat = 'table';

/**
 * Sets the global output format
 */
export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

/**
 * Gets the current output format
 */
export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
}

/**
 * Outputs data in the specified format
 */
export function output(data: unknown, format?: OutputFormat): void {
  const fmt = format ?? globalOutputFormat;

  if (fmt !== 'json' && typeof data === 'string') {
    console.log(data);
  } else {
    console.log(JSON.stringify(data, null, 2));
  }
}

/**
 * Outputs a success message
 */
export function success(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ success: true, message }));
  } else {
    console.log(chalk.green('✓') + ' ' + message);
  }
}

/**
 * Outputs an error message
 */
export function error(message: string, details?: unknown): void {
  if (globalOutputFormat === 'json') {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗') + ' ' + message);
    if (details) {
      console.error(chalk.gray(JSON.stringify(details, null, 2)));
    }
  }
}

/**
 * Outputs a warning message
 */
export function warn(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ warning: message }));
  } else {
    console.log(chalk.yellow('⚠') + ' ' + message);
  }
}

/**
 * Outputs an info message
 */
export function info(message: string): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify({ info: message }));
  } else {
    console.log(chalk.blue('ℹ') + ' ' + message);
  }
}

/**
 * Table column
 */
export interface Column {
  key: string;
  header: string;
  width?: number;
}

/**
 * Formats a table from an array of objects
 */
export function table(data: Array<Record<string, unknown>>, columns?: Column[]): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const first = data[0];
  if (first === undefined) {
    console.log(chalk.gray('No data to display'));
    return;
  }

  // Auto-detect columns if not provided
  const cols: Column[] = columns ?? Object.keys(first).map((key) => ({
    key,
    header: key.charAt(0).toUpperCase() + key.slice(1),
  }));

  const widths = cols.map((col) => {
    const maxDataWidth = Math.max(...data.map((row) => visibleLength(String(row[col.key] ?? ''))));
    return col.width ?? Math.max(col.header.length, maxDataWidth, 4);
  });

  const pad = (value: string, i: number): string =>
    value + ' '.repeat(Math.max(0, (widths[i] ?? 0) - visibleLength(value)));

  console.log(chalk.bold(cols.map((col, i) => pad(col.header, i)).join('  ')));
  console.log(widths.map((w) => '─'.repeat(w)).join('──'));

  for (const row of data) {
    console.log(cols.map((col, i) => pad(String(row[col.key] ?? ''), i)).join('  '));
  }
}

/**
 * Formats key-value pairs for display
 */
export function keyValue(data: Record<string, unknown>): void {
  if (globalOutputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

  for (const [key, value] of Object.entries(data)) {
    console.log(`${chalk.bold(key.padEnd(maxKeyLength))}  ${formatValue(value)}`);
  }
}

/**
 * Formats a single value for display
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'boolean') {
    return value ? chalk.green('true') : chalk.red('false');
  }
  if (typeof value === 'number') {
    return chalk.cyan(String(value));
  }
  if (value instanceof Date) {
    return chalk.yellow(value.toISOString());
  }
  if (typeof value === 'object') {
    return chalk.gray(JSON.stringify(value));
  }
  return String(value);
}

/**
 * Formats a status badge
 */
export function statusBadge(status: string): string {
  const statusLower = status.toLowerCase();

  if (['done', 'available', 'healthy'].includes(statusLower)) {
    return chalk.green('●') + ' ' + chalk.green(status);
  }
  if (['pending', 'creating', 'waiting', 'deleting'].includes(statusLower)) {
    return chalk.yellow('◐') + ' ' + chalk.yellow(status);
  }
  if (['failed', 'error', 'missing'].includes(statusLower)) {
    return chalk.red('●') + ' ' + chalk.red(status);
  }

  return chalk.blue('●') + ' ' + status;
}

/**
 * Formats a date relative to now
 */
export function relativeTime(date: Date | string, now: Date = new Date()): string {
  const d = typeof date === 'string' ? new Date(date) : date;
  const diffSec = Math.floor((now.getTime() - d.getTime()) / 1000);
  const diffMin = Math.floor(diffSec / 60);
  const diffHour = Math.floor(diffMin / 60);
  const diffDay = Math.floor(diffHour / 24);

  if (diffSec < 60) return 'just now';
  if (diffMin < 60) return `${diffMin}m ago`;
  if (diffHour < 24) return `${diffHour}h ago`;
  if (diffDay < 7) return `${diffDay}d ago`;

  return d.toISOString().slice(0, 10);
}

/**
 * Truncates a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/**
 * Length of a string as shown on a terminal
 */
export function visibleLength(value: string): number {
  return value.replace(ANSI_PATTERN, '').length;
}
