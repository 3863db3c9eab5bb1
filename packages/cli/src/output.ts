/**
 * CLI Output Utilities
 *
 * Structured output for JSON and human-readable formats.
 * @module @devstate/cli/output
 */

import chalk from 'chalk';
import { wrapError, type ResourceList, type ResourceLocation } from '@devstate/shared';

/**
 * Output format type
 */
export type OutputFormat = 'json' | 'plain';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'plain';
}

/**
 * Global output format setting
 */
let globalOutputFormat: OutputFormat = 'plain';

export function setOutputFormat(format: OutputFormat): void {
  globalOutputFormat = format;
}

export function getOutputFormat(): OutputFormat {
  return globalOutputFormat;
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
 * Outputs a failed command; JSON output carries the error code and metadata
 */
export function failure(err: unknown): void {
  const wrapped = wrapError(err);
  error(wrapped.message, globalOutputFormat === 'json' ? wrapped.toJSON().error : undefined);
}

/**
 * Outputs a data document as JSON
 */
export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Formats key-value pairs for display
 */
export function keyValue(data: Record<string, string | number>): void {
  const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

  for (const [key, value] of Object.entries(data)) {
    const formatted = value === '' ? chalk.gray('(none)') : String(value);
    console.log(`${chalk.bold(key.padEnd(maxKeyLength))}  ${formatted}`);
  }
}

/**
 * Prints one row per resource name across several resource maps
 */
export function resourceTable(columns: Record<string, ResourceList | ResourceLocation>): void {
  const headers = ['RESOURCE', ...Object.keys(columns).map((c) => c.toUpperCase())];
  const names = [...new Set(Object.values(columns).flatMap((list) => Object.keys(list)))].sort();

  if (names.length === 0) {
    console.log(chalk.gray('  No resources'));
    return;
  }

  const rows = names.map((name) => [
    name,
    ...Object.values(columns).map((list) => (name in list ? String(list[name]) : '-')),
  ]);
  const widths = headers.map((header, i) => Math.max(header.length, ...rows.map((row) => row[i].length)));

  console.log(chalk.bold(headers.map((h, i) => h.padEnd(widths[i])).join('  ')));
  for (const row of rows) {
    console.log(row.map((cell, i) => cell.padEnd(widths[i])).join('  '));
  }
}
