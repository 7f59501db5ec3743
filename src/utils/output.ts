/**
 * Output helpers for commands
 * JSON documents or cli-table3 tables on stdout, errors in the matching format.
 */

import Table from 'cli-table3';
import type { Command } from 'commander';
import { OpenADRError, exitCodeFor } from '../lib/errors.js';
import { getConfigService } from '../services/config.js';

export type OutputFormat = 'json' | 'table';

export interface ColumnDef<T> {
  label: string;
  value: (row: T) => string | number | boolean | null | undefined;
}

/**
 * Format chosen with the global --format option, falling back to the config file
 */
export function getFormat(cmd: Command): OutputFormat {
  const chosen: unknown = cmd.optsWithGlobals().format ?? getConfigService().get('format');
  return chosen === 'table' ? 'table' : 'json';
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function formatTable<T>(rows: readonly T[], columns: readonly ColumnDef<T>[]): string {
  const table = new Table({
    head: columns.map((column) => column.label),
    style: { head: ['cyan'] },
  });
  for (const row of rows) {
    table.push(columns.map((column) => String(column.value(row) ?? '')));
  }
  return table.toString();
}

/**
 * Prints a list either as `{ success, count, [key]: rows }` or as a table
 */
export function printList<T>(
  format: OutputFormat,
  key: string,
  rows: readonly T[],
  columns: readonly ColumnDef<T>[]
): void {
  if (format === 'json') {
    printJson({ success: true, count: rows.length, [key]: rows });
  } else {
    console.log(formatTable(rows, columns));
  }
}

/**
 * Reports a failed command and exits with its exit code
 */
export function failCommand(error: unknown, format: OutputFormat): never {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof OpenADRError ? error.code : 'ERROR';

  if (format === 'json') {
    console.log(JSON.stringify({ success: false, error: { code, message } }));
  } else {
    console.error(`Error: ${message}`);
  }
  return process.exit(exitCodeFor(error));
}
