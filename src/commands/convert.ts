/**
 * Convert Command
 * Converts event interval rows between CSV and the OpenADR interval JSON.
 *
 * CSV columns: type, values (JSON array), start, duration, randomizeStart.
 * JSON input is an array of rows with the same fields.
 */

import fs from 'node:fs';
import path from 'node:path';
import { Command, Option } from 'commander';
import {
  DictEventIntervalConverter,
  TableEventIntervalConverter,
  TableEventIntervalOutputConverter,
} from '../lib/interval-converter.js';
import { parseCsv, toCsv } from '../lib/csv.js';
import { ConversionError } from '../lib/errors.js';
import type { EventInterval } from '../models/event.js';
import { failCommand, getFormat, printJson } from '../utils/output.js';

interface ConvertOptions {
  to?: 'json' | 'csv';
}

/**
 * Reads a CSV or JSON row file into validated intervals
 */
export function readIntervals(filePath: string): EventInterval[] {
  const content = fs.readFileSync(filePath, 'utf-8');

  if (path.extname(filePath).toLowerCase() === '.csv') {
    return new TableEventIntervalConverter().convert(parseCsv(content));
  }

  let rows: unknown;
  try {
    rows = JSON.parse(content);
  } catch (error) {
    throw new ConversionError(`${filePath} is neither CSV nor valid JSON`, [
      { row: -1, error: error instanceof Error ? error : new Error(String(error)) },
    ]);
  }
  if (!Array.isArray(rows)) {
    throw new ConversionError(`${filePath} must contain a JSON array of rows`, []);
  }
  return new DictEventIntervalConverter().convert(rows);
}

export const convertCommand = new Command('convert')
  .description('Convert event interval rows between CSV and OpenADR interval JSON')
  .argument('<file>', 'CSV or JSON file of interval rows')
  .addOption(new Option('-t, --to <format>', 'Output format (default: the other one)').choices(['json', 'csv']))
  .action((file: string, options: ConvertOptions, cmd: Command) => {
    const format = getFormat(cmd);
    try {
      const intervals = readIntervals(file);
      const isCsvInput = path.extname(file).toLowerCase() === '.csv';
      const target = options.to ?? (isCsvInput ? 'json' : 'csv');

      if (target === 'csv') {
        console.log(toCsv(new TableEventIntervalOutputConverter().convert(intervals)));
      } else {
        printJson({ success: true, count: intervals.length, intervals });
      }
    } catch (error) {
      failCommand(error, format);
    }
  });
