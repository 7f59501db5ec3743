/**
 * CSV reading and writing for event interval tables
 * Comma separated, double-quote escaping, first line is the header.
 */

import { ConversionError } from './errors.js';
import type { EventIntervalTable } from './interval-converter.js';

export function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(table: EventIntervalTable): string {
  const lines = [table.columns, ...table.rows].map((cells) => cells.map(escapeCSV).join(','));
  return lines.join('\n');
}

/**
 * Splits CSV text into records of cells. Quoted cells may contain commas, quotes and newlines.
 */
function parseRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = '';
  let quoted = false;
  let index = 0;

  while (index < text.length) {
    const char = text[index];

    if (quoted) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          cell += '"';
          index += 2;
          continue;
        }
        quoted = false;
      } else {
        cell += char;
      }
      index++;
      continue;
    }

    if (char === '"' && cell === '') {
      quoted = true;
    } else if (char === ',') {
      record.push(cell);
      cell = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[index + 1] === '\n') {
        index++;
      }
      record.push(cell);
      records.push(record);
      record = [];
      cell = '';
    } else {
      cell += char;
    }
    index++;
  }

  if (quoted) {
    throw new ConversionError('Unterminated quoted cell in CSV input', []);
  }

  if (cell !== '' || record.length > 0) {
    record.push(cell);
    records.push(record);
  }

  // Blank lines carry no data
  return records.filter((cells) => !(cells.length === 1 && cells[0] === ''));
}

export function parseCsv(text: string): EventIntervalTable {
  const [header, ...rows] = parseRecords(text);
  if (!header) {
    throw new ConversionError('CSV input has no header line', []);
  }
  return { columns: header.map((column) => column.trim()), rows };
}
