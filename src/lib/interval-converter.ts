/**
 * Event interval converters
 * Move event intervals between the OpenADR model and flat rows: plain objects, or a
 * column-oriented table that round-trips through CSV. One payload per interval.
 */

import { z } from 'zod';
import { DateTimeSchema, DurationSchema, PayloadValueSchema, type PayloadValue } from '../models/common.js';
import { EventIntervalSchema, type EventInterval } from '../models/event.js';
import { parseWithSchema, toValidationIssues } from '../models/validation.js';
import { ConversionError, ModelValidationError, type RowError } from './errors.js';
import { loggers } from './logger.js';

/**
 * One interval, flattened
 */
export interface EventIntervalRow {
  type: string;
  values: PayloadValue[];
  start?: string | null;
  duration?: string | null;
  randomizeStart?: string | null;
}

/**
 * Column-oriented table. Cells are text; `values` holds a JSON array.
 */
export interface EventIntervalTable {
  columns: string[];
  rows: string[][];
}

export const REQUIRED_COLUMNS = ['type', 'values'] as const;
export const TABLE_COLUMNS = ['type', 'values', 'start', 'duration', 'randomizeStart'] as const;

export const EventIntervalRowSchema = z.object({
  type: z.string().min(1),
  values: z.array(PayloadValueSchema),
  start: DateTimeSchema.nullable().optional(),
  duration: DurationSchema.nullable().optional(),
  randomizeStart: DurationSchema.nullable().optional(),
});

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Validates every row up front, then converts them. Failures are collected per row and
 * raised together.
 */
abstract class BaseEventIntervalConverter<TInput> {
  protected abstract toRows(input: TInput): unknown[];

  convert(input: TInput): EventInterval[] {
    const rows = this.toRows(input);

    const validRows: EventIntervalRow[] = [];
    const validationErrors: RowError[] = [];
    rows.forEach((row, index) => {
      const result = EventIntervalRowSchema.safeParse(row);
      if (result.success) {
        validRows.push(result.data);
      } else {
        validationErrors.push({
          row: index,
          error: new ModelValidationError('EventIntervalRow', toValidationIssues(result.error), result.error),
        });
      }
    });

    if (validationErrors.length > 0) {
      throw new ConversionError(
        `${validationErrors.length} of ${rows.length} rows failed validation`,
        validationErrors
      );
    }

    const intervals: EventInterval[] = [];
    const conversionErrors: RowError[] = [];
    validRows.forEach((row, index) => {
      try {
        intervals.push(this.convertRow(index, row));
      } catch (error) {
        conversionErrors.push({ row: index, error: toError(error) });
      }
    });

    if (conversionErrors.length > 0) {
      throw new ConversionError(
        `${conversionErrors.length} of ${rows.length} rows could not be converted`,
        conversionErrors
      );
    }

    loggers.conversion.debug('Converted event interval rows', { rows: rows.length });
    return intervals;
  }

  private convertRow(id: number, row: EventIntervalRow): EventInterval {
    return parseWithSchema('EventInterval', EventIntervalSchema, {
      id,
      intervalPeriod: row.start
        ? {
            start: row.start,
            duration: row.duration ?? undefined,
            randomizeStart: row.randomizeStart ?? undefined,
          }
        : undefined,
      payloads: [{ type: row.type, values: row.values }],
    });
  }
}

/**
 * Rows given as plain objects
 */
export class DictEventIntervalConverter extends BaseEventIntervalConverter<readonly unknown[]> {
  protected toRows(input: readonly unknown[]): unknown[] {
    return [...input];
  }
}

/**
 * Rows given as a table, e.g. from parseCsv
 */
export class TableEventIntervalConverter extends BaseEventIntervalConverter<EventIntervalTable> {
  protected toRows(table: EventIntervalTable): unknown[] {
    const missing = REQUIRED_COLUMNS.filter((column) => !table.columns.includes(column));
    if (missing.length > 0) {
      throw new ConversionError(`Missing required columns: ${missing.join(', ')}`, []);
    }

    const rows: unknown[] = [];
    const errors: RowError[] = [];

    table.rows.forEach((cells, index) => {
      if (cells.length !== table.columns.length) {
        errors.push({
          row: index,
          error: new Error(`Expected ${table.columns.length} cells, got ${cells.length}`),
        });
        return;
      }

      const record: Record<string, unknown> = {};
      table.columns.forEach((column, columnIndex) => {
        const cell = cells[columnIndex];
        // Empty cells mean the field is absent
        if (cell !== undefined && cell !== '') {
          record[column] = cell;
        }
      });

      try {
        const rawValues = record.values;
        record.values = typeof rawValues === 'string' ? JSON.parse(rawValues) : [];
      } catch (error) {
        errors.push({ row: index, error: new Error(`values is not a JSON array: ${toError(error).message}`) });
        return;
      }

      rows.push(record);
    });

    if (errors.length > 0) {
      throw new ConversionError(`${errors.length} of ${table.rows.length} rows are malformed`, errors);
    }
    return rows;
  }
}

/**
 * Intervals to plain rows, in the given order
 */
export class DictEventIntervalOutputConverter {
  convert(intervals: readonly EventInterval[]): EventIntervalRow[] {
    return intervals.map((interval) => {
      // Only the first payload is represented
      const [payload] = interval.payloads;
      return {
        type: payload?.type ?? '',
        values: payload ? [...payload.values] : [],
        start: interval.intervalPeriod?.start ?? null,
        duration: interval.intervalPeriod?.duration ?? null,
        randomizeStart: interval.intervalPeriod?.randomizeStart ?? null,
      };
    });
  }
}

/**
 * Intervals to a table sorted by interval id, with start times in UTC
 */
export class TableEventIntervalOutputConverter {
  convert(intervals: readonly EventInterval[]): EventIntervalTable {
    const sorted = [...intervals].sort((a, b) => a.id - b.id);
    const rows = new DictEventIntervalOutputConverter().convert(sorted).map((row) => [
      row.type,
      JSON.stringify(row.values),
      row.start ? new Date(row.start).toISOString() : '',
      row.duration ?? '',
      row.randomizeStart ?? '',
    ]);
    return { columns: [...TABLE_COLUMNS], rows };
  }
}
