/**
 * Option parsers shared by the list commands
 */

import { InvalidArgumentError } from 'commander';
import type { PaginationFilter } from '../models/common.js';

export const DEFAULT_PAGE_LIMIT = 50;

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export interface PaginationOptions {
  skip?: number;
  limit?: number;
}

export function paginationFrom(options: PaginationOptions): PaginationFilter | undefined {
  if (options.skip === undefined && options.limit === undefined) {
    return undefined;
  }
  return { skip: options.skip ?? 0, limit: options.limit ?? DEFAULT_PAGE_LIMIT };
}
