/**
 * Programs Command
 */

import { Command } from 'commander';
import { getConfigService } from '../services/config.js';
import { createBusinessLogicClientFromConfig } from '../services/clients.js';
import type { ExistingProgram } from '../models/program.js';
import { failCommand, getFormat, printList, type ColumnDef } from '../utils/output.js';
import { paginationFrom, parseCount, type PaginationOptions } from './options.js';

const PROGRAM_COLUMNS: ColumnDef<ExistingProgram>[] = [
  { label: 'ID', value: (program) => program.id },
  { label: 'Name', value: (program) => program.programName },
  { label: 'Type', value: (program) => program.programType },
  { label: 'Country', value: (program) => program.country },
  { label: 'Retailer', value: (program) => program.retailerName },
];

export const programsCommand = new Command('programs').description('Query programs');

/**
 * oadr3 programs list
 */
programsCommand
  .command('list')
  .description('List programs')
  .option('--skip <n>', 'Records to skip', parseCount)
  .option('--limit <n>', 'Maximum records returned', parseCount)
  .action(async (options: PaginationOptions, cmd: Command) => {
    const format = getFormat(cmd);
    try {
      const client = await createBusinessLogicClientFromConfig(getConfigService());
      const programs = await client.programs.getPrograms({ pagination: paginationFrom(options) });
      printList(format, 'programs', programs, PROGRAM_COLUMNS);
    } catch (error) {
      failCommand(error, format);
    }
  });
