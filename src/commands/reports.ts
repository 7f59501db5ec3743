/**
 * Reports Command
 */

import { Command } from 'commander';
import { getConfigService } from '../services/config.js';
import { createBusinessLogicClientFromConfig } from '../services/clients.js';
import type { ExistingReport } from '../models/report.js';
import { failCommand, getFormat, printList, type ColumnDef } from '../utils/output.js';
import { paginationFrom, parseCount, type PaginationOptions } from './options.js';

interface ReportsListOptions extends PaginationOptions {
  program?: string;
  event?: string;
  client?: string;
}

const REPORT_COLUMNS: ColumnDef<ExistingReport>[] = [
  { label: 'ID', value: (report) => report.id },
  { label: 'Event', value: (report) => report.eventID },
  { label: 'Client', value: (report) => report.clientName },
  { label: 'Name', value: (report) => report.reportName },
  { label: 'Resources', value: (report) => report.resources.length },
];

export const reportsCommand = new Command('reports').description('Query reports');

/**
 * oadr3 reports list
 */
reportsCommand
  .command('list')
  .description('List reports')
  .option('-p, --program <programId>', 'Only reports for this program')
  .option('-e, --event <eventId>', 'Only reports for this event')
  .option('-c, --client <clientName>', 'Only reports from this client')
  .option('--skip <n>', 'Records to skip', parseCount)
  .option('--limit <n>', 'Maximum records returned', parseCount)
  .action(async (options: ReportsListOptions, cmd: Command) => {
    const format = getFormat(cmd);
    try {
      const client = await createBusinessLogicClientFromConfig(getConfigService());
      const reports = await client.reports.getReports({
        programId: options.program,
        eventId: options.event,
        clientName: options.client,
        pagination: paginationFrom(options),
      });
      printList(format, 'reports', reports, REPORT_COLUMNS);
    } catch (error) {
      failCommand(error, format);
    }
  });
