/**
 * Events Command
 */

import { Command } from 'commander';
import { getConfigService } from '../services/config.js';
import { createBusinessLogicClientFromConfig } from '../services/clients.js';
import type { ExistingEvent } from '../models/event.js';
import { failCommand, getFormat, printList, type ColumnDef } from '../utils/output.js';
import { paginationFrom, parseCount, type PaginationOptions } from './options.js';

interface EventsListOptions extends PaginationOptions {
  program?: string;
}

const EVENT_COLUMNS: ColumnDef<ExistingEvent>[] = [
  { label: 'ID', value: (event) => event.id },
  { label: 'Program', value: (event) => event.programID },
  { label: 'Name', value: (event) => event.eventName },
  { label: 'Priority', value: (event) => event.priority },
  { label: 'Intervals', value: (event) => event.intervals.length },
  { label: 'Modified', value: (event) => event.modificationDateTime },
];

export const eventsCommand = new Command('events').description('Query events');

/**
 * oadr3 events list
 */
eventsCommand
  .command('list')
  .description('List events')
  .option('-p, --program <programId>', 'Only events of this program')
  .option('--skip <n>', 'Records to skip', parseCount)
  .option('--limit <n>', 'Maximum records returned', parseCount)
  .action(async (options: EventsListOptions, cmd: Command) => {
    const format = getFormat(cmd);
    try {
      const client = await createBusinessLogicClientFromConfig(getConfigService());
      const events = await client.events.getEvents({
        programId: options.program,
        pagination: paginationFrom(options),
      });
      printList(format, 'events', events, EVENT_COLUMNS);
    } catch (error) {
      failCommand(error, format);
    }
  });
