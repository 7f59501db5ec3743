/**
 * VENs Command
 */

import { Command } from 'commander';
import { getConfigService } from '../services/config.js';
import { createBusinessLogicClientFromConfig } from '../services/clients.js';
import type { ExistingResource, ExistingVen } from '../models/ven.js';
import { failCommand, getFormat, printList, type ColumnDef } from '../utils/output.js';
import { paginationFrom, parseCount, type PaginationOptions } from './options.js';

interface VensListOptions extends PaginationOptions {
  name?: string;
}

const VEN_COLUMNS: ColumnDef<ExistingVen>[] = [
  { label: 'ID', value: (ven) => ven.id },
  { label: 'Name', value: (ven) => ven.venName },
  { label: 'Resources', value: (ven) => ven.resources?.length ?? 0 },
  { label: 'Modified', value: (ven) => ven.modificationDateTime },
];

const RESOURCE_COLUMNS: ColumnDef<ExistingResource>[] = [
  { label: 'ID', value: (resource) => resource.id },
  { label: 'Name', value: (resource) => resource.resourceName },
  { label: 'VEN', value: (resource) => resource.venID },
];

export const vensCommand = new Command('vens').description('Query VENs and their resources');

/**
 * oadr3 vens list
 */
vensCommand
  .command('list')
  .description('List VENs')
  .option('-n, --name <venName>', 'Only the VEN with this name')
  .option('--skip <n>', 'Records to skip', parseCount)
  .option('--limit <n>', 'Maximum records returned', parseCount)
  .action(async (options: VensListOptions, cmd: Command) => {
    const format = getFormat(cmd);
    try {
      const client = await createBusinessLogicClientFromConfig(getConfigService());
      const vens = await client.vens.getVens({ venName: options.name, pagination: paginationFrom(options) });
      printList(format, 'vens', vens, VEN_COLUMNS);
    } catch (error) {
      failCommand(error, format);
    }
  });

/**
 * oadr3 vens resources <venId>
 */
vensCommand
  .command('resources <venId>')
  .description('List the resources of a VEN')
  .action(async (venId: string, _options: object, cmd: Command) => {
    const format = getFormat(cmd);
    try {
      const client = await createBusinessLogicClientFromConfig(getConfigService());
      const resources = await client.vens.getVenResources(venId);
      printList(format, 'resources', resources, RESOURCE_COLUMNS);
    } catch (error) {
      failCommand(error, format);
    }
  });
