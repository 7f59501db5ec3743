/**
 * Metrics Command
 * Prints the Prometheus metrics collected in this process.
 */

import { Command } from 'commander';
import { getMetricsContentType, getMetricsSnapshot } from '../lib/metrics.js';
import { failCommand, getFormat } from '../utils/output.js';

export const metricsCommand = new Command('metrics')
  .description('Print Prometheus metrics')
  .option('--content-type', 'Print the exposition content type first')
  .action(async (options: { contentType?: boolean }, cmd: Command) => {
    try {
      if (options.contentType) {
        console.log(`Content-Type: ${getMetricsContentType()}\n`);
      }
      console.log(await getMetricsSnapshot());
    } catch (error) {
      failCommand(error, getFormat(cmd));
    }
  });
