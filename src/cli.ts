import { Command, Option } from 'commander';
import { configCommand } from './commands/config.js';
import { tokenCommand } from './commands/token.js';
import { eventsCommand } from './commands/events.js';
import { programsCommand } from './commands/programs.js';
import { reportsCommand } from './commands/reports.js';
import { vensCommand } from './commands/vens.js';
import { convertCommand } from './commands/convert.js';
import { metricsCommand } from './commands/metrics.js';
import { setLogLevel } from './lib/logger.js';

export const cli = new Command();

cli
  .name('oadr3')
  .description('OpenADR 3 client: OAuth2 client credentials and VTN queries')
  .version('0.1.0');

// Global options
cli
  .addOption(new Option('-f, --format <format>', 'Output format (default: config file format, else json)').choices(['json', 'table']))
  .option('-v, --verbose', 'Write debug logs to stderr');

cli.hook('preAction', (thisCommand) => {
  if (thisCommand.opts().verbose) {
    setLogLevel('debug');
  }
});

cli.addCommand(configCommand);
cli.addCommand(tokenCommand);
cli.addCommand(eventsCommand);
cli.addCommand(programsCommand);
cli.addCommand(reportsCommand);
cli.addCommand(vensCommand);
cli.addCommand(convertCommand);
cli.addCommand(metricsCommand);
