/**
 * Token Command
 * Runs the client-credentials grant and prints the token status. The token itself is
 * never printed.
 */

import { Command } from 'commander';
import { getConfigService } from '../services/config.js';
import { createBusinessLogicClientFromConfig } from '../services/clients.js';
import { failCommand, getFormat, printJson } from '../utils/output.js';

export const tokenCommand = new Command('token')
  .description('Acquire an access token and show its status')
  .action(async (_options: object, cmd: Command) => {
    const format = getFormat(cmd);
    try {
      const client = await createBusinessLogicClientFromConfig(getConfigService());
      await client.tokenProvider.getToken();
      const status = client.tokenProvider.getStatus();

      if (format === 'json') {
        printJson({ success: true, token: status });
      } else {
        console.log(`State:      ${status.state}`);
        console.log(`Expires at: ${status.expiresAt ?? '-'}`);
        console.log(`Refresh at: ${status.refreshAt ?? '-'}`);
        console.log(`Scopes:     ${status.scopes.length > 0 ? status.scopes.join(' ') : '-'}`);
      }
    } catch (error) {
      failCommand(error, format);
    }
  });
