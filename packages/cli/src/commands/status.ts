// @switchyard/cli - Status command

import { Command } from 'commander';
import { ApiClient } from '../api.js';
import { errorMessage, outputFormat } from './options.js';

export function createStatusCommand(): Command {
  const status = new Command('status')
    .description('Check that the server is up and list what it supports')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const client = new ApiClient();
        const result = await client.getServerStatus();

        if (outputFormat(options.json) === 'json') {
          console.log(JSON.stringify(result, null, 2));
          return;
        }

        console.log(`Server: ${result.status} (${result.timestamp})`);
        console.log(`Payment methods: ${result.paymentMethods.join(', ')}`);
        console.log(`Channels: ${result.channels.join(', ')}`);
      } catch (error) {
        console.error('Failed to get status:', errorMessage(error));
        process.exit(1);
      }
    });

  return status;
}
