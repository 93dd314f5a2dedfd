// @switchyard/cli - Cost command

import { Command } from 'commander';
import { ApiClient } from '../api.js';
import { errorMessage, outputFormat } from './options.js';

export function createCostCommand(): Command {
  const cost = new Command('cost')
    .description('Show the delivery cost of a notification without sending it')
    .argument('<channel>', 'Channel (EMAIL, SMS, PUSH, SLACK)')
    .argument('<message>', 'Message body')
    .option('--json', 'Output as JSON')
    .action(async (channel: string, message: string, options: { json?: boolean }) => {
      try {
        const client = new ApiClient();
        const estimate = await client.estimateCost({
          channel: channel.toUpperCase(),
          recipient: '',
          message,
        });

        if (outputFormat(options.json) === 'json') {
          console.log(JSON.stringify(estimate, null, 2));
        } else {
          console.log(`${estimate.channel} cost: ${estimate.cost}`);
        }
      } catch (error) {
        console.error('Failed to estimate cost:', errorMessage(error));
        process.exit(1);
      }
    });

  return cost;
}
