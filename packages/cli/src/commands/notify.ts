// @switchyard/cli - Notify command

import { Command } from 'commander';
import { ApiClient, formatNotification } from '../api.js';
import { PRIORITIES, type Priority } from '../types.js';
import { collectPair, errorMessage, outputFormat } from './options.js';

function isPriority(value: string): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}

export function createNotifyCommand(): Command {
  const notify = new Command('notify')
    .description('Send a notification')
    .argument('<channel>', 'Channel (EMAIL, SMS, PUSH, SLACK)')
    .argument('<recipient>', 'Email address, phone number, device token or #channel/@user')
    .argument('<message>', 'Message body')
    .option('-s, --subject <subject>', 'Subject line')
    .option('-m, --meta <key=value>', 'Metadata entry, repeatable', collectPair, {})
    .option('-p, --priority <level>', 'Priority (low, normal, high, critical)', 'normal')
    .option('--json', 'Output as JSON')
    .action(async (channel: string, recipient: string, message: string, options: {
      subject?: string;
      meta: Record<string, string>;
      priority: string;
      json?: boolean;
    }) => {
      try {
        const priority = options.priority;
        if (!isPriority(priority)) {
          console.error(`Invalid priority. Must be: ${PRIORITIES.join(', ')}`);
          process.exit(1);
        }

        const client = new ApiClient();
        const result = await client.sendNotification({
          channel: channel.toUpperCase(),
          recipient,
          message,
          subject: options.subject,
          metadata: options.meta,
          priority,
        });

        console.log(formatNotification(result, outputFormat(options.json)));
      } catch (error) {
        console.error('Failed to send notification:', errorMessage(error));
        process.exit(1);
      }
    });

  return notify;
}
