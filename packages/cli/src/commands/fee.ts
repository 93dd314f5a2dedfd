// @switchyard/cli - Fee command

import { Command } from 'commander';
import { ApiClient } from '../api.js';
import { errorMessage, outputFormat, parseAmount } from './options.js';

export function createFeeCommand(): Command {
  const fee = new Command('fee')
    .description('Show the fee for a payment without processing it')
    .argument('<method>', 'Payment method')
    .argument('<amount>', 'Amount to price', parseAmount)
    .option('-c, --currency <code>', 'Currency (EUR, USD, GBP)', 'EUR')
    .option('--json', 'Output as JSON')
    .action(async (method: string, amount: number, options: { currency: string; json?: boolean }) => {
      try {
        const client = new ApiClient();
        const currency = options.currency.toUpperCase();
        const estimate = await client.estimateFee({
          method: method.toUpperCase(),
          amount,
          currency,
        });

        if (outputFormat(options.json) === 'json') {
          console.log(JSON.stringify(estimate, null, 2));
        } else {
          console.log(`${estimate.method} fee for ${estimate.amount.toFixed(2)} ${currency}: ${estimate.fee.toFixed(2)} ${currency}`);
        }
      } catch (error) {
        console.error('Failed to estimate fee:', errorMessage(error));
        process.exit(1);
      }
    });

  return fee;
}
