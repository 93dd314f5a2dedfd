// @switchyard/cli - Pay command

import { Command } from 'commander';
import { ApiClient, formatPayment } from '../api.js';
import { collectPair, errorMessage, outputFormat, parseAmount } from './options.js';

export function createPayCommand(): Command {
  const pay = new Command('pay')
    .description('Process a payment')
    .argument('<method>', 'Payment method (CREDIT_CARD, PAYPAL, CRYPTO, BANK_TRANSFER)')
    .argument('<amount>', 'Amount to charge', parseAmount)
    .option('-c, --currency <code>', 'Currency (EUR, USD, GBP)', 'EUR')
    .option('-d, --detail <key=value>', 'Payment detail, repeatable', collectPair, {})
    .option('--json', 'Output as JSON')
    .action(async (method: string, amount: number, options: {
      currency: string;
      detail: Record<string, string>;
      json?: boolean;
    }) => {
      try {
        const client = new ApiClient();
        const result = await client.processPayment({
          method: method.toUpperCase(),
          amount,
          currency: options.currency.toUpperCase(),
          details: options.detail,
        });

        console.log(formatPayment(result, outputFormat(options.json)));
      } catch (error) {
        console.error('Failed to process payment:', errorMessage(error));
        process.exit(1);
      }
    });

  return pay;
}
