// @switchyard/cli - Pay and fee command tests

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createPayCommand } from './pay.js';
import { createFeeCommand } from './fee.js';

const mockProcessPayment = vi.fn();
const mockEstimateFee = vi.fn();
vi.mock('../api.js', () => ({
  ApiClient: vi.fn().mockImplementation(function () {
    return { processPayment: mockProcessPayment, estimateFee: mockEstimateFee };
  }),
  formatPayment: vi.fn((result: { id: string }, format: string) =>
    format === 'json' ? JSON.stringify(result) : `Formatted: ${result.id}`
  ),
}));

vi.mock('../config.js', () => ({
  getResolvedConfig: () => ({
    serverUrl: 'http://localhost:3000',
    timeout: 5000,
    outputFormat: 'table',
  }),
}));

describe('payment commands', () => {
  let consoleSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    vi.clearAllMocks();
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  describe('pay', () => {
    it('should send method, amount, currency and details', async () => {
      mockProcessPayment.mockResolvedValue({ id: 'TXN-0000ABCD' });

      await createPayCommand().parseAsync([
        'node', 'test', 'credit_card', '100',
        '--currency', 'usd',
        '-d', 'cardNumber=4111111111111111',
        '-d', 'expiryDate=12/2030',
      ]);

      expect(mockProcessPayment).toHaveBeenCalledWith({
        method: 'CREDIT_CARD',
        amount: 100,
        currency: 'USD',
        details: { cardNumber: '4111111111111111', expiryDate: '12/2030' },
      });
      expect(consoleSpy).toHaveBeenCalledWith('Formatted: TXN-0000ABCD');
    });

    it('should keep "=" inside detail values', async () => {
      mockProcessPayment.mockResolvedValue({ id: 'TXN-1' });

      await createPayCommand().parseAsync(['node', 'test', 'PAYPAL', '5', '-d', 'token=Bearer a=b']);

      expect(mockProcessPayment).toHaveBeenCalledWith(
        expect.objectContaining({ details: { token: 'Bearer a=b' } })
      );
    });

    it('should print JSON with --json', async () => {
      mockProcessPayment.mockResolvedValue({ id: 'TXN-2' });
      await createPayCommand().parseAsync(['node', 'test', 'CRYPTO', '20', '--json']);
      expect(consoleSpy).toHaveBeenCalledWith('{"id":"TXN-2"}');
    });

    it('should reject a non-positive amount', async () => {
      const cmd = createPayCommand().exitOverride().configureOutput({ writeErr: () => {} });

      await expect(cmd.parseAsync(['node', 'test', 'PAYPAL', '--', '-3'])).rejects.toThrow(
        'Amount must be a positive number'
      );
      await expect(
        createPayCommand()
          .exitOverride()
          .configureOutput({ writeErr: () => {} })
          .parseAsync(['node', 'test', 'PAYPAL', '0'])
      ).rejects.toThrow('Amount must be a positive number');
      expect(mockProcessPayment).not.toHaveBeenCalled();
    });

    it('should exit with the server error', async () => {
      mockProcessPayment.mockRejectedValue(new Error('HTTP 400: Card has expired'));

      await expect(
        createPayCommand().parseAsync(['node', 'test', 'CREDIT_CARD', '10'])
      ).rejects.toThrow('process.exit(1)');
      expect(consoleErrorSpy).toHaveBeenCalledWith('Failed to process payment:', 'HTTP 400: Card has expired');
    });
  });

  describe('fee', () => {
    it('should print the fee in the chosen currency', async () => {
      mockEstimateFee.mockResolvedValue({ method: 'CREDIT_CARD', amount: 100, fee: 3.2 });

      await createFeeCommand().parseAsync(['node', 'test', 'credit_card', '100']);

      expect(mockEstimateFee).toHaveBeenCalledWith({ method: 'CREDIT_CARD', amount: 100, currency: 'EUR' });
      expect(consoleSpy).toHaveBeenCalledWith('CREDIT_CARD fee for 100.00 EUR: 3.20 EUR');
    });
  });
});
