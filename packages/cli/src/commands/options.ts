// @switchyard/cli - Shared option parsing

import { InvalidArgumentError } from 'commander';
import { getResolvedConfig } from '../config.js';
import type { OutputFormat } from '../types.js';

/**
 * Collect repeated `key=value` options into a record
 */
export function collectPair(value: string, previous: Record<string, string>): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}"`);
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

/**
 * Parse a positive amount argument
 */
export function parseAmount(value: string): number {
  const amount = Number(value);
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new InvalidArgumentError('Amount must be a positive number');
  }
  return amount;
}

export function outputFormat(json: boolean | undefined): OutputFormat {
  return json ? 'json' : getResolvedConfig().outputFormat;
}

export function errorMessage(error: unknown): unknown {
  return error instanceof Error ? error.message : error;
}
