// @switchyard/cli - CLI tests

import { describe, it, expect } from 'vitest';
import { VERSION } from './version.js';
import { DEFAULT_CONFIG } from './types.js';
import {
  createConfigCommand,
  createCostCommand,
  createFeeCommand,
  createNotifyCommand,
  createPayCommand,
  createStatusCommand,
} from './commands/index.js';

describe('CLI', () => {
  it('should export version string', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('should have correct default config', () => {
    expect(DEFAULT_CONFIG).toEqual({
      serverUrl: 'http://localhost:3000',
      timeout: 30000,
      outputFormat: 'table',
    });
  });

  it('should name every command', () => {
    const names = [
      createPayCommand(),
      createFeeCommand(),
      createNotifyCommand(),
      createCostCommand(),
      createStatusCommand(),
      createConfigCommand(),
    ].map((command) => command.name());
    expect(names).toEqual(['pay', 'fee', 'notify', 'cost', 'status', 'config']);
  });
});
