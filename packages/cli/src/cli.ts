#!/usr/bin/env node
// @switchyard/cli - CLI entry point

import { Command } from 'commander';
import {
  createConfigCommand,
  createPayCommand,
  createFeeCommand,
  createNotifyCommand,
  createCostCommand,
  createStatusCommand,
} from './commands/index.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('switchyard')
  .description('CLI for processing payments and sending notifications through a Switchyard server')
  .version(VERSION);

program.addCommand(createPayCommand());
program.addCommand(createFeeCommand());
program.addCommand(createNotifyCommand());
program.addCommand(createCostCommand());
program.addCommand(createStatusCommand());
program.addCommand(createConfigCommand());

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
