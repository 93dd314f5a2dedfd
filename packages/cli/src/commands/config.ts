// @switchyard/cli - Config command

import { Command } from 'commander';
import { loadConfig, saveConfig, getConfigPath, setConfigValue } from '../config.js';
import { OUTPUT_FORMATS, type CliConfig, type OutputFormat } from '../types.js';

const CONFIG_KEYS = ['serverUrl', 'timeout', 'outputFormat'] as const;

function isConfigKey(key: string): key is keyof CliConfig {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function createConfigCommand(): Command {
  const config = new Command('config')
    .description('Manage CLI configuration');

  config
    .command('show')
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const currentConfig = loadConfig();

      if (options.json) {
        console.log(JSON.stringify(currentConfig, null, 2));
      } else {
        console.log('Configuration file:', getConfigPath());
        console.log('');
        for (const [key, value] of Object.entries(currentConfig)) {
          console.log(`  ${key}: ${value}`);
        }
      }
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value')
    .action((key: string, value: string) => {
      if (!isConfigKey(key)) {
        console.error(`Invalid key: ${key}`);
        console.error(`Valid keys: ${CONFIG_KEYS.join(', ')}`);
        process.exit(1);
      }

      switch (key) {
        case 'timeout': {
          const timeout = parseInt(value, 10);
          if (isNaN(timeout)) {
            console.error('timeout must be a number');
            process.exit(1);
          }
          setConfigValue('timeout', timeout);
          break;
        }
        case 'outputFormat':
          if (!isOutputFormat(value)) {
            console.error(`outputFormat must be one of: ${OUTPUT_FORMATS.join(', ')}`);
            process.exit(1);
          }
          setConfigValue('outputFormat', value);
          break;
        default:
          setConfigValue(key, value);
      }

      console.log(`Set ${key} = ${value}`);
    });

  config
    .command('get <key>')
    .description('Get a configuration value')
    .action((key: string) => {
      if (!isConfigKey(key)) {
        console.error(`Invalid key: ${key}`);
        console.error(`Valid keys: ${CONFIG_KEYS.join(', ')}`);
        process.exit(1);
      }

      console.log(loadConfig()[key]);
    });

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(() => {
      saveConfig({});
      console.log('Configuration reset to defaults');
    });

  config
    .command('path')
    .description('Show configuration file path')
    .action(() => {
      console.log(getConfigPath());
    });

  return config;
}
