// @switchyard/cli - Configuration management

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { CliConfig, DEFAULT_CONFIG } from './types.js';

export function getConfigDir(): string {
  return path.join(os.homedir(), '.switchyard');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/**
 * Ensure the config directory exists
 */
export function ensureConfigDir(): void {
  const configDir = getConfigDir();
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true });
  }
}

/**
 * Load configuration from disk, falling back to defaults
 */
export function loadConfig(): CliConfig {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const config = JSON.parse(content) as Partial<CliConfig>;
    return { ...DEFAULT_CONFIG, ...config };
  } catch {
    console.error(`Warning: Failed to parse config at ${configPath}, using defaults`);
    return { ...DEFAULT_CONFIG };
  }
}

export function saveConfig(config: CliConfig): void {
  ensureConfigDir();
  fs.writeFileSync(getConfigPath(), JSON.stringify(config, null, 2), 'utf-8');
}

export function getConfigValue<K extends keyof CliConfig>(key: K): CliConfig[K] {
  return loadConfig()[key];
}

export function setConfigValue<K extends keyof CliConfig>(key: K, value: CliConfig[K]): void {
  const config = loadConfig();
  config[key] = value;
  saveConfig(config);
}

/**
 * Get the resolved configuration with all defaults applied.
 * SWITCHYARD_URL overrides the stored server URL.
 */
export function getResolvedConfig(): Required<CliConfig> {
  const config = loadConfig();
  return {
    serverUrl: process.env.SWITCHYARD_URL || config.serverUrl || DEFAULT_CONFIG.serverUrl,
    timeout: config.timeout ?? DEFAULT_CONFIG.timeout,
    outputFormat: config.outputFormat ?? DEFAULT_CONFIG.outputFormat,
  };
}
