// @switchyard/cli - Public API

export { VERSION } from './version.js';

// Types
export type {
  CliConfig,
  OutputFormat,
  Priority,
  PaymentOptions,
  NotificationOptions,
  PaymentResult,
  NotificationResult,
  FeeEstimate,
  CostEstimate,
  ServerStatus,
} from './types.js';
export { DEFAULT_CONFIG, OUTPUT_FORMATS, PRIORITIES } from './types.js';

// Config utilities
export {
  loadConfig,
  saveConfig,
  getConfigPath,
  getConfigDir,
  getConfigValue,
  setConfigValue,
  getResolvedConfig,
} from './config.js';

// API client
export { ApiClient, ApiError, parseErrorBody, formatPayment, formatNotification } from './api.js';
