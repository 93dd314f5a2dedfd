// @switchyard/cli - Types

export const OUTPUT_FORMATS = ['json', 'table', 'plain'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * CLI configuration stored in ~/.switchyard/config.json
 */
export interface CliConfig {
  /** Server URL for the Switchyard server */
  serverUrl?: string;
  /** Default timeout for requests in milliseconds */
  timeout?: number;
  /** Output format preference */
  outputFormat?: OutputFormat;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Required<CliConfig> = {
  serverUrl: 'http://localhost:3000',
  timeout: 30000,
  outputFormat: 'table',
};

export const PRIORITIES = ['low', 'normal', 'high', 'critical'] as const;

export type Priority = (typeof PRIORITIES)[number];

/**
 * Payment to process or price
 */
export interface PaymentOptions {
  method: string;
  amount: number;
  currency: string;
  details?: Record<string, string>;
}

/**
 * Notification to send or price
 */
export interface NotificationOptions {
  channel: string;
  recipient: string;
  message: string;
  subject?: string;
  metadata?: Record<string, string>;
  priority?: Priority;
}

/**
 * Processed payment as returned by the server
 */
export interface PaymentResult {
  status: 'COMPLETED' | 'FAILED';
  id: string;
  method: string;
  currency: string;
  netAmount: number;
  cost: number;
  grossAmount: number;
  timestamp: number;
}

/**
 * Delivered notification as returned by the server
 */
export interface NotificationResult {
  status: 'COMPLETED' | 'FAILED';
  id: string;
  channel: string;
  cost: number;
  timestamp: number;
  providerReference?: string;
}

export interface FeeEstimate {
  method: string;
  amount: number;
  fee: number;
}

export interface CostEstimate {
  channel: string;
  cost: number;
}

export interface ServerStatus {
  status: string;
  timestamp: string;
  paymentMethods: string[];
  channels: string[];
}
