// @switchyard/cli - API client

import { getResolvedConfig } from './config.js';
import type {
  CostEstimate,
  FeeEstimate,
  NotificationOptions,
  NotificationResult,
  OutputFormat,
  PaymentOptions,
  PaymentResult,
  ServerStatus,
} from './types.js';

/**
 * Non-2xx response from the server
 */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly errors: string[]
  ) {
    super(`HTTP ${status}: ${errors.join(', ')}`);
    this.name = 'ApiError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the messages out of a `{ errors: [...] }` or `{ error: "..." }` body
 */
export function parseErrorBody(body: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return [body];
  }

  if (isRecord(parsed)) {
    if (Array.isArray(parsed.errors)) return parsed.errors.map(String);
    if (typeof parsed.error === 'string') return [parsed.error];
  }
  return [body];
}

/**
 * API client for the Switchyard server
 */
export class ApiClient {
  private baseUrl: string;
  private timeout: number;

  constructor() {
    const config = getResolvedConfig();
    this.baseUrl = config.serverUrl;
    this.timeout = config.timeout;
  }

  private async fetch<T>(endpoint: string, options: RequestInit = {}): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        ...options,
        signal: controller.signal,
        headers: {
          'Content-Type': 'application/json',
          ...options.headers,
        },
      });

      if (!response.ok) {
        throw new ApiError(response.status, parseErrorBody(await response.text()));
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Validate and process a payment
   */
  async processPayment(options: PaymentOptions): Promise<PaymentResult> {
    return this.fetch<PaymentResult>('/api/payments/process', {
      method: 'POST',
      body: JSON.stringify(paymentBody(options)),
    });
  }

  /**
   * Fee a payment would be charged, without processing it
   */
  async estimateFee(options: PaymentOptions): Promise<FeeEstimate> {
    return this.fetch<FeeEstimate>('/api/payments/fee', {
      method: 'POST',
      body: JSON.stringify(paymentBody(options)),
    });
  }

  /**
   * Validate and deliver a notification
   */
  async sendNotification(options: NotificationOptions): Promise<NotificationResult> {
    return this.fetch<NotificationResult>('/api/notifications/send', {
      method: 'POST',
      body: JSON.stringify(notificationBody(options)),
    });
  }

  /**
   * Cost of a notification, without sending it
   */
  async estimateCost(options: NotificationOptions): Promise<CostEstimate> {
    return this.fetch<CostEstimate>('/api/notifications/cost', {
      method: 'POST',
      body: JSON.stringify(notificationBody(options)),
    });
  }

  async getServerStatus(): Promise<ServerStatus> {
    return this.fetch<ServerStatus>('/health');
  }
}

function paymentBody(options: PaymentOptions) {
  return {
    method: options.method,
    amount: options.amount,
    currency: options.currency,
    paymentDetails: options.details ?? {},
  };
}

function notificationBody(options: NotificationOptions) {
  return {
    channel: options.channel,
    recipient: options.recipient,
    subject: options.subject,
    message: options.message,
    metadata: options.metadata ?? {},
    priority: options.priority ?? 'normal',
  };
}

function formatMoney(amount: number, currency: string): string {
  return `${amount.toFixed(2)} ${currency}`;
}

function statusIcon(status: PaymentResult['status']): string {
  return status === 'COMPLETED' ? '✅' : '❌';
}

function box(title: string, rows: Array<[string, string]>): string {
  return [
    `┌─────────────────────────────────────────────────────────┐`,
    `│ ${title.padEnd(56)}│`,
    `├─────────────────────────────────────────────────────────┤`,
    ...rows.map(([label, value]) => `│ ${`${label}:`.padEnd(10)}${value.padEnd(46)}│`),
    `└─────────────────────────────────────────────────────────┘`,
  ].join('\n');
}

/**
 * Format a processed payment for display
 */
export function formatPayment(result: PaymentResult, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  const time = new Date(result.timestamp).toISOString();

  if (format === 'plain') {
    return [
      `ID: ${result.id}`,
      `Status: ${result.status}`,
      `Method: ${result.method}`,
      `Amount: ${formatMoney(result.netAmount, result.currency)}`,
      `Fee: ${formatMoney(result.cost, result.currency)}`,
      `Total: ${formatMoney(result.grossAmount, result.currency)}`,
      `Time: ${time}`,
    ].join('\n');
  }

  return box(`${statusIcon(result.status)} Payment: ${result.id}`, [
    ['Method', result.method],
    ['Status', result.status],
    ['Amount', formatMoney(result.netAmount, result.currency)],
    ['Fee', formatMoney(result.cost, result.currency)],
    ['Total', formatMoney(result.grossAmount, result.currency)],
    ['Time', time],
  ]);
}

/**
 * Format a delivered notification for display
 */
export function formatNotification(result: NotificationResult, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  const time = new Date(result.timestamp).toISOString();

  if (format === 'plain') {
    return [
      `ID: ${result.id}`,
      `Status: ${result.status}`,
      `Channel: ${result.channel}`,
      `Cost: ${result.cost}`,
      result.providerReference ? `Reference: ${result.providerReference}` : null,
      `Time: ${time}`,
    ]
      .filter(Boolean)
      .join('\n');
  }

  const rows: Array<[string, string]> = [
    ['Channel', result.channel],
    ['Status', result.status],
    ['Cost', String(result.cost)],
  ];
  if (result.providerReference) rows.push(['Ref', result.providerReference]);
  rows.push(['Time', time]);

  return box(`${statusIcon(result.status)} Notification: ${result.id}`, rows);
}
