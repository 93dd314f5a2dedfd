/**
 * Notification domain types
 */

import type { ExecutionResult, Handler } from "@switchyard/core";

/**
 * Supported delivery channels (the notification discriminant)
 */
export const NotificationChannels = ["EMAIL", "SMS", "PUSH", "SLACK"] as const;

export type NotificationChannel = (typeof NotificationChannels)[number];

export const Priorities = ["low", "normal", "high", "critical"] as const;

export type Priority = (typeof Priorities)[number];

/**
 * A notification to deliver
 */
export interface NotificationRequest {
  readonly channel: NotificationChannel;
  /** Email address, E.164 phone number, device token or Slack target */
  readonly recipient: string;
  readonly subject?: string;
  readonly message: string;
  /** Channel-specific extras; also counted in the push payload size */
  readonly metadata: Readonly<Record<string, string>>;
  readonly priority: Priority;
}

/**
 * Outcome of a delivered notification. `cost` is the delivery cost.
 */
export interface NotificationResult extends ExecutionResult {
  readonly channel: NotificationChannel;
}

export type NotificationHandler = Handler<
  NotificationChannel,
  NotificationRequest,
  NotificationResult
>;
