/**
 * Shared behaviour of the notification handlers
 */

import {
  ProcessingError,
  idGenerator,
  isBlank,
  mathRandom,
  requiredMessage,
  shouldFail,
  systemClock,
  toValidationResult,
  type Clock,
  type IdGenerator,
  type RandomSource,
  type ValidationResult,
} from "@switchyard/core";
import type {
  NotificationChannel,
  NotificationHandler,
  NotificationRequest,
  NotificationResult,
} from "./types.js";

export interface NotificationHandlerOptions {
  random?: RandomSource;
  clock?: Clock;
  /** Chance that a delivery fails (0..1) */
  failureRate?: number;
  /** Notification ID generator, NOTIF-XXXXXXXX by default */
  ids?: IdGenerator;
}

export const DEFAULT_NOTIFICATION_FAILURE_RATE = 0.05;

const notificationIds = idGenerator("NOTIF");

/**
 * Read a notification field. `recipient`, `subject` and `message` live on the
 * request; anything else is looked up in `metadata`. Blank values read as
 * absent.
 */
export function notificationField(
  request: NotificationRequest,
  field: string
): string | undefined {
  let value: string | undefined;
  switch (field) {
    case "recipient":
      value = request.recipient;
      break;
    case "subject":
      value = request.subject;
      break;
    case "message":
      value = request.message;
      break;
    default:
      value = request.metadata[field];
  }
  return isBlank(value) ? undefined : value;
}

export abstract class BaseNotificationHandler implements NotificationHandler {
  abstract readonly key: NotificationChannel;
  abstract readonly requiredFields: readonly string[];

  /** Message of the ProcessingError thrown on a simulated delivery failure */
  protected abstract readonly failureMessage: string;
  /** Prefix of the simulated provider reference */
  protected abstract readonly providerPrefix: string;

  protected readonly random: RandomSource;
  protected readonly clock: Clock;
  protected readonly failureRate: number;
  private readonly ids: IdGenerator;

  constructor(options: NotificationHandlerOptions = {}) {
    this.random = options.random ?? mathRandom;
    this.clock = options.clock ?? systemClock;
    this.failureRate = options.failureRate ?? DEFAULT_NOTIFICATION_FAILURE_RATE;
    this.ids = options.ids ?? notificationIds;
  }

  protected abstract checkRules(request: NotificationRequest, errors: string[]): void;

  abstract estimateCost(request: NotificationRequest): number;

  validate(request: NotificationRequest): ValidationResult {
    const errors = this.requiredFields
      .filter((field) => notificationField(request, field) === undefined)
      .map(requiredMessage);
    this.checkRules(request, errors);
    return toValidationResult(errors);
  }

  execute(request: NotificationRequest): NotificationResult {
    if (shouldFail(this.random, this.failureRate)) {
      throw new ProcessingError(this.key, this.failureMessage);
    }

    const id = this.ids();
    const result: NotificationResult = {
      status: "COMPLETED",
      id,
      cost: this.estimateCost(request),
      timestamp: this.clock(),
      channel: this.key,
      providerReference: `${this.providerPrefix}-${id.slice(id.indexOf("-") + 1)}`,
    };
    return Object.freeze(result);
  }
}
