import { check } from "../../validation.js";
import { BaseNotificationHandler, notificationField } from "../base-handler.js";
import type { NotificationRequest } from "../types.js";

const E164_PATTERN = /^\+[1-9]\d{1,14}$/;

export const SMS_SEGMENT_LENGTH = 160;
export const SMS_MESSAGE_MAX_LENGTH = 1600;
/** Cost per segment in minor units */
export const SMS_SEGMENT_COST = 5;

/**
 * Number of 160-character segments a message is billed as
 */
export function smsSegments(message: string): number {
  return Math.ceil(message.length / SMS_SEGMENT_LENGTH);
}

export class SmsHandler extends BaseNotificationHandler {
  readonly key = "SMS";
  readonly requiredFields = ["recipient", "message"] as const;
  protected readonly failureMessage = "SMS gateway unavailable";
  protected readonly providerPrefix = "SMSGW";

  protected checkRules(request: NotificationRequest, errors: string[]): void {
    const recipient = notificationField(request, "recipient");
    if (recipient !== undefined) {
      check(errors, E164_PATTERN.test(recipient), "Phone number must be in E.164 format");
    }
    check(
      errors,
      request.message.length <= SMS_MESSAGE_MAX_LENGTH,
      `SMS message must not exceed ${SMS_MESSAGE_MAX_LENGTH} characters`
    );
  }

  estimateCost(request: NotificationRequest): number {
    return (smsSegments(request.message) * SMS_SEGMENT_COST) / 100;
  }
}
