import { check } from "../../validation.js";
import { BaseNotificationHandler, notificationField } from "../base-handler.js";
import type { NotificationRequest } from "../types.js";

const EMAIL_PATTERN = /^[\w+_.-]+@[\w.-]+$/;

export const EMAIL_SUBJECT_MAX_LENGTH = 200;
export const EMAIL_MESSAGE_MAX_LENGTH = 10_000;
export const EMAIL_COST = 0.001;

export class EmailHandler extends BaseNotificationHandler {
  readonly key = "EMAIL";
  readonly requiredFields = ["recipient", "message"] as const;
  protected readonly failureMessage = "Email delivery failed";
  protected readonly providerPrefix = "MAIL";

  protected checkRules(request: NotificationRequest, errors: string[]): void {
    const recipient = notificationField(request, "recipient");
    if (recipient !== undefined) {
      check(errors, EMAIL_PATTERN.test(recipient), "Invalid email address");
    }

    const subject = request.subject ?? "";
    check(
      errors,
      subject.length <= EMAIL_SUBJECT_MAX_LENGTH,
      `Subject must not exceed ${EMAIL_SUBJECT_MAX_LENGTH} characters`
    );
    check(
      errors,
      request.message.length <= EMAIL_MESSAGE_MAX_LENGTH,
      `Message must not exceed ${EMAIL_MESSAGE_MAX_LENGTH} characters`
    );
  }

  estimateCost(_request: NotificationRequest): number {
    return EMAIL_COST;
  }
}
