import { check } from "../../validation.js";
import { BaseNotificationHandler, notificationField } from "../base-handler.js";
import type { NotificationRequest } from "../types.js";

// #channel or @user
const SLACK_TARGET_PATTERN = /^[#@][\w-]+$/;

export const SLACK_MESSAGE_MAX_LENGTH = 4000;

export class SlackHandler extends BaseNotificationHandler {
  readonly key = "SLACK";
  readonly requiredFields = ["recipient", "message"] as const;
  protected readonly failureMessage = "Slack API unavailable";
  protected readonly providerPrefix = "SLACK";

  protected checkRules(request: NotificationRequest, errors: string[]): void {
    const recipient = notificationField(request, "recipient");
    if (recipient !== undefined) {
      check(
        errors,
        SLACK_TARGET_PATTERN.test(recipient),
        "Slack recipient must be a #channel or @user"
      );
    }
    check(
      errors,
      request.message.length <= SLACK_MESSAGE_MAX_LENGTH,
      `Slack message must not exceed ${SLACK_MESSAGE_MAX_LENGTH} characters`
    );
  }

  estimateCost(_request: NotificationRequest): number {
    return 0;
  }
}
