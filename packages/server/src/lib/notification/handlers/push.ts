import { byteLength, check } from "../../validation.js";
import { BaseNotificationHandler, notificationField } from "../base-handler.js";
import type { NotificationRequest } from "../types.js";

const DEVICE_TOKEN_PATTERN = /^[a-fA-F0-9]{64}$/;

export const PUSH_PAYLOAD_LIMIT_BYTES = 4096;
export const PUSH_COST = 0.0001;

/**
 * UTF-8 size of everything sent to the device: message, subject and every
 * metadata key and value
 */
export function pushPayloadSize(request: NotificationRequest): number {
  let size = byteLength(request.message) + byteLength(request.subject ?? "");
  for (const [key, value] of Object.entries(request.metadata)) {
    size += byteLength(key) + byteLength(value);
  }
  return size;
}

export class PushHandler extends BaseNotificationHandler {
  readonly key = "PUSH";
  readonly requiredFields = ["recipient", "message"] as const;
  protected readonly failureMessage = "Push service unavailable";
  protected readonly providerPrefix = "PUSH";

  protected checkRules(request: NotificationRequest, errors: string[]): void {
    const recipient = notificationField(request, "recipient");
    if (recipient !== undefined) {
      check(errors, DEVICE_TOKEN_PATTERN.test(recipient), "Device token must be 64 hex characters");
    }
    check(
      errors,
      pushPayloadSize(request) < PUSH_PAYLOAD_LIMIT_BYTES,
      "Push payload must be smaller than 4KB"
    );
  }

  estimateCost(_request: NotificationRequest): number {
    return PUSH_COST;
  }
}
