import type { NotificationHandlerOptions } from "../base-handler.js";
import type { NotificationHandler } from "../types.js";
import { EmailHandler } from "./email.js";
import { PushHandler } from "./push.js";
import { SlackHandler } from "./slack.js";
import { SmsHandler } from "./sms.js";

export { EmailHandler, EMAIL_COST } from "./email.js";
export { SmsHandler, smsSegments } from "./sms.js";
export { PushHandler, pushPayloadSize, PUSH_COST } from "./push.js";
export { SlackHandler } from "./slack.js";

/**
 * One handler per channel, sharing the same options
 */
export function createNotificationHandlers(
  options: NotificationHandlerOptions = {}
): NotificationHandler[] {
  return [
    new EmailHandler(options),
    new SmsHandler(options),
    new PushHandler(options),
    new SlackHandler(options),
  ];
}
