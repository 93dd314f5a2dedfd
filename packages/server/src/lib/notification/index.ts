/**
 * Notification domain
 */

export * from "./types.js";
export {
  BaseNotificationHandler,
  DEFAULT_NOTIFICATION_FAILURE_RATE,
  notificationField,
  type NotificationHandlerOptions,
} from "./base-handler.js";
export * from "./handlers/index.js";
export {
  NotificationService,
  NOTIFICATION_SOURCE,
  createNotificationRegistry,
  type NotificationServiceOptions,
} from "./service.js";
