/**
 * Notification dispatching service
 */

import {
  Dispatcher,
  HandlerRegistry,
  type DispatchEmitter,
} from "@switchyard/core";
import { notificationField, type NotificationHandlerOptions } from "./base-handler.js";
import { createNotificationHandlers } from "./handlers/index.js";
import {
  NotificationChannels,
  type NotificationChannel,
  type NotificationHandler,
  type NotificationRequest,
  type NotificationResult,
} from "./types.js";

export const NOTIFICATION_SOURCE = "notifications";

export function createNotificationRegistry(
  handlers: readonly NotificationHandler[]
): HandlerRegistry<NotificationChannel, NotificationHandler> {
  return new HandlerRegistry({
    label: "Channel",
    keys: NotificationChannels,
    handlers,
  });
}

export interface NotificationServiceOptions extends NotificationHandlerOptions {
  emitter?: DispatchEmitter;
  handlers?: readonly NotificationHandler[];
}

export class NotificationService extends Dispatcher<
  NotificationChannel,
  NotificationRequest,
  NotificationResult
> {
  constructor(options: NotificationServiceOptions = {}) {
    const { emitter, handlers, ...handlerOptions } = options;
    super(
      createNotificationRegistry(handlers ?? createNotificationHandlers(handlerOptions)),
      { source: NOTIFICATION_SOURCE, emitter }
    );
  }

  protected keyOf(request: NotificationRequest): string {
    return request.channel;
  }

  protected readField(request: NotificationRequest, field: string): string | undefined {
    return notificationField(request, field);
  }
}
