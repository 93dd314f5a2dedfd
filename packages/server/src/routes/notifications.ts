/**
 * Notification routes
 *
 * POST /api/notifications/send → Validate and deliver a notification
 * POST /api/notifications/cost → Delivery cost estimate, nothing is sent
 */

import { Hono } from "hono";
import { z } from "zod";
import { getConfig } from "../config.js";
import { toErrorResponse } from "../lib/http-errors.js";
import {
  Priorities,
  type NotificationRequest,
  type NotificationService,
} from "../lib/notification/index.js";
import { parseBody, stringMap } from "./body.js";

export const notificationBodySchema = z.object({
  channel: z.string({ required_error: "Channel is required" }),
  // Blank or missing recipient/message are reported by the channel handler
  recipient: z.string().default(""),
  subject: z.string().optional(),
  message: z.string().default(""),
  metadata: stringMap,
  priority: z.enum(Priorities).default("normal"),
});

export type NotificationBody = z.output<typeof notificationBodySchema>;

/**
 * @throws UnsupportedDiscriminantError for an unknown channel
 */
export function toNotificationRequest(
  service: NotificationService,
  body: NotificationBody
): NotificationRequest {
  return {
    channel: service.registry.resolve(body.channel).key,
    recipient: body.recipient,
    subject: body.subject,
    message: body.message,
    metadata: body.metadata,
    priority: body.priority,
  };
}

export function createNotificationsRouter(service: NotificationService): Hono {
  const router = new Hono();

  router.onError((err, c) => {
    const { status, body } = toErrorResponse(err, {
      domain: "Notification",
      isProduction: getConfig().isProduction,
    });
    return c.json(body, status);
  });

  router.post("/send", async (c) => {
    const body = await parseBody(c, notificationBodySchema);
    const result = service.dispatch(toNotificationRequest(service, body));
    return c.json(result);
  });

  router.post("/cost", async (c) => {
    const body = await parseBody(c, notificationBodySchema);
    const request = toNotificationRequest(service, body);
    return c.json({ channel: request.channel, cost: service.estimateCost(request) });
  });

  return router;
}
