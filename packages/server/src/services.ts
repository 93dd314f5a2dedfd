/**
 * Wire the payment and notification services from config
 */

import { createEmitter, type DispatchEmitter } from "@switchyard/core";
import type { Config } from "./config.js";
import { NotificationService } from "./lib/notification/index.js";
import { PaymentService } from "./lib/payment/index.js";

export interface Services {
  emitter: DispatchEmitter;
  payments: PaymentService;
  notifications: NotificationService;
}

export function createServices(
  config: Config,
  emitter: DispatchEmitter = createEmitter()
): Services {
  return {
    emitter,
    payments: new PaymentService({
      emitter,
      failureRate: config.paymentFailureRate,
      congestionRate: config.cryptoCongestionRate,
      congestionFailureRate: config.cryptoCongestionFailureRate,
    }),
    notifications: new NotificationService({
      emitter,
      failureRate: config.notificationFailureRate,
    }),
  };
}
