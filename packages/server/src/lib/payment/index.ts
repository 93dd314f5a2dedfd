/**
 * Payment domain
 */

export * from "./types.js";
export {
  BasePaymentHandler,
  DEFAULT_PAYMENT_FAILURE_RATE,
  INSUFFICIENT_FUNDS,
  detail,
  type PaymentHandlerOptions,
} from "./base-handler.js";
export * from "./handlers/index.js";
export {
  PaymentService,
  PAYMENT_SOURCE,
  createPaymentRegistry,
  type PaymentServiceOptions,
} from "./service.js";
