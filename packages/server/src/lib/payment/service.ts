/**
 * Payment dispatching service
 */

import {
  Dispatcher,
  HandlerRegistry,
  type DispatchEmitter,
} from "@switchyard/core";
import { detail } from "./base-handler.js";
import { createPaymentHandlers, type PaymentHandlersOptions } from "./handlers/index.js";
import {
  PaymentMethods,
  type PaymentHandler,
  type PaymentMethod,
  type PaymentRequest,
  type PaymentResult,
} from "./types.js";

export const PAYMENT_SOURCE = "payments";

export function createPaymentRegistry(
  handlers: readonly PaymentHandler[]
): HandlerRegistry<PaymentMethod, PaymentHandler> {
  return new HandlerRegistry({
    label: "Payment method",
    keys: PaymentMethods,
    handlers,
  });
}

export interface PaymentServiceOptions extends PaymentHandlersOptions {
  emitter?: DispatchEmitter;
  /** Replaces the default handler set */
  handlers?: readonly PaymentHandler[];
}

export class PaymentService extends Dispatcher<
  PaymentMethod,
  PaymentRequest,
  PaymentResult
> {
  constructor(options: PaymentServiceOptions = {}) {
    const { emitter, handlers, ...handlerOptions } = options;
    super(createPaymentRegistry(handlers ?? createPaymentHandlers(handlerOptions)), {
      source: PAYMENT_SOURCE,
      emitter,
    });
  }

  protected keyOf(request: PaymentRequest): string {
    return request.method;
  }

  protected readField(request: PaymentRequest, field: string): string | undefined {
    return detail(request, field);
  }
}
