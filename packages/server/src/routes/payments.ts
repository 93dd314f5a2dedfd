/**
 * Payment routes
 *
 * POST /api/payments/process → Validate and process a payment
 * POST /api/payments/fee     → Fee estimate for a payment, nothing is charged
 */

import { Hono } from "hono";
import { z } from "zod";
import { getConfig } from "../config.js";
import { toErrorResponse } from "../lib/http-errors.js";
import { Currencies, type PaymentRequest, type PaymentService } from "../lib/payment/index.js";
import { parseBody, stringMap } from "./body.js";

export const paymentBodySchema = z.object({
  amount: z.number({ required_error: "Amount is required" }).positive("Amount must be greater than zero"),
  currency: z.enum(Currencies, {
    errorMap: () => ({ message: `Currency must be one of ${Currencies.join(", ")}` }),
  }),
  method: z.string({ required_error: "Payment method is required" }),
  paymentDetails: stringMap,
});

export type PaymentBody = z.output<typeof paymentBodySchema>;

/**
 * Turn a parsed body into a PaymentRequest
 *
 * @throws UnsupportedDiscriminantError for an unknown method
 */
export function toPaymentRequest(service: PaymentService, body: PaymentBody): PaymentRequest {
  return {
    method: service.registry.resolve(body.method).key,
    amount: body.amount,
    currency: body.currency,
    details: body.paymentDetails,
  };
}

export function createPaymentsRouter(service: PaymentService): Hono {
  const router = new Hono();

  router.onError((err, c) => {
    const { status, body } = toErrorResponse(err, {
      domain: "Payment",
      isProduction: getConfig().isProduction,
    });
    return c.json(body, status);
  });

  router.post("/process", async (c) => {
    const body = await parseBody(c, paymentBodySchema);
    const result = service.dispatch(toPaymentRequest(service, body));
    return c.json(result);
  });

  router.post("/fee", async (c) => {
    const body = await parseBody(c, paymentBodySchema);
    const request = toPaymentRequest(service, body);
    return c.json({
      method: request.method,
      amount: request.amount,
      fee: service.estimateCost(request),
    });
  });

  return router;
}
