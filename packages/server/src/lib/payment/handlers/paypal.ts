/**
 * PayPal payments
 *
 * Fee: 3.4% + €0.35
 */

import { percentageFee } from "@switchyard/core";
import { check } from "../../validation.js";
import { BasePaymentHandler, detail } from "../base-handler.js";
import type { PaymentRequest } from "../types.js";

// Only gmail accounts are accepted by the simulated gateway
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@gmail\.com$/;
const TOKEN_PATTERN = /^Bearer [a-fA-F0-9]{10}$/;

export const PAYPAL_FEE = { rateBasisPoints: 340, fixedMinorUnits: 35 };

export class PayPalHandler extends BasePaymentHandler {
  readonly key = "PAYPAL";
  readonly requiredFields = ["email", "token"] as const;

  protected checkRules(request: PaymentRequest, errors: string[]): void {
    const email = detail(request, "email");
    if (email !== undefined) {
      check(errors, EMAIL_PATTERN.test(email), "Email must be in format: smth@gmail.com");
    }

    const token = detail(request, "token");
    if (token !== undefined) {
      check(
        errors,
        TOKEN_PATTERN.test(token),
        "Token must be in format: Bearer [10 hex characters]"
      );
    }
  }

  estimateCost(request: PaymentRequest): number {
    return percentageFee(request.amount, PAYPAL_FEE);
  }
}
