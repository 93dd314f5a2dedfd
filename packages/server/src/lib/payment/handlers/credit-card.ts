/**
 * Credit card payments
 *
 * Fee: 2.9% + €0.30
 */

import { percentageFee } from "@switchyard/core";
import { check, passesLuhnCheck } from "../../validation.js";
import { BasePaymentHandler, detail } from "../base-handler.js";
import type { PaymentRequest } from "../types.js";

const CARD_NUMBER_SEPARATORS = /[\s-]/g;
const CARD_NUMBER_PATTERN = /^\d{13,19}$/;
const CVV_PATTERN = /^\d{3,4}$/;
const EXPIRY_PATTERN = /^(0[1-9]|1[0-2])\/(\d{4})$/;

export const CREDIT_CARD_FEE = { rateBasisPoints: 290, fixedMinorUnits: 30 };

export class CreditCardHandler extends BasePaymentHandler {
  readonly key = "CREDIT_CARD";
  readonly requiredFields = ["cardNumber", "cvv", "expiryDate", "cardHolderName"] as const;

  protected checkRules(request: PaymentRequest, errors: string[]): void {
    const cardNumber = detail(request, "cardNumber");
    if (cardNumber !== undefined) {
      const digits = cardNumber.replace(CARD_NUMBER_SEPARATORS, "");
      if (!CARD_NUMBER_PATTERN.test(digits)) {
        errors.push("Card number must be 13-19 digits");
      } else {
        check(errors, passesLuhnCheck(digits), "Invalid card number - failed Luhn check");
      }
    }

    const cvv = detail(request, "cvv");
    if (cvv !== undefined) {
      check(errors, CVV_PATTERN.test(cvv), "CVV must be 3-4 digits");
    }

    const expiryDate = detail(request, "expiryDate");
    if (expiryDate !== undefined) {
      const error = this.checkExpiry(expiryDate);
      if (error) errors.push(error);
    }
  }

  estimateCost(request: PaymentRequest): number {
    return percentageFee(request.amount, CREDIT_CARD_FEE);
  }

  // A card is valid through the last day of its expiry month
  private checkExpiry(expiryDate: string): string | null {
    const match = EXPIRY_PATTERN.exec(expiryDate);
    if (!match) return "Expiry date must be in MM/yyyy format";

    const month = Number(match[1]);
    const year = Number(match[2]);
    const now = new Date(this.clock());
    const currentMonth = now.getFullYear() * 12 + now.getMonth() + 1;

    return year * 12 + month < currentMonth ? "Card has expired" : null;
  }
}
