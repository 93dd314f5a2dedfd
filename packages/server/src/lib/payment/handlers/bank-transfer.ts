/**
 * Bank transfer payments (no fee)
 */

import { check } from "../../validation.js";
import { BasePaymentHandler, detail } from "../base-handler.js";
import type { PaymentRequest } from "../types.js";

const IBAN_PATTERN = /^GR\d+$/;
const BIC_PATTERN = /^\d{5}$/;

export class BankTransferHandler extends BasePaymentHandler {
  readonly key = "BANK_TRANSFER";
  readonly requiredFields = ["iban", "bicCode", "accountHolderName"] as const;

  protected checkRules(request: PaymentRequest, errors: string[]): void {
    const iban = detail(request, "iban");
    if (iban !== undefined) {
      check(errors, IBAN_PATTERN.test(iban), "IBAN must be in format: GR[digits]");
    }

    const bicCode = detail(request, "bicCode");
    if (bicCode !== undefined) {
      check(errors, BIC_PATTERN.test(bicCode), "BIC Code is not supported");
    }
  }

  estimateCost(_request: PaymentRequest): number {
    return 0;
  }
}
