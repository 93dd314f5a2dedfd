/**
 * Payment domain types
 */

import type { ExecutionResult, Handler } from "@switchyard/core";

/**
 * Supported payment methods (the payment discriminant)
 */
export const PaymentMethods = ["CREDIT_CARD", "PAYPAL", "CRYPTO", "BANK_TRANSFER"] as const;

export type PaymentMethod = (typeof PaymentMethods)[number];

/**
 * Display names, used in error messages and CLI output
 */
export const PaymentMethodNames: Record<PaymentMethod, string> = {
  CREDIT_CARD: "Credit Card",
  PAYPAL: "PayPal",
  CRYPTO: "Cryptocurrency",
  BANK_TRANSFER: "Bank Transfer",
};

export const Currencies = ["EUR", "USD", "GBP"] as const;

export type Currency = (typeof Currencies)[number];

/**
 * A payment to process
 */
export interface PaymentRequest {
  readonly method: PaymentMethod;
  /** Amount in major units, greater than zero */
  readonly amount: number;
  readonly currency: Currency;
  /** Method-specific details (card number, wallet address, ...) */
  readonly details: Readonly<Record<string, string>>;
}

/**
 * Outcome of a processed payment. `cost` is the processing fee.
 */
export interface PaymentResult extends ExecutionResult {
  readonly method: PaymentMethod;
  readonly currency: Currency;
  /** The amount requested */
  readonly netAmount: number;
  /** `netAmount + cost` */
  readonly grossAmount: number;
}

export type PaymentHandler = Handler<PaymentMethod, PaymentRequest, PaymentResult>;
