/**
 * Shared behaviour of the payment handlers
 *
 * Subclasses declare their method, required detail fields, rules and fee;
 * this class supplies the required-field pass, failure simulation and result
 * building.
 */

import {
  ProcessingError,
  addAmounts,
  idGenerator,
  isBlank,
  mathRandom,
  requiredMessage,
  shouldFail,
  systemClock,
  toValidationResult,
  type Clock,
  type IdGenerator,
  type RandomSource,
  type ValidationResult,
} from "@switchyard/core";
import type {
  PaymentHandler,
  PaymentMethod,
  PaymentRequest,
  PaymentResult,
} from "./types.js";

export const INSUFFICIENT_FUNDS = "Insufficient funds";

/**
 * Options shared by every payment handler
 */
export interface PaymentHandlerOptions {
  /** Draws for failure simulation and variable fees */
  random?: RandomSource;
  clock?: Clock;
  /** Chance that a valid payment is declined (0..1) */
  failureRate?: number;
  /** Transaction ID generator, TXN-XXXXXXXX by default */
  ids?: IdGenerator;
}

export const DEFAULT_PAYMENT_FAILURE_RATE = 0.1;

const transactionIds = idGenerator("TXN");

/**
 * Other detail keys accepted for a field, as sent by snake_case clients
 */
export const DETAIL_ALIASES: Readonly<Record<string, readonly string[]>> = {
  accountHolderName: ["card_holder_name"],
};

/**
 * Read a payment detail, treating blank values as absent
 */
export function detail(request: PaymentRequest, field: string): string | undefined {
  for (const key of [field, ...(DETAIL_ALIASES[field] ?? [])]) {
    const value = request.details[key];
    if (!isBlank(value)) return value;
  }
  return undefined;
}

export abstract class BasePaymentHandler implements PaymentHandler {
  abstract readonly key: PaymentMethod;
  abstract readonly requiredFields: readonly string[];

  protected readonly random: RandomSource;
  protected readonly clock: Clock;
  protected readonly failureRate: number;
  private readonly ids: IdGenerator;

  constructor(options: PaymentHandlerOptions = {}) {
    this.random = options.random ?? mathRandom;
    this.clock = options.clock ?? systemClock;
    this.failureRate = options.failureRate ?? DEFAULT_PAYMENT_FAILURE_RATE;
    this.ids = options.ids ?? transactionIds;
  }

  /**
   * Append rule violations for `request` to `errors`. Rules skip fields that
   * are missing; those are already reported as required.
   */
  protected abstract checkRules(request: PaymentRequest, errors: string[]): void;

  abstract estimateCost(request: PaymentRequest): number;

  validate(request: PaymentRequest): ValidationResult {
    const errors = this.requiredFields
      .filter((field) => detail(request, field) === undefined)
      .map(requiredMessage);
    this.checkRules(request, errors);
    return toValidationResult(errors);
  }

  execute(request: PaymentRequest): PaymentResult {
    this.simulateFailure();

    const fee = this.estimateCost(request);
    const result: PaymentResult = {
      status: "COMPLETED",
      id: this.ids(),
      cost: fee,
      timestamp: this.clock(),
      method: this.key,
      currency: request.currency,
      netAmount: request.amount,
      grossAmount: addAmounts(request.amount, fee),
    };
    return Object.freeze(result);
  }

  /**
   * Decline the payment with probability `failureRate`
   */
  protected simulateFailure(): void {
    if (shouldFail(this.random, this.failureRate)) {
      throw new ProcessingError(this.key, INSUFFICIENT_FUNDS);
    }
  }
}
