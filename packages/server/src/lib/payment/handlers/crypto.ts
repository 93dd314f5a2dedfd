/**
 * Cryptocurrency payments
 *
 * Fee: 1.0% + a network gas fee drawn per transaction. Valid payments may
 * also hit simulated network congestion, which fails some of them.
 */

import { ProcessingError, percentageFee, shouldFail } from "@switchyard/core";
import { check } from "../../validation.js";
import {
  BasePaymentHandler,
  detail,
  type PaymentHandlerOptions,
} from "../base-handler.js";
import type { PaymentRequest } from "../types.js";

export const CryptoNetworks = ["BITCOIN", "ETHEREUM"] as const;

export type CryptoNetwork = (typeof CryptoNetworks)[number];

const ADDRESS_RULES: Record<CryptoNetwork, { pattern: RegExp; message: string }> = {
  BITCOIN: {
    pattern: /^(1|3|bc1)[a-zA-HJ-NP-Z0-9]{25,62}$/,
    message: "Invalid Bitcoin address format",
  },
  ETHEREUM: {
    pattern: /^0x[a-fA-F0-9]{40}$/,
    message: "Invalid Ethereum address format",
  },
};

export const CRYPTO_MINIMUM_AMOUNT = 10;
export const NETWORK_CONGESTION = "High network congestion - try again";
export const CRYPTO_FEE_BASIS_POINTS = 100;

/**
 * Gas fee tiers in minor units, by upper bound of the draw
 */
const GAS_FEE_TIERS = [
  { below: 0.5, fee: 100 },
  { below: 0.85, fee: 250 },
] as const;
const GAS_FEE_MAX = 500;

/**
 * Crypto payments fail only through congestion, so the flat `failureRate`
 * does not apply
 */
export interface CryptoHandlerOptions extends Omit<PaymentHandlerOptions, "failureRate"> {
  /** Chance that a payment runs into congestion */
  congestionRate?: number;
  /** Chance that a congested payment fails */
  congestionFailureRate?: number;
}

export function parseNetwork(value: string): CryptoNetwork | undefined {
  const upper = value.toUpperCase();
  return CryptoNetworks.find((network) => network === upper);
}

export class CryptoHandler extends BasePaymentHandler {
  readonly key = "CRYPTO";
  readonly requiredFields = ["walletAddress", "network"] as const;

  private readonly congestionRate: number;
  private readonly congestionFailureRate: number;

  constructor(options: CryptoHandlerOptions = {}) {
    super(options);
    this.congestionRate = options.congestionRate ?? 0.15;
    this.congestionFailureRate = options.congestionFailureRate ?? 0.3;
  }

  protected checkRules(request: PaymentRequest, errors: string[]): void {
    check(errors, request.amount >= CRYPTO_MINIMUM_AMOUNT, "Cryptocurrency payment minimum is €10.00");

    const networkName = detail(request, "network");
    if (networkName === undefined) return;

    const network = parseNetwork(networkName);
    if (!network) {
      errors.push("Network type is not supported");
      return;
    }

    const address = detail(request, "walletAddress");
    if (address !== undefined) {
      const rule = ADDRESS_RULES[network];
      check(errors, rule.pattern.test(address), rule.message);
    }
  }

  /**
   * Draws once for the gas fee, so two estimates of the same request may
   * differ
   */
  estimateCost(request: PaymentRequest): number {
    return percentageFee(request.amount, {
      rateBasisPoints: CRYPTO_FEE_BASIS_POINTS,
      fixedMinorUnits: this.gasFee(),
    });
  }

  protected simulateFailure(): void {
    if (
      shouldFail(this.random, this.congestionRate) &&
      shouldFail(this.random, this.congestionFailureRate)
    ) {
      throw new ProcessingError(this.key, NETWORK_CONGESTION);
    }
  }

  // In minor units
  private gasFee(): number {
    const draw = this.random.next();
    const tier = GAS_FEE_TIERS.find((candidate) => draw < candidate.below);
    return tier ? tier.fee : GAS_FEE_MAX;
  }
}
