import { BankTransferHandler } from "./bank-transfer.js";
import { CreditCardHandler } from "./credit-card.js";
import { CryptoHandler, type CryptoHandlerOptions } from "./crypto.js";
import { PayPalHandler } from "./paypal.js";
import type { PaymentHandlerOptions } from "../base-handler.js";
import type { PaymentHandler } from "../types.js";

export type PaymentHandlersOptions = PaymentHandlerOptions & CryptoHandlerOptions;

export { BankTransferHandler } from "./bank-transfer.js";
export { CreditCardHandler, CREDIT_CARD_FEE } from "./credit-card.js";
export {
  CryptoHandler,
  CryptoNetworks,
  parseNetwork,
  CRYPTO_MINIMUM_AMOUNT,
  NETWORK_CONGESTION,
  type CryptoNetwork,
  type CryptoHandlerOptions,
} from "./crypto.js";
export { PayPalHandler, PAYPAL_FEE } from "./paypal.js";

/**
 * One handler per payment method, sharing the same options
 */
export function createPaymentHandlers(options: PaymentHandlersOptions = {}): PaymentHandler[] {
  return [
    new CreditCardHandler(options),
    new PayPalHandler(options),
    new CryptoHandler(options),
    new BankTransferHandler(options),
  ];
}
