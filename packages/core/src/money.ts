/**
 * Money arithmetic on exact decimals
 *
 * Amounts cross the API as numbers in major units. Fee formulas run on the
 * amount as given, without rounding it first, and round the fee half-up to
 * 2 decimals at the end.
 */

import { Big } from "big.js";

/**
 * Fee schedule of the form `amount × rate + fixed`
 */
export interface PercentageFee {
  /** Percentage part in basis points (2.9% = 290) */
  rateBasisPoints: number;
  /** Fixed part in minor units (€0.30 = 30) */
  fixedMinorUnits: number;
}

/**
 * `amount × rate + fixed`, rounded half-up to 2 decimals
 */
export function percentageFee(amount: number, fee: PercentageFee): number {
  return new Big(amount)
    .times(fee.rateBasisPoints)
    .div(10_000)
    .plus(new Big(fee.fixedMinorUnits).div(100))
    .round(2, Big.roundHalfUp)
    .toNumber();
}

/**
 * `amount + fee` without float noise
 */
export function addAmounts(amount: number, fee: number): number {
  return new Big(amount).plus(fee).toNumber();
}
