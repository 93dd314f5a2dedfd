/**
 * Injectable randomness and time
 *
 * Handlers never call Math.random or Date.now directly, so tests can force
 * success, failure and fee tiers deterministically.
 */

/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export interface RandomSource {
  next(): number;
}

/**
 * Returns the current time as a Unix timestamp in milliseconds
 */
export type Clock = () => number;

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

export const systemClock: Clock = () => Date.now();

/**
 * A source that replays `values` in order, cycling when exhausted
 */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError("sequenceRandom needs at least one value");
  }
  let index = 0;
  return {
    next() {
      const value = values[index % values.length] ?? 0;
      index++;
      return value;
    },
  };
}

/**
 * Draw once and report whether the draw falls below `rate`
 */
export function shouldFail(random: RandomSource, rate: number): boolean {
  return random.next() < rate;
}
