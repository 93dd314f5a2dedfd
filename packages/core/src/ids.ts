/**
 * Identifier generation
 *
 * IDs look like `TXN-3F9A01BC`: a prefix and 8 uppercase hex characters from
 * nanoid's crypto-backed generator.
 */

import { customAlphabet } from "nanoid";

const hexSuffix = customAlphabet("0123456789ABCDEF", 8);

export type IdGenerator = () => string;

export function generateId(prefix: string): string {
  return `${prefix}-${hexSuffix()}`;
}

/**
 * Bind a prefix to get an IdGenerator
 */
export function idGenerator(prefix: string): IdGenerator {
  return () => generateId(prefix);
}
