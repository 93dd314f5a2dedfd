/**
 * Rule helpers shared by payment and notification handlers
 */

/**
 * Luhn checksum over a string of digits
 *
 * Starting from the right, every second digit is doubled (minus 9 when the
 * result exceeds 9); the number is valid when the sum is a multiple of 10.
 */
export function passesLuhnCheck(digits: string): boolean {
  let sum = 0;
  let alternate = false;

  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = digits.charCodeAt(i) - 48;
    if (digit < 0 || digit > 9) return false;

    if (alternate) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }

    sum += digit;
    alternate = !alternate;
  }

  return sum % 10 === 0;
}

/**
 * UTF-8 byte length of a string
 */
export function byteLength(value: string): number {
  return Buffer.byteLength(value, "utf8");
}

/**
 * Push `message` onto `errors` unless `valid`
 */
export function check(errors: string[], valid: boolean, message: string): void {
  if (!valid) errors.push(message);
}
