/**
 * Strict parsing of pre-formatted numeric config strings
 * Anything that does not parse cleanly yields undefined.
 */

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)(?:inf|infinity)$/i;
const NAN_PATTERN = /^[+-]?nan$/i;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Parse a base-10 integer: optional sign, digits only, 64-bit range.
 * Values beyond the safe integer range keep their sign and magnitude order.
 */
export function parseConfigInteger(raw: string): number | undefined {
  if (!INTEGER_PATTERN.test(raw)) {
    return undefined;
  }
  const big = BigInt(raw);
  if (big < INT64_MIN || big > INT64_MAX) {
    return undefined;
  }
  return Number(big);
}

/**
 * Parse a decimal floating-point value, accepting exponents, `inf` and `nan`.
 * Finite values that overflow a double are rejected.
 */
export function parseConfigFloat(raw: string): number | undefined {
  if (DECIMAL_PATTERN.test(raw)) {
    const value = Number(raw);
    return Number.isFinite(value) ? value : undefined;
  }
  const infinity = INFINITY_PATTERN.exec(raw);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }
  if (NAN_PATTERN.test(raw)) {
    return NaN;
  }
  return undefined;
}

/**
 * Whether a configured default parses to a value greater than zero
 */
export function isPositiveConfigNumber(raw: string, kind: 'int' | 'float'): boolean {
  const value = kind === 'int' ? parseConfigInteger(raw) : parseConfigFloat(raw);
  return value !== undefined && value > 0;
}

/**
 * Format a value with a fixed number of decimals, rounding the exact binary
 * value and breaking exact ties toward the even digit (0.125 -> "0.12").
 */
export function formatFixed(value: number, places: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }

  // |value| = scaled / 2^n = scaled * 5^n / 10^n
  let scaled = Math.abs(value);
  let binaryPlaces = 0;
  while (!Number.isInteger(scaled)) {
    scaled *= 2;
    binaryPlaces++;
  }
  let digits = BigInt(scaled) * 5n ** BigInt(binaryPlaces);
  let decimalPlaces = binaryPlaces;

  if (decimalPlaces > places) {
    const divisor = 10n ** BigInt(decimalPlaces - places);
    let quotient = digits / divisor;
    const twiceRemainder = (digits % divisor) * 2n;
    if (twiceRemainder > divisor || (twiceRemainder === divisor && quotient % 2n === 1n)) {
      quotient += 1n;
    }
    digits = quotient;
    decimalPlaces = places;
  }
  digits *= 10n ** BigInt(places - decimalPlaces);

  const text = digits.toString().padStart(places + 1, '0');
  const whole = text.slice(0, text.length - places);
  const sign = value < 0 ? '-' : '';
  return places > 0 ? `${sign}${whole}.${text.slice(text.length - places)}` : `${sign}${whole}`;
}
