/**
 * Fixed-point decimals with 18 fractional digits, held as bigint atomics.
 *
 * Governance ratios (quorum, threshold) and the ratios computed while a poll is
 * resolved go through this module, so that "30%" compares exactly against
 * the tallied weight instead of through binary floating point.
 */

export const DECIMAL_PLACES = 18;
export const DECIMAL_FRACTIONAL = 10n ** BigInt(DECIMAL_PLACES);

/** 1.0 in atomics. */
export const DECIMAL_ONE = DECIMAL_FRACTIONAL;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,18}))?$/;

/**
 * Parse a non-negative decimal string ("0.3", "1", "0.000001") into atomics.
 * Returns null when the input is not a plain decimal or carries more than
 * 18 fractional digits.
 */
export function parseDecimal(input: string): bigint | null {
  const match = DECIMAL_PATTERN.exec(input.trim());
  if (!match) return null;

  const whole = BigInt(match[1]);
  const fraction = (match[2] ?? '').padEnd(DECIMAL_PLACES, '0');
  return whole * DECIMAL_FRACTIONAL + BigInt(fraction);
}

export function formatDecimal(atomics: bigint): string {
  const whole = atomics / DECIMAL_FRACTIONAL;
  const fraction = (atomics % DECIMAL_FRACTIONAL)
    .toString()
    .padStart(DECIMAL_PLACES, '0')
    .replace(/0+$/, '');

  return fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
}

/** numerator / denominator, floored to 18 fractional digits. */
export function decimalFromRatio(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('Decimal ratio with zero denominator');
  }
  return (numerator * DECIMAL_FRACTIONAL) / denominator;
}

/** floor(value × numerator / denominator) on unsigned integers. */
export function mulDivFloor(value: bigint, numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('mulDivFloor with zero denominator');
  }
  return (value * numerator) / denominator;
}

export function isUnitInterval(atomics: bigint): boolean {
  return atomics >= 0n && atomics <= DECIMAL_ONE;
}
