/**
 * Numeric helpers shared by the allocator and the SIP engine.
 * All calculations use monthly compounding periods.
 */

/**
 * Converts an annual return percentage to an equivalent monthly rate.
 *
 * @param annualRatePct - Annual rate in percent (e.g., 12 for 12%)
 * @returns Monthly rate as a decimal
 *
 * @example
 * ```ts
 * annualPercentToMonthlyRate(12) // returns 0.01 (1% per month)
 * ```
 */
export function annualPercentToMonthlyRate(annualRatePct: number): number {
  return annualRatePct / 100 / 12;
}

/**
 * Rounds to a fixed number of decimal places (2 by default, i.e. currency).
 *
 * @example
 * ```ts
 * roundTo(12682.503013) // returns 12682.5
 * roundTo(0.123456, 4) // returns 0.1235
 * ```
 */
export function roundTo(value: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Converts a fraction to a percentage rounded to 2 decimals.
 */
export function toPercent(fraction: number): number {
  return roundTo(fraction * 100);
}

/**
 * Number of whole units purchasable with an amount, truncated toward zero.
 * Returns 0 for non-positive prices.
 */
export function wholeUnits(amount: number, price: number): number {
  if (price <= 0 || amount <= 0) {
    return 0;
  }
  return Math.floor(amount / price);
}

/**
 * Running (prefix) sums of a sequence.
 *
 * @example
 * ```ts
 * cumulativeSum([0.5, 0.3, 0.2]) // returns [0.5, 0.8, 1]
 * ```
 */
export function cumulativeSum(values: readonly number[]): number[] {
  const sums: number[] = [];
  let running = 0;
  for (const value of values) {
    running += value;
    sums.push(running);
  }
  return sums;
}
