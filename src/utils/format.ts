import { CRORE, LAKH } from "./constants";

const groupedDecimal = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Formats an amount with thousands separators and 2 decimals.
 *
 * @example
 * ```ts
 * formatAmount(12345.678) // returns "12,345.68"
 * ```
 */
export function formatAmount(amount: number): string {
  return groupedDecimal.format(amount);
}

/**
 * Formats an amount in crore / lac for summaries.
 * Amounts of at least 1 crore (10,000,000) are shown in "cr", at least 1 lac (100,000) in "lac",
 * anything smaller as a grouped decimal. The sign is kept as a prefix.
 *
 * @example
 * ```ts
 * formatCrLac(25_000_000) // returns "2.50 cr"
 * formatCrLac(-150_000) // returns "-1.50 lac"
 * formatCrLac(12_682.5) // returns "12,682.50"
 * ```
 */
export function formatCrLac(amount: number): string {
  const sign = amount < 0 ? "-" : "";
  const magnitude = Math.abs(amount);
  if (magnitude >= CRORE) {
    return `${sign}${(magnitude / CRORE).toFixed(2)} cr`;
  }
  if (magnitude >= LAKH) {
    return `${sign}${(magnitude / LAKH).toFixed(2)} lac`;
  }
  return `${sign}${formatAmount(magnitude)}`;
}
