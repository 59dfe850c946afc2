/**
 * Security data structures
 */

export interface Security {
  symbol: string;
  weight: number; // fraction of the index, 0 < weight <= 1
  price?: number; // last quoted price; absent until a feed or the store supplies one
}

/**
 * A security inside one allocation run, with the per-run derived weights.
 */
export interface SelectedSecurity extends Security {
  cumulativeWeight: number;
  adjustedWeight: number; // weight renormalised over the selection (sums to 1)
}

/** Uppercase symbol -> latest price. */
export type PriceLookup = Record<string, number>;

/**
 * Normalises a symbol for matching against price feeds.
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * A price is usable for allocation only when it is a finite, positive number.
 */
export function hasUsablePrice<T extends Security>(
  security: T
): security is T & { price: number } {
  return (
    security.price !== undefined &&
    Number.isFinite(security.price) &&
    security.price > 0
  );
}

/**
 * Sum of index weights across securities
 */
export function getTotalWeight(securities: readonly Security[]): number {
  return securities.reduce((sum, security) => sum + security.weight, 0);
}
