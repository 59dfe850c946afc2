import { SelectedSecurity, Security, getTotalWeight } from "../models/Security";
import { ConfigurationError } from "../models/CalculatorError";
import { cumulativeSum } from "../utils/math";

/**
 * Index of the first security whose cumulative weight reaches the target fraction,
 * or the last index when the target is never reached (the whole list is selected).
 *
 * @param cumulativeWeights - Running weight totals in list order
 * @param targetFraction - Coverage target as a fraction (e.g., 0.5 for 50%)
 * @returns Inclusive end index of the selection, -1 for an empty list
 */
export function findCoverageCutoff(
  cumulativeWeights: readonly number[],
  targetFraction: number
): number {
  const index = cumulativeWeights.findIndex((cumulative) => cumulative >= targetFraction);
  return index === -1 ? cumulativeWeights.length - 1 : index;
}

/**
 * Selects the prefix of the security list that reaches the requested index coverage.
 *
 * The list order is significant and never changed: the security that crosses the target is
 * included in full. Selected weights are renormalised so they sum to 1.
 *
 * @param securities - Ordered security snapshot
 * @param coveragePercent - Target coverage in percent, (0, 100]
 * @returns The selected prefix with cumulative and adjusted weights
 * @throws ConfigurationError when a non-empty selection has zero total weight
 */
export function selectByCoverage(
  securities: readonly Security[],
  coveragePercent: number
): SelectedSecurity[] {
  if (securities.length === 0) {
    return [];
  }

  const cumulativeWeights = cumulativeSum(securities.map((security) => security.weight));
  const cutoff = findCoverageCutoff(cumulativeWeights, coveragePercent / 100);
  const selected = securities.slice(0, cutoff + 1);

  const selectedWeight = getTotalWeight(selected);
  if (selectedWeight <= 0) {
    throw new ConfigurationError(
      `Selected securities have a total weight of ${selectedWeight}; weights cannot be normalised`
    );
  }

  return selected.map((security, index) => ({
    ...security,
    cumulativeWeight: cumulativeWeights[index],
    adjustedWeight: security.weight / selectedWeight,
  }));
}
