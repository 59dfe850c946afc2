import {
  AllocationLine,
  AllocationOptions,
  AllocationResult,
} from "../models/Allocation";
import { SelectedSecurity, Security, getTotalWeight, hasUsablePrice } from "../models/Security";
import { AllocationArgumentsSchema, parseInput } from "../utils/validation";
import { roundTo, toPercent, wholeUnits } from "../utils/math";
import { selectByCoverage } from "./selector";

/**
 * A priced line before rounding for output. Shares and amounts are kept exact here so totals
 * are summed once, not line by line.
 */
export interface RoundedPosition {
  security: SelectedSecurity & { price: number };
  shares: number;
}

export interface ShareRounding {
  positions: RoundedPosition[];
  skippedSymbols: string[];
  totalInvested: number;
  remainingCash: number;
}

function investedIn(positions: readonly RoundedPosition[]): number {
  return positions.reduce((sum, position) => sum + position.shares * position.security.price, 0);
}

/**
 * Spends leftover cash one share at a time, walking the positions in selection order and
 * repeating until a full walk buys nothing.
 *
 * While the cash covers one share of every affordable position, a walk buys exactly one share
 * of each, so those walks are taken in bulk. A walk that cannot cover them all leaves some
 * position unaffordable for good, which bounds the loop by the number of positions.
 */
function redistributeLeftover(
  positions: RoundedPosition[],
  remainingCash: number
): RoundedPosition[] {
  const result = positions.map((position) => ({ ...position }));
  let cash = remainingCash;

  for (;;) {
    const affordable = result.filter((position) => position.security.price <= cash);
    if (affordable.length === 0) {
      break;
    }

    const walkCost = affordable.reduce((sum, position) => sum + position.security.price, 0);
    let fullWalks = Math.floor(cash / walkCost);
    if (fullWalks * walkCost > cash) {
      fullWalks -= 1;
    }
    if (fullWalks > 0) {
      for (const position of affordable) {
        position.shares += fullWalks;
      }
      cash -= fullWalks * walkCost;
      continue;
    }

    for (const position of affordable) {
      if (position.security.price <= cash) {
        position.shares += 1;
        cash -= position.security.price;
      }
    }
  }

  return result;
}

/**
 * Converts a weighted selection into whole-share purchases.
 *
 * Greedy and single pass by default: each security receives adjustedWeight x amount and buys
 * as many whole shares as fit. Securities without a usable price are skipped. Leftover cash is
 * only spent on extra shares when `redistributeLeftover` is set.
 *
 * @param selection - Selected securities with adjusted weights
 * @param investmentAmount - Total amount to invest
 */
export function roundShares(
  selection: readonly SelectedSecurity[],
  investmentAmount: number,
  options: AllocationOptions = {}
): ShareRounding {
  let positions: RoundedPosition[] = [];
  const skippedSymbols: string[] = [];

  for (const security of selection) {
    if (!hasUsablePrice(security)) {
      skippedSymbols.push(security.symbol);
      continue;
    }
    const allocationAmount = security.adjustedWeight * investmentAmount;
    positions.push({ security, shares: wholeUnits(allocationAmount, security.price) });
  }

  if (options.redistributeLeftover) {
    positions = redistributeLeftover(positions, investmentAmount - investedIn(positions));
  }

  const totalInvested = investedIn(positions);
  return {
    positions,
    skippedSymbols,
    totalInvested,
    remainingCash: investmentAmount - totalInvested,
  };
}

function toAllocationLine(position: RoundedPosition): AllocationLine {
  const { security, shares } = position;
  return {
    symbol: security.symbol,
    weightPercent: toPercent(security.weight),
    adjustedWeightPercent: toPercent(security.adjustedWeight),
    price: security.price,
    shares,
    investedAmount: roundTo(shares * security.price),
  };
}

/**
 * Calculates the whole-share allocation of an investment amount across the securities needed
 * to reach the requested index coverage.
 *
 * @param securities - Ordered security snapshot (order decides the selection)
 * @param coveragePercent - Target index coverage in percent, (0, 100]
 * @param investmentAmount - Amount to invest, > 0
 * @returns Allocation lines and summary
 * @throws InvalidRangeError for out-of-range arguments
 * @throws ConfigurationError when the selection cannot be normalised
 *
 * @example
 * ```ts
 * allocate([{ symbol: "A", weight: 0.6, price: 10 }, { symbol: "B", weight: 0.4, price: 20 }], 50, 1000)
 * // selects A only and buys 100 shares, remainingCash 0
 * ```
 */
export function allocate(
  securities: readonly Security[],
  coveragePercent: number,
  investmentAmount: number,
  options: AllocationOptions = {}
): AllocationResult {
  parseInput(AllocationArgumentsSchema, { coveragePercent, investmentAmount }, "allocation");

  const selection = selectByCoverage(securities, coveragePercent);
  const rounding = roundShares(selection, investmentAmount, options);
  const lines = rounding.positions.map(toAllocationLine);

  return {
    lines,
    selectedSymbols: selection.map((security) => security.symbol),
    skippedSymbols: rounding.skippedSymbols,
    summary: {
      totalInvestmentAmount: investmentAmount,
      totalInvested: roundTo(rounding.totalInvested),
      remainingCash: roundTo(rounding.remainingCash),
      investmentEfficiencyPercent: toPercent(rounding.totalInvested / investmentAmount),
      companiesSelected: selection.length,
      companiesInvested: lines.filter((line) => line.shares > 0).length,
      targetCoveragePercent: coveragePercent,
      actualCoveragePercent: toPercent(getTotalWeight(selection)),
    },
  };
}
