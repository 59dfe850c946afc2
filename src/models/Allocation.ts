/**
 * Allocation result data structures
 */

export interface AllocationLine {
  symbol: string;
  weightPercent: number;
  adjustedWeightPercent: number;
  price: number;
  shares: number;
  investedAmount: number;
}

export interface AllocationSummary {
  totalInvestmentAmount: number;
  totalInvested: number;
  remainingCash: number;
  investmentEfficiencyPercent: number;
  companiesSelected: number;
  companiesInvested: number;
  targetCoveragePercent: number;
  actualCoveragePercent: number;
}

export interface AllocationResult {
  lines: AllocationLine[];
  selectedSymbols: string[];
  skippedSymbols: string[]; // selected but without a usable price
  summary: AllocationSummary;
}

export interface AllocationOptions {
  /** Spend leftover cash on extra shares after the greedy pass. Off by default. */
  redistributeLeftover?: boolean;
}
