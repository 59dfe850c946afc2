/**
 * SIP projection data structures
 */

export interface SipParameters {
  initialBalance: number;
  years: number;
  annualInterestRate: number; // percent, e.g. 16 for 16%
  monthlyInvestment: number; // Year 1 monthly contribution
  yearlyIncrementPercent: number;
}

export interface SipRow {
  year: number;
  monthlyInvestment: number;
  yearDeposits: number;
  earningsThisYear: number;
  totalDeposits: number;
  accruedEarnings: number;
  netBalance: number;
}

/**
 * Raw output of the compounding engine. Totals are unrounded; rows are rounded to 2 decimals.
 */
export interface SipProjection {
  rows: SipRow[];
  finalBalance: number;
  totalDeposits: number;
  totalEarnings: number;
}

export interface SipSummary {
  finalCorpus: number;
  totalDeposits: number;
  totalEarnings: number;
  profit: number;
  growthPercent: number;
  finalCorpusFormatted: string;
  totalDepositsFormatted: string;
  totalEarningsFormatted: string;
  profitFormatted: string;
}

export interface SipResult {
  rows: SipRow[];
  summary: SipSummary;
}
