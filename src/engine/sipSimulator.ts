import { SipParameters, SipProjection, SipResult, SipRow } from "../models/SIPProjection";
import { annualPercentToMonthlyRate, roundTo } from "../utils/math";
import { MONTHS_PER_YEAR } from "../utils/constants";
import { SipParametersSchema, parseInput } from "../utils/validation";
import { buildSipResult } from "./sipReport";

/**
 * Simulates a SIP month by month and returns one row per year.
 *
 * Each month interest is credited on the opening balance before that month's deposit, so a
 * deposit starts earning in the following month. The monthly contribution is escalated by
 * `yearlyIncrementPercent` after every year and the escalation compounds.
 * A Year 0 row is emitted only when there is an initial balance.
 *
 * @param params - Validated SIP parameters
 * @returns Rounded yearly rows plus unrounded totals
 */
export function projectSip(params: SipParameters): SipProjection {
  const monthlyRate = annualPercentToMonthlyRate(params.annualInterestRate);
  const rows: SipRow[] = [];

  let balance = params.initialBalance;
  let totalDeposits = params.initialBalance;
  let totalEarnings = 0;
  let monthlyInvestment = params.monthlyInvestment;

  if (params.initialBalance > 0) {
    rows.push({
      year: 0,
      monthlyInvestment: 0,
      yearDeposits: roundTo(params.initialBalance),
      earningsThisYear: 0,
      totalDeposits: roundTo(totalDeposits),
      accruedEarnings: 0,
      netBalance: roundTo(balance),
    });
  }

  for (let year = 1; year <= params.years; year++) {
    let yearDeposits = 0;
    let yearEarnings = 0;

    for (let month = 0; month < MONTHS_PER_YEAR; month++) {
      const interest = balance * monthlyRate;
      balance += interest;
      yearEarnings += interest;

      balance += monthlyInvestment;
      yearDeposits += monthlyInvestment;
    }

    totalDeposits += yearDeposits;
    totalEarnings += yearEarnings;

    rows.push({
      year,
      monthlyInvestment: roundTo(monthlyInvestment),
      yearDeposits: roundTo(yearDeposits),
      earningsThisYear: roundTo(yearEarnings),
      totalDeposits: roundTo(totalDeposits),
      accruedEarnings: roundTo(totalEarnings),
      netBalance: roundTo(balance),
    });

    // Step-up applies from next year
    monthlyInvestment += monthlyInvestment * (params.yearlyIncrementPercent / 100);
  }

  return { rows, finalBalance: balance, totalDeposits, totalEarnings };
}

/**
 * Validates SIP parameters, runs the monthly compounding projection and builds the summary.
 *
 * @throws MissingRequiredFieldError when a parameter is absent
 * @throws InvalidRangeError when a parameter is outside its domain
 *
 * @example
 * ```ts
 * simulateSip({ initialBalance: 0, years: 1, annualInterestRate: 12, monthlyInvestment: 1000, yearlyIncrementPercent: 0 })
 * // summary.finalCorpus === 12682.5
 * ```
 */
export function simulateSip(params: SipParameters): SipResult {
  const validated = parseInput(SipParametersSchema, params, "sip");
  return buildSipResult(projectSip(validated));
}
