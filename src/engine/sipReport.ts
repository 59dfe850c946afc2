import { SipProjection, SipResult } from "../models/SIPProjection";
import { roundTo } from "../utils/math";
import { formatCrLac } from "../utils/format";

/**
 * Builds the SIP result summary from a projection.
 * Growth is profit over total deposits, or 0 when nothing was deposited.
 */
export function buildSipResult(projection: SipProjection): SipResult {
  const { finalBalance, totalDeposits, totalEarnings } = projection;
  const profit = finalBalance - totalDeposits;
  const growthPercent = totalDeposits > 0 ? (profit / totalDeposits) * 100 : 0;

  return {
    rows: projection.rows,
    summary: {
      finalCorpus: roundTo(finalBalance),
      totalDeposits: roundTo(totalDeposits),
      totalEarnings: roundTo(totalEarnings),
      profit: roundTo(profit),
      growthPercent: roundTo(growthPercent),
      finalCorpusFormatted: formatCrLac(finalBalance),
      totalDepositsFormatted: formatCrLac(totalDeposits),
      totalEarningsFormatted: formatCrLac(totalEarnings),
      profitFormatted: formatCrLac(profit),
    },
  };
}
