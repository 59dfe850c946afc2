import { AllocationResult } from "../models/Allocation";
import { SipResult } from "../models/SIPProjection";
import { formatAmount, formatCrLac } from "./format";

/**
 * Plain-text report rendering for the command-line scripts.
 */

type Align = "left" | "right";

export interface Column<T> {
  header: string;
  align: Align;
  value: (row: T) => string;
}

/**
 * Renders rows as a fixed-width text table with a header and a rule.
 */
export function renderTable<T>(rows: readonly T[], columns: readonly Column<T>[]): string[] {
  const cells = rows.map((row) => columns.map((column) => column.value(row)));
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...cells.map((row) => row[i].length))
  );
  const pad = (text: string, i: number) =>
    columns[i].align === "right" ? text.padStart(widths[i]) : text.padEnd(widths[i]);

  const header = columns.map((column, i) => pad(column.header, i)).join("  ");
  const rule = widths.map((width) => "-".repeat(width)).join("  ");
  const body = cells.map((row) => row.map((cell, i) => pad(cell, i)).join("  "));
  return [header, rule, ...body];
}

export function formatAllocationReport(result: AllocationResult, currency: string): string[] {
  const { summary } = result;
  const table = renderTable(result.lines, [
    { header: "symbol", align: "left", value: (line) => line.symbol },
    { header: "weight(%)", align: "right", value: (line) => line.weightPercent.toFixed(2) },
    { header: "adjusted(%)", align: "right", value: (line) => line.adjustedWeightPercent.toFixed(2) },
    { header: "price", align: "right", value: (line) => line.price.toFixed(2) },
    { header: "shares", align: "right", value: (line) => line.shares.toLocaleString("en-US") },
    { header: "invested", align: "right", value: (line) => formatAmount(line.investedAmount) },
  ]);

  const lines = [
    `Selected ${summary.companiesSelected} companies representing ${summary.actualCoveragePercent.toFixed(2)}% of the index`,
    "",
    ...table,
    "",
    `Total Investment Amount:  ${formatAmount(summary.totalInvestmentAmount)} ${currency}`,
    `Total Invested:           ${formatAmount(summary.totalInvested)} ${currency}`,
    `Remaining Cash:           ${formatAmount(summary.remainingCash)} ${currency}`,
    `Investment Efficiency:    ${summary.investmentEfficiencyPercent.toFixed(2)}%`,
    `Companies Invested In:    ${summary.companiesInvested}/${summary.companiesSelected}`,
  ];
  if (result.skippedSymbols.length > 0) {
    lines.push(`Skipped (no valid price): ${result.skippedSymbols.join(", ")}`);
  }
  return lines;
}

export function formatSipReport(result: SipResult): string[] {
  const table = renderTable(result.rows, [
    { header: "Year", align: "right", value: (row) => String(row.year) },
    { header: "Deposits", align: "right", value: (row) => formatAmount(row.yearDeposits) },
    { header: "Earnings", align: "right", value: (row) => formatAmount(row.earningsThisYear) },
    { header: "Total Deposits", align: "right", value: (row) => formatAmount(row.totalDeposits) },
    { header: "Accrued Earnings", align: "right", value: (row) => formatAmount(row.accruedEarnings) },
    { header: "Balance", align: "right", value: (row) => formatAmount(row.netBalance) },
  ]);

  const { summary } = result;
  return [
    ...table,
    "",
    `Total Invested: ${formatCrLac(summary.totalDeposits)}`,
    `Total Profit: ${formatCrLac(summary.profit)}`,
    `Final Corpus: ${formatCrLac(summary.finalCorpus)}`,
    `Growth: ${summary.growthPercent.toFixed(2)}%`,
  ];
}
