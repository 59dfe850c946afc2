import { simulateSip } from "./src/engine/sipSimulator";
import { isCalculatorError } from "./src/models/CalculatorError";
import { resolveNumbers } from "./src/cli/prompt";
import { formatSipReport } from "./src/utils/reportFormatter";

/**
 * Print a SIP projection table and summary.
 * Usage: node dist/run-sip.js [initialBalance] [years] [annualInterestRate] [monthlyInvestment] [yearlyIncrementPercent]
 * Missing values are prompted for.
 */
async function main(): Promise<void> {
  const [initialBalance, years, annualInterestRate, monthlyInvestment, yearlyIncrementPercent] =
    await resolveNumbers(process.argv.slice(2), [
      "Enter initial investment (PKR)",
      "Enter number of years",
      "Enter annual interest rate (%)",
      "Enter monthly investment (PKR)",
      "Enter yearly increment in monthly investment (%)",
    ]);

  const result = simulateSip({
    initialBalance,
    years,
    annualInterestRate,
    monthlyInvestment,
    yearlyIncrementPercent,
  });

  console.log("\nSIP Calculation Table:\n");
  for (const line of formatSipReport(result)) {
    console.log(line);
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(isCalculatorError(err) ? `${err.kind}: ${message}` : `SIP projection failed: ${message}`);
  process.exit(1);
});
