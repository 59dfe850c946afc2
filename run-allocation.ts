import { InvestmentPlanner } from "./src/planner/investmentPlanner";
import { JsonFileSecurityStore } from "./src/data/securityStore";
import { HttpPriceFeed } from "./src/data/priceFeed";
import { loadConfig } from "./src/utils/config";
import { resolveNumbers } from "./src/cli/prompt";
import { formatAllocationReport } from "./src/utils/reportFormatter";

/**
 * Refresh prices, then print the whole-share allocation for an index coverage.
 * Usage: node dist/run-allocation.js [coveragePercent] [investmentAmount] [--no-refresh] [--redistribute]
 * Missing values are prompted for.
 */
async function main(): Promise<void> {
  const flags = process.argv.slice(2).filter((arg) => arg.startsWith("--"));
  const positional = process.argv.slice(2).filter((arg) => !arg.startsWith("--"));
  const config = loadConfig();

  const [coveragePercent, investmentAmount] = await resolveNumbers(positional, [
    "Enter index coverage percentage (e.g., 20 for 20%)",
    "Enter total investment amount (PKR)",
  ]);

  const planner = new InvestmentPlanner({
    source: new JsonFileSecurityStore(config.securitiesFile),
    priceFeed: new HttpPriceFeed(config.priceFeedUrl, config.priceFeedTimeoutMs),
    refreshPrices: config.refreshPrices && !flags.includes("--no-refresh"),
  });

  console.log(`Calculating investment plan for ${coveragePercent}% coverage...`);
  const outcome = await planner.planAllocation({
    coveragePercent,
    investmentAmount,
    redistributeLeftover: flags.includes("--redistribute"),
  });

  if (!outcome.success) {
    console.error(`${outcome.error.kind}: ${outcome.error.message}`);
    process.exitCode = 1;
    return;
  }

  if (outcome.priceUpdate?.success) {
    console.log(outcome.priceUpdate.message);
  }
  for (const warning of outcome.warnings) {
    console.warn(warning);
  }
  for (const line of formatAllocationReport(outcome.result, "PKR")) {
    console.log(line);
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Allocation failed: ${message}`);
  process.exit(1);
});
