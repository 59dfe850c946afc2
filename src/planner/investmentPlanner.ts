import { AllocationOptions } from "../models/Allocation";
import { SipParameters } from "../models/SIPProjection";
import { isCalculatorError } from "../models/CalculatorError";
import {
  AllocationOutcome,
  PlanningFailure,
  PriceUpdateStatus,
  SipOutcome,
} from "../models/PlanningResult";
import { SecuritySource } from "../data/securityStore";
import { PriceFeed, applyPrices } from "../data/priceFeed";
import { allocate } from "../engine/allocator";
import { simulateSip } from "../engine/sipSimulator";

/**
 * Planner dependencies. The price feed is optional; without one prices are never refreshed.
 */
export interface PlannerContext {
  source: SecuritySource;
  priceFeed?: PriceFeed;
  refreshPrices: boolean;
}

export interface AllocationRequest extends AllocationOptions {
  coveragePercent: number;
  investmentAmount: number;
}

function toFailure(error: unknown): PlanningFailure {
  if (isCalculatorError(error)) {
    return { success: false, error };
  }
  throw error;
}

/**
 * Orchestrates a calculation run around the pure engines.
 *
 * Allocation runs refresh prices first when configured. A failed refresh degrades the run
 * (last-known prices, plus a warning) instead of failing it. Calculation errors come back as
 * a failed outcome; unexpected errors (e.g., an unreadable store) are rethrown.
 *
 * The fetch, persist and reload steps are not atomic: concurrent runs may see different
 * price snapshots if another writer updates the store in between.
 */
export class InvestmentPlanner {
  private context: PlannerContext;

  constructor(context: PlannerContext) {
    this.context = context;
  }

  /**
   * Refresh stored prices from the price feed. Fetch and persist failures are reported in the
   * status, not thrown; only an unreadable store rejects.
   */
  async refreshPrices(): Promise<PriceUpdateStatus> {
    const { source, priceFeed } = this.context;
    const securities = await source.load();

    if (!priceFeed) {
      return {
        success: false,
        message: "No price feed configured",
        updated: 0,
        total: securities.length,
        missingSymbols: [],
      };
    }

    try {
      const lookup = await priceFeed.fetchPrices();
      const applied = applyPrices(securities, lookup);
      await source.savePrices(applied.securities);
      return {
        success: true,
        message: `Updated prices for ${applied.updatedSymbols.length}/${securities.length} companies`,
        updated: applied.updatedSymbols.length,
        total: securities.length,
        missingSymbols: applied.missingSymbols,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Price refresh failed, using existing prices: ${message}`);
      return {
        success: false,
        message: `Error updating prices: ${message}`,
        updated: 0,
        total: securities.length,
        missingSymbols: [],
      };
    }
  }

  /**
   * Allocate an investment amount across the index up to the requested coverage.
   */
  async planAllocation(request: AllocationRequest): Promise<AllocationOutcome> {
    const warnings: string[] = [];

    try {
      const priceUpdate = this.context.refreshPrices ? await this.refreshPrices() : null;
      if (priceUpdate && !priceUpdate.success) {
        warnings.push(`Price update warning: ${priceUpdate.message}`);
      }

      const securities = await this.context.source.load();
      const result = allocate(securities, request.coveragePercent, request.investmentAmount, {
        redistributeLeftover: request.redistributeLeftover,
      });
      if (result.skippedSymbols.length > 0) {
        warnings.push(`No valid price for: ${result.skippedSymbols.join(", ")}`);
      }
      return { success: true, result, priceUpdate, warnings };
    } catch (error) {
      return toFailure(error);
    }
  }

  /**
   * Project a SIP. Synchronous; it never touches the security source.
   */
  planSip(params: SipParameters): SipOutcome {
    try {
      return { success: true, result: simulateSip(params) };
    } catch (error) {
      return toFailure(error);
    }
  }
}
