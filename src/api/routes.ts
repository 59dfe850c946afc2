import { NextFunction, Request, Response, Router } from "express";
import { InvestmentPlanner } from "../planner/investmentPlanner";
import { CalculatorError, isCalculatorError } from "../models/CalculatorError";
import { PriceUpdateStatus } from "../models/PlanningResult";
import { InvestmentQuerySchema, SipQuerySchema, parseInput } from "../utils/validation";

function sendError(res: Response, error: CalculatorError) {
  return res.status(error.status).json({
    error: error.kind,
    message: error.message,
  });
}

function describePriceUpdate(priceUpdate: PriceUpdateStatus | null): string {
  if (!priceUpdate) {
    return "";
  }
  return priceUpdate.success
    ? ` | ${priceUpdate.message}`
    : ` | Price update warning: ${priceUpdate.message}`;
}

/**
 * Builds the API router around a planner.
 */
export function createRoutes(planner: InvestmentPlanner): Router {
  const router = Router();

  /**
   * GET /api/calculate-investment
   * Refresh prices (non-fatal on failure), then allocate the amount across the index prefix
   * that reaches the requested coverage.
   */
  router.get("/calculate-investment", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(InvestmentQuerySchema, req.query, "query");
      const outcome = await planner.planAllocation(query);

      if (!outcome.success) {
        console.error("Error calculating investment:", outcome.error.message);
        return sendError(res, outcome.error);
      }

      const { result, priceUpdate, warnings } = outcome;
      res.json({
        success: true,
        message: `Investment calculation completed successfully${describePriceUpdate(priceUpdate)}`,
        investmentPlan: result.lines,
        summary: result.summary,
        selectedCompanies: result.selectedSymbols,
        warnings,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      if (isCalculatorError(error)) {
        return sendError(res, error);
      }
      next(error);
    }
  });

  /**
   * GET /api/sip
   * SIP projection with monthly compounding, yearly step-up and an optional Year 0 balance.
   */
  router.get("/sip", (req: Request, res: Response) => {
    try {
      const params = parseInput(SipQuerySchema, req.query, "query");
      const outcome = planner.planSip(params);

      if (!outcome.success) {
        return sendError(res, outcome.error);
      }

      res.json({
        success: true,
        rows: outcome.result.rows,
        summary: outcome.result.summary,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      if (isCalculatorError(error)) {
        return sendError(res, error);
      }
      throw error;
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Index Investment & SIP Calculator API",
      version: "1.0.0",
      endpoints: {
        calculateInvestment:
          "GET /api/calculate-investment?coveragePercent=&investmentAmount=&redistributeLeftover= - Whole-share allocation up to an index coverage",
        sip: "GET /api/sip?initialBalance=&years=&annualInterestRate=&monthlyInvestment=&yearlyIncrementPercent= - SIP compounding projection",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
