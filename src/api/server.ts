import express from "express";
import { createRoutes } from "./routes";
import { InvestmentPlanner } from "../planner/investmentPlanner";
import { JsonFileSecurityStore } from "../data/securityStore";
import { HttpPriceFeed } from "../data/priceFeed";
import { AppConfig, loadConfig } from "../utils/config";

/**
 * Builds the Express app around a planner.
 */
export function createApp(planner: InvestmentPlanner): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRoutes(planner));

  // Root endpoint
  app.get("/", (req, res) => {
    res.redirect("/api");
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

/**
 * Planner wired to the JSON security store and the HTTP price feed.
 */
export function createDefaultPlanner(config: AppConfig): InvestmentPlanner {
  return new InvestmentPlanner({
    source: new JsonFileSecurityStore(config.securitiesFile),
    priceFeed: new HttpPriceFeed(config.priceFeedUrl, config.priceFeedTimeoutMs),
    refreshPrices: config.refreshPrices,
  });
}

// Start server
if (require.main === module) {
  const config = loadConfig();
  const app = createApp(createDefaultPlanner(config));
  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`API available at http://localhost:${config.port}/api`);
  });
}
