import { z } from "zod";
import {
  DEFAULT_PRICE_FEED_TIMEOUT_MS,
  DEFAULT_PRICE_FEED_URL,
  DEFAULT_SECURITIES_FILE,
} from "./constants";

/**
 * Runtime configuration read from environment variables.
 */
export interface AppConfig {
  port: number;
  securitiesFile: string;
  priceFeedUrl: string;
  priceFeedTimeoutMs: number;
  refreshPrices: boolean;
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  SECURITIES_FILE: z.string().min(1).default(DEFAULT_SECURITIES_FILE),
  PRICE_FEED_URL: z.string().url().default(DEFAULT_PRICE_FEED_URL),
  PRICE_FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PRICE_FEED_TIMEOUT_MS),
  REFRESH_PRICES: z.enum(["true", "false"]).default("true"),
});

/**
 * Loads configuration, failing fast with the names of any invalid variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  return {
    port: parsed.data.PORT,
    securitiesFile: parsed.data.SECURITIES_FILE,
    priceFeedUrl: parsed.data.PRICE_FEED_URL,
    priceFeedTimeoutMs: parsed.data.PRICE_FEED_TIMEOUT_MS,
    refreshPrices: parsed.data.REFRESH_PRICES === "true",
  };
}
