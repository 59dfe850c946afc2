/**
 * Shared constants for allocation and SIP projection.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** 1 crore = 10,000,000. */
export const CRORE = 10_000_000;

/** 1 lac (lakh) = 100,000. */
export const LAKH = 100_000;

export const MONTHS_PER_YEAR = 12;

/** Index weights may sum slightly above 1 from rounding in the source sheet. */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

/** Smallest coverage percent accepted by the API. */
export const MIN_COVERAGE_PERCENT = 0.1;

export const MAX_COVERAGE_PERCENT = 100;

/** Smallest investment amount accepted by the API. */
export const MIN_INVESTMENT_AMOUNT = 1000;

/** Longest SIP horizon accepted by the API, in years. */
export const MAX_SIP_YEARS = 60;

export const DEFAULT_PRICE_FEED_URL = "https://psxterminal.com/api/market-data?market=REG";

export const DEFAULT_PRICE_FEED_TIMEOUT_MS = 10_000;

export const DEFAULT_SECURITIES_FILE = "data/securities.json";
