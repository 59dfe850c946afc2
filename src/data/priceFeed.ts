import { z } from "zod";
import { PriceLookup, Security, normalizeSymbol } from "../models/Security";
import { UpstreamUnavailableError } from "../models/CalculatorError";

/**
 * Source of current market prices keyed by uppercase symbol.
 */
export interface PriceFeed {
  fetchPrices(): Promise<PriceLookup>;
}

const MarketDataSchema = z.object({
  data: z.record(z.string(), z.unknown()),
});

const QuoteSchema = z.object({
  price: z.number(),
});

/**
 * Builds the uppercase symbol -> price lookup from a market-data response body.
 * Entries without a numeric price are ignored.
 */
export function parseMarketData(body: unknown): PriceLookup {
  const parsed = MarketDataSchema.safeParse(body);
  if (!parsed.success) {
    throw new UpstreamUnavailableError("Market data response has no data object");
  }

  const lookup: PriceLookup = {};
  for (const [symbol, quote] of Object.entries(parsed.data.data)) {
    const parsedQuote = QuoteSchema.safeParse(quote);
    if (parsedQuote.success) {
      lookup[normalizeSymbol(symbol)] = parsedQuote.data.price;
    }
  }
  return lookup;
}

/**
 * Price feed that reads a market-data HTTP endpoint.
 */
export class HttpPriceFeed implements PriceFeed {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(url: string, timeoutMs: number, fetchImpl: typeof fetch = fetch) {
    this.url = url;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl;
  }

  public async fetchPrices(): Promise<PriceLookup> {
    const fetchImpl = this.fetchImpl;
    const resp = await fetchImpl(this.url, { signal: AbortSignal.timeout(this.timeoutMs) }).catch(
      (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        throw new UpstreamUnavailableError(`Price feed request failed: ${message}`);
      }
    );
    if (!resp.ok) {
      throw new UpstreamUnavailableError(`API request failed with status ${resp.status}`);
    }

    let body: unknown;
    try {
      body = await resp.json();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UpstreamUnavailableError(`Price feed returned invalid JSON: ${message}`);
    }
    return parseMarketData(body);
  }
}

export interface PriceApplication {
  securities: Security[];
  updatedSymbols: string[];
  missingSymbols: string[];
}

/**
 * Returns a new security list with prices refreshed from the lookup.
 * Matching is case-insensitive on the trimmed symbol; unmatched securities keep their
 * previous (possibly absent) price.
 */
export function applyPrices(
  securities: readonly Security[],
  lookup: PriceLookup
): PriceApplication {
  const updatedSymbols: string[] = [];
  const missingSymbols: string[] = [];

  const refreshed = securities.map((security) => {
    const key = normalizeSymbol(security.symbol);
    if (Object.prototype.hasOwnProperty.call(lookup, key)) {
      updatedSymbols.push(security.symbol);
      return { ...security, price: lookup[key] };
    }
    missingSymbols.push(security.symbol);
    return { ...security };
  });

  return { securities: refreshed, updatedSymbols, missingSymbols };
}
