import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";
import { Security } from "../models/Security";
import { SecurityListSchema, SecurityStoreFileSchema, parseInput } from "../utils/validation";

/**
 * Source of the ordered security list for an allocation run.
 */
export interface SecuritySource {
  /** Reads the whole list as an immutable snapshot. */
  load(): Promise<Security[]>;
  /** Persists refreshed prices, keeping list order. */
  savePrices(securities: readonly Security[]): Promise<void>;
}

/**
 * Security store backed by a JSON file of the form
 * `{ "securities": [{ "symbol": "OGDC", "weight": 0.08, "price": 212.4 }] }`.
 */
export class JsonFileSecurityStore implements SecuritySource {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<Security[]> {
    const raw = await fs.promises.readFile(this.filePath, "utf-8");
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Security store "${this.filePath}" is not valid JSON: ${message}`);
    }
    return parseInput(SecurityStoreFileSchema, data, "securities file").securities;
  }

  async savePrices(securities: readonly Security[]): Promise<void> {
    const validated = parseInput(SecurityListSchema, securities, "securities");
    const records = validated.map((security) => ({
      symbol: security.symbol,
      weight: security.weight,
      price: security.price ?? null,
    }));
    // Unique per write so concurrent saves never rename each other's temp file
    const tmpPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;
    await fs.promises.writeFile(tmpPath, JSON.stringify({ securities: records }, null, 2) + "\n");
    await fs.promises.rename(tmpPath, this.filePath);
  }
}

/**
 * In-memory security source, used when the list is supplied directly.
 */
export class InMemorySecuritySource implements SecuritySource {
  private securities: Security[];

  constructor(securities: readonly Security[]) {
    this.securities = securities.map((security) => ({ ...security }));
  }

  async load(): Promise<Security[]> {
    return this.securities.map((security) => ({ ...security }));
  }

  async savePrices(securities: readonly Security[]): Promise<void> {
    this.securities = securities.map((security) => ({ ...security }));
  }
}
