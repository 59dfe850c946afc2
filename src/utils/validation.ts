import { z } from "zod";
import {
  InvalidRangeError,
  MissingRequiredFieldError,
} from "../models/CalculatorError";
import {
  MAX_COVERAGE_PERCENT,
  MAX_SIP_YEARS,
  MIN_COVERAGE_PERCENT,
  MIN_INVESTMENT_AMOUNT,
  WEIGHT_SUM_TOLERANCE,
} from "./constants";

/**
 * Zod validation schemas for input data validation.
 * Malformed records are rejected here, at the boundary, so the calculators only ever see
 * well-formed input. All percentage values are in percent (e.g., 10 means 10%).
 */

/**
 * Schema for a single security record from the security source.
 * A missing, null or non-positive price is accepted; the allocator skips such securities.
 */
export const SecuritySchema = z.object({
  symbol: z.string().trim().min(1),
  weight: z.number().gt(0).max(1),
  price: z
    .number()
    .nullable()
    .optional()
    .transform((price) => price ?? undefined),
});

/**
 * Schema for the ordered security list. Symbols must be unique (case-insensitive) and the
 * weights may not sum above 1.
 */
export const SecurityListSchema = z.array(SecuritySchema).superRefine((securities, ctx) => {
  const seen = new Set<string>();
  securities.forEach((security, index) => {
    const key = security.symbol.toUpperCase();
    if (seen.has(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "symbol"],
        message: `Duplicate symbol ${security.symbol}`,
      });
    }
    seen.add(key);
  });

  const totalWeight = securities.reduce((sum, security) => sum + security.weight, 0);
  if (totalWeight > 1 + WEIGHT_SUM_TOLERANCE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Weights sum to ${totalWeight}, above 1`,
    });
  }
});

/**
 * Schema for the JSON security store file.
 */
export const SecurityStoreFileSchema = z.object({
  securities: SecurityListSchema,
});

/**
 * Schema for the arguments of a single allocation run.
 */
export const AllocationArgumentsSchema = z.object({
  coveragePercent: z.number().gt(0).max(MAX_COVERAGE_PERCENT),
  investmentAmount: z.number().positive().finite(),
});

/**
 * Schema for SIP (Systematic Investment Plan) projection parameters.
 */
export const SipParametersSchema = z.object({
  initialBalance: z.number().min(0).finite().default(0),
  years: z.number().int().min(1),
  annualInterestRate: z.number().positive().finite(),
  monthlyInvestment: z.number().min(0).finite(),
  yearlyIncrementPercent: z.number().min(0).finite().default(0),
});

/**
 * Query strings arrive as text; empty values count as absent.
 */
function queryNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : Number(value)),
    schema
  );
}

function queryBoolean() {
  return z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : value === "true" || value === "1"),
    z.boolean().default(false)
  );
}

/**
 * Schema for GET /api/calculate-investment query parameters.
 */
export const InvestmentQuerySchema = z.object({
  coveragePercent: queryNumber(
    z.number().min(MIN_COVERAGE_PERCENT).max(MAX_COVERAGE_PERCENT)
  ),
  investmentAmount: queryNumber(z.number().min(MIN_INVESTMENT_AMOUNT).finite()),
  redistributeLeftover: queryBoolean(),
});

/**
 * Schema for GET /api/sip query parameters.
 */
export const SipQuerySchema = z.object({
  initialBalance: queryNumber(z.number().min(0).finite().default(0)),
  years: queryNumber(z.number().int().min(1).max(MAX_SIP_YEARS)),
  annualInterestRate: queryNumber(z.number().positive().finite()),
  monthlyInvestment: queryNumber(z.number().min(0).finite()),
  yearlyIncrementPercent: queryNumber(z.number().min(0).finite().default(0)),
});

function describePath(path: (string | number)[], context: string): string {
  return path.length > 0 ? `${context}.${path.join(".")}` : context;
}

/**
 * Parses input with a schema, converting validation failures into calculator errors:
 * absent values become MissingRequiredFieldError, everything else InvalidRangeError.
 *
 * @param context - Name used as the prefix of field paths in error messages
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const missing = result.error.issues.filter(
    (issue) => issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined"
  );
  if (missing.length > 0) {
    const fields = missing.map((issue) => describePath(issue.path, context));
    throw new MissingRequiredFieldError(`Missing required field(s): ${fields.join(", ")}`);
  }

  const problems = result.error.issues.map(
    (issue) => `${describePath(issue.path, context)}: ${issue.message}`
  );
  throw new InvalidRangeError(`Invalid ${context}: ${problems.join("; ")}`);
}
