/**
 * Error kinds raised by the calculators and their collaborators.
 */

export type CalculatorErrorKind =
  | "MissingRequiredField"
  | "InvalidRange"
  | "ConfigurationError"
  | "UpstreamUnavailable";

export abstract class CalculatorError extends Error {
  abstract readonly kind: CalculatorErrorKind;
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingRequiredFieldError extends CalculatorError {
  readonly kind = "MissingRequiredField";
  readonly status = 400;
}

export class InvalidRangeError extends CalculatorError {
  readonly kind = "InvalidRange";
  readonly status = 400;
}

/** Selected weights cannot be normalised. */
export class ConfigurationError extends CalculatorError {
  readonly kind = "ConfigurationError";
  readonly status = 422;
}

/** The price feed could not be reached or answered with a failure. */
export class UpstreamUnavailableError extends CalculatorError {
  readonly kind = "UpstreamUnavailable";
  readonly status = 502;
}

export function isCalculatorError(error: unknown): error is CalculatorError {
  return error instanceof CalculatorError;
}
