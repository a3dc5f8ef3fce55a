import type { CalculationErrorKind } from "@/types";

/**
 * Base class for failures raised by the arithmetic layer.
 * `kind` lets callers branch without instanceof chains.
 */
export abstract class CalculationError extends Error {
  abstract readonly kind: CalculationErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Unparseable numeric text */
export class FormatError extends CalculationError {
  readonly kind = "format" as const;
}

/** Zero denominator, zero divisor, or reciprocal of zero */
export class DivideByZeroError extends CalculationError {
  readonly kind = "divide_by_zero" as const;

  constructor(message = "Cannot divide by zero") {
    super(message);
  }
}

/** Argument outside the domain of a function (negative root, non-positive log) */
export class DomainError extends CalculationError {
  readonly kind = "domain" as const;
}

/** Check whether an unknown thrown value came from the arithmetic layer */
export function isCalculationError(error: unknown): error is CalculationError {
  return error instanceof CalculationError;
}
