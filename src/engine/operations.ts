import { DomainError } from "@/math/errors";
import { RationalNumber } from "@/math/RationalNumber";
import type { BinaryOperation, OperationType, UnaryOperation } from "@/types";

const HUNDRED = RationalNumber.of(100n);

/** Trace symbols for binary operators */
export const OPERATOR_SYMBOLS: Readonly<Record<BinaryOperation, string>> = {
  add: "+",
  subtract: "−",
  multiply: "×",
  divide: "÷",
  power: "^",
};

/** Operators that only take effect in scientific mode */
export const SCIENTIFIC_ONLY_OPERATIONS: ReadonlySet<OperationType> = new Set<OperationType>([
  "sqrt",
  "sin",
  "cos",
  "tan",
  "log",
  "log10",
  "exp",
  "power",
]);

const BINARY_OPERATIONS: ReadonlySet<OperationType> = new Set<OperationType>([
  "add",
  "subtract",
  "multiply",
  "divide",
  "power",
]);

export function isBinaryOperation(operation: OperationType): operation is BinaryOperation {
  return BINARY_OPERATIONS.has(operation);
}

/**
 * Wrap an operand's trace text in the notation of a unary operator.
 * Fragments nest, e.g. sqrt(negate(4)).
 */
export function formatUnaryTrace(operation: UnaryOperation, operand: string): string {
  switch (operation) {
    case "changeSign":
      return `negate(${operand})`;
    case "percent":
      return `${operand}%`;
    case "reciprocal":
      return `1/(${operand})`;
    case "log":
      return `ln(${operand})`;
    case "log10":
      return `log(${operand})`;
    default:
      return `${operation}(${operand})`;
  }
}

/**
 * Apply a double-precision function and lift the result back to an exact value.
 * Exactness ends here for transcendental operators.
 */
function viaFloat(value: RationalNumber, fn: (x: number) => number): RationalNumber {
  return RationalNumber.fromNumber(fn(value.toNumber()));
}

function requirePositive(value: RationalNumber): void {
  if (!value.greaterThan(RationalNumber.ZERO)) {
    throw new DomainError("Invalid input for logarithm");
  }
}

/**
 * Evaluate a unary operator.
 * Trigonometric functions take radians.
 *
 * @throws DivideByZeroError for the reciprocal of zero
 * @throws DomainError for a negative root or a non-positive logarithm argument
 */
export function evaluateUnary(operation: UnaryOperation, value: RationalNumber): RationalNumber {
  switch (operation) {
    case "changeSign":
      return value.negate();
    case "percent":
      return value.divide(HUNDRED);
    case "reciprocal":
      return value.reciprocal();
    case "sqrt":
      return value.sqrt();
    case "sin":
      return viaFloat(value, Math.sin);
    case "cos":
      return viaFloat(value, Math.cos);
    case "tan":
      return viaFloat(value, Math.tan);
    case "log":
      requirePositive(value);
      return viaFloat(value, Math.log);
    case "log10":
      requirePositive(value);
      return viaFloat(value, Math.log10);
    case "exp":
      return viaFloat(value, Math.exp);
  }
}

/**
 * Evaluate a binary operator. Only power leaves exact arithmetic.
 *
 * @throws DivideByZeroError when dividing by zero
 * @throws DomainError when power has no finite real result
 */
export function evaluateBinary(
  operation: BinaryOperation,
  left: RationalNumber,
  right: RationalNumber
): RationalNumber {
  switch (operation) {
    case "add":
      return left.add(right);
    case "subtract":
      return left.subtract(right);
    case "multiply":
      return left.multiply(right);
    case "divide":
      return left.divide(right);
    case "power":
      return RationalNumber.fromNumber(Math.pow(left.toNumber(), right.toNumber()));
  }
}
