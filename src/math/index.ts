export { RationalNumber, DEFAULT_PRECISION } from "./RationalNumber";
export {
  CalculationError,
  DivideByZeroError,
  DomainError,
  FormatError,
  isCalculationError,
} from "./errors";
