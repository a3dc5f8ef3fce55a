export { CalculationEngine } from "./CalculationEngine";
export type { ICalculationEngine } from "./ICalculationEngine";
export {
  OPERATOR_SYMBOLS,
  SCIENTIFIC_ONLY_OPERATIONS,
  evaluateBinary,
  evaluateUnary,
  formatUnaryTrace,
  isBinaryOperation,
} from "./operations";
