/**
 * ICalculationEngine - Formal interface for the calculation state machine
 *
 * This is the contract that front ends, the console demo and history
 * recall use. Every call runs to completion synchronously and reports
 * its result as an OperationOutcome; failures never escape as exceptions.
 */

import type { RationalNumber } from "@/math/RationalNumber";
import type { BinaryOperation, CalculatorMode, OperationOutcome, OperationType } from "@/types";

export interface ICalculationEngine {
  // =========================================================================
  // INPUT
  // =========================================================================

  /**
   * Append a digit ("0"-"9") or decimal point to the number being typed.
   * Starts a fresh number right after an operator or Equals.
   */
  inputDigit(digit: string): OperationOutcome;

  /**
   * Dispatch an operation. Ignored while in the error state,
   * except for clear and clearEntry.
   */
  performOperation(operation: OperationType): OperationOutcome;

  /**
   * Inject a value directly (e.g. recalling a history entry).
   * Unparseable text enters the error state.
   */
  setCurrentValue(text: string): OperationOutcome;

  // =========================================================================
  // STATE
  // =========================================================================

  /** Error message while in the error state, else the rendered value */
  readonly currentDisplay: string;

  /** Accumulated human-readable trace of the calculation */
  readonly currentExpression: string;

  readonly hasError: boolean;

  readonly errorMessage: string | null;

  /** Changing the mode keeps all state; only precision and permitted operators change */
  mode: CalculatorMode;

  /** Fractional digits used for rendering in the current mode */
  readonly displayPrecision: number;

  /** Exact current value */
  readonly value: RationalNumber;

  readonly pendingOperation: BinaryOperation | null;

  /** True when the next digit starts a new number */
  readonly isAwaitingNewEntry: boolean;

  /**
   * Trace with " = <value>" appended, for logging a finished calculation.
   */
  getCompleteExpression(): string;
}
