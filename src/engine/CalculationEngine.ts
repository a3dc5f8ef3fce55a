import { createEngineOptions, precisionForMode } from "@/config/calculatorConfig";
import { CalculationLogger } from "@/debug/CalculationLogger";
import type { CalculationStepKind } from "@/debug/CalculationLogger";
import { isCalculationError } from "@/math/errors";
import { RationalNumber } from "@/math/RationalNumber";
import type {
  BinaryOperation,
  CalculatorMode,
  EngineOptions,
  OperationOutcome,
  OperationType,
  UnaryOperation,
} from "@/types";
import type { ICalculationEngine } from "./ICalculationEngine";
import {
  OPERATOR_SYMBOLS,
  SCIENTIFIC_ONLY_OPERATIONS,
  evaluateBinary,
  evaluateUnary,
  formatUnaryTrace,
  isBinaryOperation,
} from "./operations";

const APPLIED: OperationOutcome = { type: "applied" };

/**
 * CalculationEngine - Mutable calculation session over exact rational values
 *
 * States: ready, and a sticky error state left only through clear,
 * clearEntry or a successful setCurrentValue.
 *
 * The expression trace is kept as two parts:
 * - committed: text fixed by operators and Equals ("2 + ")
 * - operandLabel: trace text for the current operand after unary
 *   operators ("sqrt(9)"), or null when the rendered value stands for it
 */
export class CalculationEngine implements ICalculationEngine {
  private readonly options: EngineOptions;
  private currentMode: CalculatorMode;

  private currentValue: RationalNumber = RationalNumber.ZERO;
  private previousValue: RationalNumber = RationalNumber.ZERO;
  private pending: BinaryOperation | null = null;

  /** Text of the number being typed; null when awaiting a new entry */
  private entry: string | null = null;

  private committed = "";
  private operandLabel: string | null = null;
  /** Set by Equals; the next entry or operator starts a new trace */
  private traceClosed = false;

  private error: string | null = null;

  constructor(options: Partial<EngineOptions> = {}) {
    this.options = createEngineOptions(options);
    this.currentMode = this.options.mode;
  }

  // ===========================================================================
  // STATE
  // ===========================================================================

  get currentDisplay(): string {
    if (this.error !== null) return this.error;
    if (this.entry !== null) return this.entry;
    return this.render(this.currentValue);
  }

  get currentExpression(): string {
    return this.committed + (this.operandLabel ?? "");
  }

  get hasError(): boolean {
    return this.error !== null;
  }

  get errorMessage(): string | null {
    return this.error;
  }

  get mode(): CalculatorMode {
    return this.currentMode;
  }

  set mode(mode: CalculatorMode) {
    this.currentMode = mode;
    this.record("mode", mode);
  }

  get displayPrecision(): number {
    return precisionForMode(this.currentMode, this.options);
  }

  get value(): RationalNumber {
    return this.currentValue;
  }

  get pendingOperation(): BinaryOperation | null {
    return this.pending;
  }

  get isAwaitingNewEntry(): boolean {
    return this.entry === null;
  }

  getCompleteExpression(): string {
    const expression = this.currentExpression;
    const result = this.render(this.currentValue);
    if (expression.length === 0) return result;
    return expression.endsWith("=") ? expression : `${expression} = ${result}`;
  }

  // ===========================================================================
  // INPUT
  // ===========================================================================

  inputDigit(digit: string): OperationOutcome {
    const outcome = this.appendDigit(digit);
    this.record("digit", digit, outcome);
    return outcome;
  }

  performOperation(operation: OperationType): OperationOutcome {
    const outcome = this.dispatch(operation);
    this.record("operation", operation, outcome);
    return outcome;
  }

  setCurrentValue(text: string): OperationOutcome {
    const outcome = this.injectValue(text);
    this.record("set_value", text, outcome);
    return outcome;
  }

  // ===========================================================================
  // TRANSITIONS
  // ===========================================================================

  private appendDigit(digit: string): OperationOutcome {
    if (this.error !== null) {
      return { type: "ignored", reason: "error_state" };
    }

    const current = this.entry ?? "0";
    if (digit === "." && current.includes(".")) {
      return { type: "ignored", reason: "duplicate_decimal_point" };
    }

    let next: string;
    if (current === "0" && digit !== ".") {
      next = digit;
    } else if (current === "-0" && digit !== ".") {
      next = `-${digit}`;
    } else {
      next = current + digit;
    }

    let parsed: RationalNumber;
    try {
      parsed = RationalNumber.parse(next);
    } catch {
      this.error = "Invalid input";
      return { type: "error", kind: "format", message: this.error };
    }

    if (this.entry === null) {
      this.startOperand();
      this.operandLabel = null;
    }
    this.entry = next;
    this.currentValue = parsed;
    return APPLIED;
  }

  private dispatch(operation: OperationType): OperationOutcome {
    if (this.error !== null && operation !== "clear" && operation !== "clearEntry") {
      return { type: "ignored", reason: "error_state" };
    }
    if (this.currentMode === "standard" && SCIENTIFIC_ONLY_OPERATIONS.has(operation)) {
      return { type: "ignored", reason: "mode_restricted" };
    }

    try {
      switch (operation) {
        case "clear":
          this.clear();
          return APPLIED;
        case "clearEntry":
          this.clearEntry();
          return APPLIED;
        case "equals":
          return this.resolvePending();
      }
      return isBinaryOperation(operation)
        ? this.acceptBinary(operation)
        : this.applyUnary(operation);
    } catch (error) {
      return this.fail(error);
    }
  }

  private clear(): void {
    this.currentValue = RationalNumber.ZERO;
    this.previousValue = RationalNumber.ZERO;
    this.pending = null;
    this.entry = null;
    this.committed = "";
    this.operandLabel = null;
    this.traceClosed = false;
    this.error = null;
  }

  private clearEntry(): void {
    this.currentValue = RationalNumber.ZERO;
    this.entry = null;
    this.operandLabel = null;
    this.error = null;
  }

  private applyUnary(operation: UnaryOperation): OperationOutcome {
    // Toggling the sign of a number being typed keeps it editable
    if (operation === "changeSign" && this.entry !== null) {
      this.entry = this.entry.startsWith("-") ? this.entry.slice(1) : `-${this.entry}`;
      this.currentValue = this.currentValue.negate();
      return APPLIED;
    }

    const result = evaluateUnary(operation, this.currentValue);
    const label = formatUnaryTrace(operation, this.operandTrace());

    this.startOperand();
    this.currentValue = result;
    this.operandLabel = label;
    this.entry = null;
    return APPLIED;
  }

  private acceptBinary(operation: BinaryOperation): OperationOutcome {
    const symbol = OPERATOR_SYMBOLS[operation];

    if (this.pending !== null) {
      const resolved = this.resolvePending();
      if (resolved.type === "applied") {
        // Chained: the trace already ends with the resolved right operand
        this.traceClosed = false;
        this.committed += ` ${symbol} `;
      } else if (resolved.type === "ignored" && resolved.reason === "mode_restricted") {
        // A power left pending across a switch to standard mode is dropped
        this.committed += `${this.operandTrace()} ${symbol} `;
      } else {
        return resolved;
      }
    } else {
      const operand = this.operandTrace();
      this.startOperand();
      this.committed += `${operand} ${symbol} `;
    }

    this.previousValue = this.currentValue;
    this.pending = operation;
    this.operandLabel = null;
    this.entry = null;
    return APPLIED;
  }

  private resolvePending(): OperationOutcome {
    if (this.pending === null) {
      return { type: "ignored", reason: "no_pending_operation" };
    }
    if (this.pending === "power" && this.currentMode === "standard") {
      return { type: "ignored", reason: "mode_restricted" };
    }

    const result = evaluateBinary(this.pending, this.previousValue, this.currentValue);

    this.committed += this.operandTrace();
    this.currentValue = result;
    this.pending = null;
    this.operandLabel = null;
    this.entry = null;
    this.traceClosed = true;
    return APPLIED;
  }

  private injectValue(text: string): OperationOutcome {
    let parsed: RationalNumber;
    try {
      parsed = RationalNumber.parse(text);
    } catch {
      this.error = "Invalid value format";
      return { type: "error", kind: "format", message: this.error };
    }

    if (this.pending === null) {
      this.committed = "";
      this.traceClosed = false;
    }
    this.currentValue = parsed;
    this.operandLabel = this.render(parsed);
    this.entry = null;
    this.error = null;
    return APPLIED;
  }

  private fail(error: unknown): OperationOutcome {
    const message = error instanceof Error ? error.message : String(error);
    this.error = message;
    return {
      type: "error",
      kind: isCalculationError(error) ? error.kind : "unknown",
      message,
    };
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  /** A finished calculation is dropped from the trace once a new operand starts */
  private startOperand(): void {
    if (this.traceClosed) {
      this.committed = "";
      this.traceClosed = false;
    }
  }

  /** Trace text standing for the current operand */
  private operandTrace(): string {
    return this.operandLabel ?? this.render(this.currentValue);
  }

  private render(value: RationalNumber): string {
    return value.toString(this.displayPrecision);
  }

  private record(kind: CalculationStepKind, input: string, outcome?: OperationOutcome): void {
    CalculationLogger.logStep({
      kind,
      input,
      mode: this.currentMode,
      display: this.currentDisplay,
      expression: this.currentExpression,
      hasError: this.hasError,
      outcome,
    });
  }
}
