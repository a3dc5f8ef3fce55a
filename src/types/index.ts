/**
 * Core type definitions for the calculator
 */

// =============================================================================
// MODE TYPES
// =============================================================================

/** Calculator modes; scientific unlocks the transcendental operators */
export type CalculatorMode = "standard" | "scientific";

// =============================================================================
// OPERATION TYPES
// =============================================================================

/** Operators taking two operands, resolved on Equals */
export type BinaryOperation = "add" | "subtract" | "multiply" | "divide" | "power";

/** Operators applied in place to the current value */
export type UnaryOperation =
  | "changeSign"
  | "percent"
  | "reciprocal"
  | "sqrt"
  | "sin"
  | "cos"
  | "tan"
  | "log" // natural logarithm
  | "log10"
  | "exp";

/** Operations that act on the engine state rather than on a value */
export type ControlOperation = "equals" | "clear" | "clearEntry";

/** Every operation the engine accepts */
export type OperationType = BinaryOperation | UnaryOperation | ControlOperation;

// =============================================================================
// ERROR TYPES
// =============================================================================

/** Failure categories raised by the arithmetic layer */
export type CalculationErrorKind = "format" | "divide_by_zero" | "domain" | "unknown";

/** Why an operation left the state untouched */
export type IgnoreReason =
  | "error_state"
  | "mode_restricted"
  | "no_pending_operation"
  | "duplicate_decimal_point";

/**
 * Result of dispatching one operation.
 * The engine never lets an exception cross its public surface.
 */
export type OperationOutcome =
  | { readonly type: "applied" }
  | { readonly type: "ignored"; readonly reason: IgnoreReason }
  | { readonly type: "error"; readonly kind: CalculationErrorKind; readonly message: string };

// =============================================================================
// INPUT TYPES
// =============================================================================

/** Characters accepted by digit entry */
export type DigitInput = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9" | ".";

/** A raw key or button press translated for the engine */
export type CalculatorInput =
  | { readonly type: "digit"; readonly digit: DigitInput }
  | { readonly type: "operation"; readonly operation: OperationType };

/** Minimal keyboard event shape needed for key mapping */
export interface KeyPress {
  readonly code: string;
  readonly key: string;
}

// =============================================================================
// HISTORY TYPES
// =============================================================================

/** Serializable snapshot of a history entry */
export interface HistoryItemData {
  readonly expression: string;
  readonly result: string;
  readonly mode: CalculatorMode;
  readonly timestamp: Date;
}

// =============================================================================
// CONFIG TYPES
// =============================================================================

/** Options for the Phaser game wrapper */
export interface GameOptions {
  readonly width: number;
  readonly height: number;
  readonly backgroundColor: number;
  readonly forceCanvas: boolean;
}

/** Options for a calculation engine instance */
export interface EngineOptions {
  readonly mode: CalculatorMode;
  readonly standardPrecision: number;
  readonly scientificPrecision: number;
}

/** Debug information displayed in the overlay */
export interface DebugInfo {
  fps: number;
  renderer: string;
  [key: string]: string | number | boolean;
}
