import type { CalculatorInput, DigitInput, KeyPress, OperationType } from "@/types";

const DIGITS: ReadonlySet<string> = new Set(["0", "1", "2", "3", "4", "5", "6", "7", "8", "9", "."]);

function isDigitInput(value: string): value is DigitInput {
  return DIGITS.has(value);
}

/** Physical key codes that map to an operation regardless of layout */
const CODE_OPERATIONS: ReadonlyMap<string, OperationType> = new Map<string, OperationType>([
  ["NumpadAdd", "add"],
  ["NumpadSubtract", "subtract"],
  ["NumpadMultiply", "multiply"],
  ["NumpadDivide", "divide"],
  ["NumpadEnter", "equals"],
  ["Enter", "equals"],
  ["Escape", "clear"],
  ["Delete", "clearEntry"],
  ["Backspace", "clearEntry"],
]);

/** Printed characters that map to an operation */
const KEY_OPERATIONS: ReadonlyMap<string, OperationType> = new Map<string, OperationType>([
  ["+", "add"],
  ["-", "subtract"],
  ["*", "multiply"],
  ["/", "divide"],
  ["=", "equals"],
  ["%", "percent"],
  ["^", "power"],
]);

/** Keypad button labels */
const BUTTON_OPERATIONS: ReadonlyMap<string, OperationType> = new Map<string, OperationType>([
  ["+", "add"],
  ["−", "subtract"],
  ["×", "multiply"],
  ["÷", "divide"],
  ["=", "equals"],
  ["C", "clear"],
  ["CE", "clearEntry"],
  ["±", "changeSign"],
  ["%", "percent"],
  ["√", "sqrt"],
  ["1/x", "reciprocal"],
  ["sin", "sin"],
  ["cos", "cos"],
  ["tan", "tan"],
  ["log", "log10"],
  ["ln", "log"],
  ["exp", "exp"],
  ["x^y", "power"],
]);

/**
 * Translate a keyboard event into a calculator input.
 * Returns null for keys the calculator does not use.
 */
export function resolveKey(press: KeyPress): CalculatorInput | null {
  const byCode = CODE_OPERATIONS.get(press.code);
  if (byCode) {
    return { type: "operation", operation: byCode };
  }

  // Some locales print "," on the numpad decimal key
  if (press.code === "NumpadDecimal") {
    return { type: "digit", digit: "." };
  }

  // Shifted characters ("+" on Shift+Equal) already arrive resolved in `key`
  if (isDigitInput(press.key)) {
    return { type: "digit", digit: press.key };
  }

  const byKey = KEY_OPERATIONS.get(press.key);
  return byKey ? { type: "operation", operation: byKey } : null;
}

/**
 * Translate a keypad button label into a calculator input.
 */
export function resolveButton(label: string): CalculatorInput | null {
  if (isDigitInput(label)) {
    return { type: "digit", digit: label };
  }
  const operation = BUTTON_OPERATIONS.get(label);
  return operation ? { type: "operation", operation } : null;
}
