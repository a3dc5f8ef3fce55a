import { resolveButton } from "@/core/KeyMap";
import { CalculationEngine } from "@/engine";
import { CalculationHistory } from "@/history/CalculationHistory";
import { RationalNumber } from "@/math";
import type { CalculatorMode } from "@/types";

/** Line sink, console.log in the CLI */
export type DemoWriter = (line: string) => void;

export interface ConsoleDemoOptions {
  /** Clock used to stamp history items */
  clock: () => Date;
}

const DEFAULT_DEMO_OPTIONS: ConsoleDemoOptions = {
  clock: () => new Date(),
};

/** Keypad presses for each demo calculation; numbers are typed digit by digit */
const STANDARD_CALCULATIONS: readonly (readonly string[])[] = [
  ["2", "+", "3", "="],
  ["10", "÷", "3", "="],
  ["123.456", "×", "789.123", "="],
];

const SCIENTIFIC_CALCULATIONS: readonly (readonly string[])[] = [
  ["9", "√"],
  ["100", "log"],
  ["90", "sin"],
];

/**
 * Press a sequence of keypad labels on the engine.
 * Labels that are not buttons are typed one character at a time.
 */
export function pressKeys(engine: CalculationEngine, labels: readonly string[]): void {
  for (const label of labels) {
    const button = resolveButton(label);
    const inputs = button ? [button] : [...label].map((char) => resolveButton(char));

    for (const input of inputs) {
      if (!input) {
        throw new Error(`No keypad button for "${label}"`);
      }
      if (input.type === "digit") {
        engine.inputDigit(input.digit);
      } else {
        engine.performOperation(input.operation);
      }
    }
  }
}

function showArithmetic(write: DemoWriter): void {
  write("=== High-Precision Arithmetic ===");

  const a = RationalNumber.parse("123.456789012345678901234567890");
  const b = RationalNumber.parse("987.654321098765432109876543210");
  write(`a = ${a.toString()}`);
  write(`b = ${b.toString()}`);
  write(`a + b = ${a.add(b).toString()}`);
  write(`a - b = ${a.subtract(b).toString()}`);
  write(`a × b = ${a.multiply(b).toString()}`);
  write(`a ÷ b = ${a.divide(b).toString()}`);

  const third = RationalNumber.of(1n, 3n);
  write(`1/3 (50 digits) = ${third.toString(50)}`);

  const tiny = RationalNumber.parse("1.23456789E-15");
  write(`1.23456789E-15 (20 digits) = ${tiny.toString(20)}`);
}

function showMode(
  write: DemoWriter,
  history: CalculationHistory,
  mode: CalculatorMode,
  calculations: readonly (readonly string[])[]
): void {
  write(`=== ${mode === "standard" ? "Standard" : "Scientific"} Mode ===`);

  const engine = new CalculationEngine({ mode });
  for (const keys of calculations) {
    engine.performOperation("clear");
    pressKeys(engine, keys);
    write(engine.getCompleteExpression());
    if (!engine.hasError) {
      history.addCalculation(engine.currentExpression, engine.currentDisplay, mode);
    }
  }
}

function showHistory(write: DemoWriter, history: CalculationHistory): void {
  write("=== History ===");

  for (const mode of ["standard", "scientific"] as const) {
    for (const line of history.exportHistory(mode).trimEnd().split("\n")) {
      write(line);
    }
  }

  const standard = history.getHistoryCount("standard");
  const scientific = history.getHistoryCount("scientific");
  write(`Standard: ${standard}, Scientific: ${scientific}, Total: ${standard + scientific}`);
}

/**
 * Run the console walkthrough: exact arithmetic, both engine modes, history.
 */
export function runConsoleDemo(
  write: DemoWriter,
  options: Partial<ConsoleDemoOptions> = {}
): CalculationHistory {
  const { clock } = { ...DEFAULT_DEMO_OPTIONS, ...options };
  const history = new CalculationHistory(clock);

  showArithmetic(write);
  showMode(write, history, "standard", STANDARD_CALCULATIONS);
  showMode(write, history, "scientific", SCIENTIFIC_CALCULATIONS);
  showHistory(write, history);

  return history;
}
