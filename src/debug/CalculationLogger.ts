/**
 * CalculationLogger - Session recorder for debugging calculator issues
 *
 * Enable this to capture every engine call while reproducing a bug.
 * The captured session can be exported as a ready-to-paste test case.
 */

import type { CalculatorMode, OperationOutcome } from "@/types";

/** What kind of engine call produced a log entry */
export type CalculationStepKind = "digit" | "operation" | "set_value" | "mode";

/**
 * Debug log entry for a single engine call.
 */
export interface CalculationDebugLog {
  timestamp: number;
  kind: CalculationStepKind;
  /** Digit, operation name, injected text or new mode */
  input: string;
  mode: CalculatorMode;
  display: string;
  expression: string;
  hasError: boolean;
  outcome?: OperationOutcome;
}

/**
 * Global debug logger instance.
 */
class CalculationLoggerImpl {
  private enabled = false;
  private logs: CalculationDebugLog[] = [];
  private maxLogs = 100;
  private lastLog: CalculationDebugLog | null = null;

  /**
   * Enable debug logging.
   */
  enable(): void {
    this.enabled = true;
    console.log("[CALC DEBUG] Logging enabled. Use CalculationLogger.dump() to see logs.");
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[CALC DEBUG] Logging disabled.");
  }

  /**
   * Toggle debug logging.
   */
  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record one engine call with the state it left behind.
   */
  logStep(entry: Omit<CalculationDebugLog, "timestamp">): void {
    if (!this.enabled) return;

    const log: CalculationDebugLog = { timestamp: Date.now(), ...entry };
    this.lastLog = log;
    this.logs.push(log);

    // Keep only the last N logs
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  getLastLog(): CalculationDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly CalculationDebugLog[] {
    return this.logs;
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[CALC DEBUG] Dumping logs...");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`${log.kind} "${log.input}" @ ${new Date(log.timestamp).toISOString()}`);
      console.log("Mode:", log.mode);
      console.log("Display:", log.display);
      console.log("Expression:", log.expression);
      if (log.outcome) {
        console.log("Outcome:", log.outcome);
      }
      console.groupEnd();
    }
  }

  /**
   * Clear all logs.
   */
  clear(): void {
    this.logs = [];
    this.lastLog = null;
    console.log("[CALC DEBUG] Logs cleared.");
  }

  /**
   * Export the captured session as a test case that replays it.
   */
  exportAsTestSetup(): string {
    if (this.logs.length === 0) {
      return "// No log available";
    }

    const first = this.logs[0];
    const last = this.logs[this.logs.length - 1];
    const steps = this.logs.map((log) => `    ${this.replayStatement(log)}`).join("\n");

    return `it("replays recorded session", () => {
    const engine = new CalculationEngine({ mode: "${first.mode}" });
${steps}

    expect(engine.currentDisplay).toBe(${JSON.stringify(last.display)});
    expect(engine.currentExpression).toBe(${JSON.stringify(last.expression)});
    expect(engine.hasError).toBe(${last.hasError});
  });`;
  }

  /**
   * Print the session as a test case to console.
   */
  exportToConsole(): void {
    console.log("[CALC DEBUG] Test Setup Export:");
    console.log(this.exportAsTestSetup());
  }

  private replayStatement(log: CalculationDebugLog): string {
    switch (log.kind) {
      case "digit":
        return `engine.inputDigit(${JSON.stringify(log.input)});`;
      case "operation":
        return `engine.performOperation(${JSON.stringify(log.input)});`;
      case "set_value":
        return `engine.setCurrentValue(${JSON.stringify(log.input)});`;
      case "mode":
        return `engine.mode = ${JSON.stringify(log.input)};`;
    }
  }
}

/**
 * Global debug logger instance.
 */
export const CalculationLogger = new CalculationLoggerImpl();

// Expose to window for easy access from browser console
if (typeof window !== "undefined") {
  (window as unknown as { CalculationLogger: CalculationLoggerImpl }).CalculationLogger =
    CalculationLogger;
}
