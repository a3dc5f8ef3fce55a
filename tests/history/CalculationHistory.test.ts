import { CalculationHistory, formatTimestamp } from "@/history/CalculationHistory";
import { describe, expect, it } from "vitest";

/** Clock that advances one second per call from 2026-01-15 09:05:03 */
function steppingClock(): () => Date {
  let seconds = 3;
  return () => new Date(2026, 0, 15, 9, 5, seconds++);
}

describe("CalculationHistory", () => {
  describe("addCalculation", () => {
    it("should store items per mode", () => {
      const history = new CalculationHistory(steppingClock());
      history.addCalculation("2 + 3", "5", "standard");
      history.addCalculation("sqrt(9)", "3", "scientific");

      expect(history.getHistoryCount("standard")).toBe(1);
      expect(history.getHistoryCount("scientific")).toBe(1);
      expect(history.getHistory("standard")[0].toString()).toBe("2 + 3 = 5");
    });

    it("should stamp items with the clock", () => {
      const history = new CalculationHistory(steppingClock());
      const item = history.addCalculation("2 + 3", "5", "standard");

      expect(item.timestamp).toEqual(new Date(2026, 0, 15, 9, 5, 3));
      expect(item.mode).toBe("standard");
    });

    it("should evict the oldest item when full", () => {
      const history = new CalculationHistory(steppingClock(), 3);
      for (let i = 1; i <= 4; i++) {
        history.addCalculation(`${i} + 0`, `${i}`, "standard");
      }

      const results = history.getHistory("standard").map((item) => item.result);
      expect(results).toEqual(["2", "3", "4"]);
    });

    it("should keep one hundred items per mode by default", () => {
      const history = new CalculationHistory(steppingClock());
      for (let i = 0; i < 101; i++) {
        history.addCalculation(`${i} + 0`, `${i}`, "scientific");
      }

      expect(history.getHistoryCount("scientific")).toBe(100);
      expect(history.getHistory("scientific")[0].result).toBe("1");
    });
  });

  describe("queries", () => {
    it("should return copies of the stored list", () => {
      const history = new CalculationHistory(steppingClock());
      history.addCalculation("1 + 1", "2", "standard");

      history.getHistory("standard").length = 0;
      expect(history.getHistoryCount("standard")).toBe(1);
    });

    it("should merge both modes in timestamp order", () => {
      const history = new CalculationHistory(steppingClock());
      history.addCalculation("1 + 1", "2", "standard");
      history.addCalculation("sqrt(4)", "2", "scientific");
      history.addCalculation("2 + 2", "4", "standard");

      const expressions = history.getAllHistory().map((item) => item.expression);
      expect(expressions).toEqual(["1 + 1", "sqrt(4)", "2 + 2"]);
    });

    it("should keep insertion order across modes for equal timestamps", () => {
      const history = new CalculationHistory(() => new Date(2026, 0, 15, 9, 5, 3));
      history.addCalculation("sqrt(4)", "2", "scientific");
      history.addCalculation("1 + 1", "2", "standard");
      history.addCalculation("sqrt(9)", "3", "scientific");

      const expressions = history.getAllHistory().map((item) => item.expression);
      expect(expressions).toEqual(["sqrt(4)", "1 + 1", "sqrt(9)"]);
    });

    it("should return the most recent item or null", () => {
      const history = new CalculationHistory(steppingClock());
      expect(history.getMostRecent("standard")).toBeNull();

      history.addCalculation("1 + 1", "2", "standard");
      history.addCalculation("2 + 2", "4", "standard");
      expect(history.getMostRecent("standard")?.result).toBe("4");
    });
  });

  describe("removal", () => {
    it("should remove one item by identity", () => {
      const history = new CalculationHistory(steppingClock());
      const first = history.addCalculation("1 + 1", "2", "standard");
      history.addCalculation("2 + 2", "4", "standard");

      expect(history.removeHistoryItem(first)).toBe(true);
      expect(history.removeHistoryItem(first)).toBe(false);
      expect(history.getHistory("standard").map((item) => item.result)).toEqual(["4"]);
    });

    it("should clear one mode or both", () => {
      const history = new CalculationHistory(steppingClock());
      history.addCalculation("1 + 1", "2", "standard");
      history.addCalculation("sqrt(4)", "2", "scientific");

      history.clearHistory("standard");
      expect(history.getHistoryCount("standard")).toBe(0);
      expect(history.getHistoryCount("scientific")).toBe(1);

      history.clearAllHistory();
      expect(history.getAllHistory()).toEqual([]);
    });
  });

  describe("exportHistory", () => {
    it("should write a title, a rule and one timestamped line per item", () => {
      const history = new CalculationHistory(steppingClock());
      history.addCalculation("2 + 3", "5", "standard");
      history.addCalculation("10 ÷ 4", "2.5", "standard");

      expect(history.exportHistory("standard")).toBe(
        [
          "Calculator History - Standard Mode",
          "=".repeat(40),
          "2026-01-15 09:05:03 - 2 + 3 = 5",
          "2026-01-15 09:05:04 - 10 ÷ 4 = 2.5",
          "",
        ].join("\n")
      );
    });

    it("should export only the header for an empty mode", () => {
      const history = new CalculationHistory(steppingClock());
      expect(history.exportHistory("scientific")).toBe(
        `Calculator History - Scientific Mode\n${"=".repeat(40)}\n`
      );
    });
  });

  describe("formatTimestamp", () => {
    it("should zero-pad every field", () => {
      expect(formatTimestamp(new Date(2026, 2, 7, 4, 8, 9))).toBe("2026-03-07 04:08:09");
    });
  });
});
