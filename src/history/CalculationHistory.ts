import { MAX_HISTORY_ITEMS } from "@/config/calculatorConfig";
import type { CalculatorMode, HistoryItemData } from "@/types";

/**
 * A finished calculation as shown in the history panel
 */
export class HistoryItem implements HistoryItemData {
  readonly expression: string;
  readonly result: string;
  readonly mode: CalculatorMode;
  readonly timestamp: Date;

  constructor(expression: string, result: string, mode: CalculatorMode, timestamp: Date) {
    this.expression = expression;
    this.result = result;
    this.mode = mode;
    this.timestamp = timestamp;
  }

  toString(): string {
    return `${this.expression} = ${this.result}`;
  }
}

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, "0");
}

/** Local time as yyyy-MM-dd HH:mm:ss */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * In-memory calculation log with a separate, fixed-capacity list per mode.
 * Adding to a full list evicts its oldest item.
 */
export class CalculationHistory {
  private readonly histories: Record<CalculatorMode, HistoryItem[]> = {
    standard: [],
    scientific: [],
  };
  /** Insertion order across both modes, for ordering equal timestamps */
  private readonly sequence = new WeakMap<HistoryItem, number>();
  private nextSequence = 0;

  constructor(
    private readonly clock: () => Date = () => new Date(),
    private readonly capacity = MAX_HISTORY_ITEMS
  ) {}

  /** Record a finished calculation and return the stored item */
  addCalculation(expression: string, result: string, mode: CalculatorMode): HistoryItem {
    const item = new HistoryItem(expression, result, mode, this.clock());
    const target = this.histories[mode];
    this.sequence.set(item, this.nextSequence++);

    if (target.length >= this.capacity) {
      target.shift();
    }
    target.push(item);
    return item;
  }

  /** Items for one mode, oldest first (a copy) */
  getHistory(mode: CalculatorMode): HistoryItem[] {
    return [...this.histories[mode]];
  }

  /** Items of both modes ordered by timestamp, then by insertion */
  getAllHistory(): HistoryItem[] {
    return [...this.histories.standard, ...this.histories.scientific].sort(
      (a, b) =>
        a.timestamp.getTime() - b.timestamp.getTime() ||
        (this.sequence.get(a) ?? 0) - (this.sequence.get(b) ?? 0)
    );
  }

  clearHistory(mode: CalculatorMode): void {
    this.histories[mode].length = 0;
  }

  clearAllHistory(): void {
    this.clearHistory("standard");
    this.clearHistory("scientific");
  }

  /** Remove one item by identity; returns whether it was found */
  removeHistoryItem(item: HistoryItem): boolean {
    for (const list of Object.values(this.histories)) {
      const index = list.indexOf(item);
      if (index !== -1) {
        list.splice(index, 1);
        return true;
      }
    }
    return false;
  }

  getHistoryCount(mode: CalculatorMode): number {
    return this.histories[mode].length;
  }

  getMostRecent(mode: CalculatorMode): HistoryItem | null {
    const list = this.histories[mode];
    return list.length > 0 ? list[list.length - 1] : null;
  }

  /**
   * Export one mode's history as plain text:
   * a title line, a rule, then one timestamped line per item.
   */
  exportHistory(mode: CalculatorMode): string {
    const modeText = mode === "standard" ? "Standard" : "Scientific";
    let text = `Calculator History - ${modeText} Mode\n`;
    text += `${"=".repeat(40)}\n`;

    for (const item of this.histories[mode]) {
      text += `${formatTimestamp(item.timestamp)} - ${item.toString()}\n`;
    }
    return text;
  }
}
