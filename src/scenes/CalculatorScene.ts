import { DebugView, InputManager, resolveButton } from "@/core";
import { CalculationLogger } from "@/debug/CalculationLogger";
import { CalculationEngine } from "@/engine";
import { CalculationHistory } from "@/history/CalculationHistory";
import type { CalculatorInput } from "@/types";
import Phaser from "phaser";
import {
  KEYPAD_COLUMNS,
  KEY_COLORS,
  type KeyDefinition,
  SCIENTIFIC_ROWS,
  STANDARD_ROWS,
} from "./keypadLayout";

type KeyObject = Phaser.GameObjects.Rectangle | Phaser.GameObjects.Text;

const FONT_FAMILY = "JetBrains Mono, monospace";

/**
 * Main calculator scene
 *
 * Owns one engine and one history log. Buttons and keys are translated
 * to engine calls; the display is redrawn from the engine after each call.
 */
export class CalculatorScene extends Phaser.Scene {
  private engine!: CalculationEngine;
  private history!: CalculationHistory;
  private inputManager!: InputManager;
  private debugView!: DebugView;

  private displayText!: Phaser.GameObjects.Text;
  private expressionText!: Phaser.GameObjects.Text;
  private modeButton!: Phaser.GameObjects.Text;
  private scientificKeys: KeyObject[] = [];

  private historyPanel!: Phaser.GameObjects.Container;
  private historyVisible = false;

  private static readonly MARGIN = 16;
  private static readonly KEY_GAP = 8;
  private static readonly KEY_HEIGHT = 52;
  private static readonly KEYPAD_TOP = 220;
  private static readonly HISTORY_ROWS = 10;

  constructor() {
    super({ key: "CalculatorScene" });
  }

  create(): void {
    this.cameras.main.setBackgroundColor(0x1a1a2e);

    this.engine = new CalculationEngine();
    this.history = new CalculationHistory();

    this.inputManager = new InputManager(this);
    this.inputManager.onInput((input) => this.handleInput(input));

    this.debugView = new DebugView(this, this.engine);
    this.debugView.create();

    // Toggle debug overlay with backtick key
    this.inputManager.onKeyPress("Backquote", () => {
      this.debugView.toggle();
    });

    // Toggle session logging with 'L' key
    this.inputManager.onKeyPress("KeyL", () => {
      CalculationLogger.toggle();
    });

    // Dump session logs with 'D' key
    this.inputManager.onKeyPress("KeyD", () => {
      CalculationLogger.dump();
    });

    // Export the session as a test case with 'T' key
    this.inputManager.onKeyPress("KeyT", () => {
      CalculationLogger.exportToConsole();
    });

    this.createDisplay();
    this.createToolbar();
    this.createKeypad();
    this.createHistoryPanel();

    this.applyMode();
    this.refresh();
  }

  update(): void {
    this.debugView.update();
  }

  // ===========================================================================
  // INPUT
  // ===========================================================================

  private handleInput(input: CalculatorInput): void {
    if (input.type === "digit") {
      this.engine.inputDigit(input.digit);
    } else {
      const outcome = this.engine.performOperation(input.operation);
      if (input.operation === "equals" && outcome.type === "applied") {
        this.recordHistory();
      }
    }
    this.refresh();
  }

  private recordHistory(): void {
    this.history.addCalculation(
      this.engine.currentExpression,
      this.engine.currentDisplay,
      this.engine.mode
    );
    if (this.historyVisible) {
      this.rebuildHistoryPanel();
    }
  }

  private toggleMode(): void {
    this.engine.mode = this.engine.mode === "standard" ? "scientific" : "standard";
    console.log(`Mode: ${this.engine.mode.toUpperCase()}`);
    this.applyMode();
    this.refresh();
  }

  private toggleHistory(): void {
    this.historyVisible = !this.historyVisible;
    if (this.historyVisible) {
      this.rebuildHistoryPanel();
    }
    this.historyPanel.setVisible(this.historyVisible);
  }

  // ===========================================================================
  // LAYOUT
  // ===========================================================================

  private get contentWidth(): number {
    return this.cameras.main.width - CalculatorScene.MARGIN * 2;
  }

  private createDisplay(): void {
    const right = this.cameras.main.width - CalculatorScene.MARGIN;

    this.expressionText = this.add
      .text(right, 90, "", {
        fontFamily: FONT_FAMILY,
        fontSize: "14px",
        color: "#888888",
        align: "right",
        wordWrap: { width: this.contentWidth, useAdvancedWrap: true },
      })
      .setOrigin(1, 1);

    this.displayText = this.add
      .text(right, 130, "0", {
        fontFamily: FONT_FAMILY,
        fontSize: "40px",
        color: "#ffffff",
      })
      .setOrigin(1, 0.5);
  }

  private createToolbar(): void {
    const style = {
      fontFamily: FONT_FAMILY,
      fontSize: "14px",
      color: "#e94560",
    };

    this.modeButton = this.add
      .text(CalculatorScene.MARGIN, 180, "", style)
      .setInteractive({ useHandCursor: true })
      .on("pointerdown", () => this.toggleMode());

    this.add
      .text(this.cameras.main.width - CalculatorScene.MARGIN, 180, "History", style)
      .setOrigin(1, 0)
      .setInteractive({ useHandCursor: true })
      .on("pointerdown", () => this.toggleHistory());
  }

  private createKeypad(): void {
    const rowHeight = CalculatorScene.KEY_HEIGHT + CalculatorScene.KEY_GAP;
    const rows = [...SCIENTIFIC_ROWS, ...STANDARD_ROWS];

    rows.forEach((row, rowIndex) => {
      const y = CalculatorScene.KEYPAD_TOP + rowIndex * rowHeight;
      let column = 0;
      for (const key of row) {
        const span = key.span ?? 1;
        this.createKey(key, column, span, y);
        column += span;
      }
    });
  }

  private createKey(key: KeyDefinition, column: number, span: number, y: number): void {
    const gap = CalculatorScene.KEY_GAP;
    const columnWidth = (this.contentWidth - gap * (KEYPAD_COLUMNS - 1)) / KEYPAD_COLUMNS;
    const width = columnWidth * span + gap * (span - 1);
    const centerX = CalculatorScene.MARGIN + column * (columnWidth + gap) + width / 2;
    const centerY = y + CalculatorScene.KEY_HEIGHT / 2;
    const color = KEY_COLORS[key.style];

    const background = this.add
      .rectangle(centerX, centerY, width, CalculatorScene.KEY_HEIGHT, color)
      .setStrokeStyle(1, 0x444466)
      .setInteractive({ useHandCursor: true });

    const label = this.add
      .text(centerX, centerY, key.label, {
        fontFamily: FONT_FAMILY,
        fontSize: "20px",
        color: "#ffffff",
      })
      .setOrigin(0.5);

    background.on("pointerdown", () => {
      const input = resolveButton(key.label);
      if (input) this.handleInput(input);
    });
    background.on("pointerover", () => background.setFillStyle(0x4a4a7a));
    background.on("pointerout", () => background.setFillStyle(color));

    if (key.style === "scientific") {
      this.scientificKeys.push(background, label);
    }
  }

  private createHistoryPanel(): void {
    this.historyPanel = this.add.container(CalculatorScene.MARGIN, CalculatorScene.KEYPAD_TOP);
    this.historyPanel.setDepth(100);
    this.historyPanel.setVisible(false);
  }

  private rebuildHistoryPanel(): void {
    this.historyPanel.removeAll(true);

    const width = this.contentWidth;
    const height = this.cameras.main.height - CalculatorScene.KEYPAD_TOP - CalculatorScene.MARGIN;

    // Interactive background swallows clicks meant for the keys underneath
    const background = this.add
      .rectangle(0, 0, width, height, 0x101020, 0.95)
      .setOrigin(0, 0)
      .setInteractive();
    this.historyPanel.add(background);

    const mode = this.engine.mode;
    const items = this.history.getHistory(mode).slice(-CalculatorScene.HISTORY_ROWS).reverse();

    this.historyPanel.add(
      this.add.text(12, 12, `${mode === "standard" ? "Standard" : "Scientific"} history`, {
        fontFamily: FONT_FAMILY,
        fontSize: "16px",
        color: "#e94560",
      })
    );

    if (items.length === 0) {
      this.historyPanel.add(
        this.add.text(12, 48, "No calculations yet", {
          fontFamily: FONT_FAMILY,
          fontSize: "14px",
          color: "#888888",
        })
      );
    }

    items.forEach((item, index) => {
      const entry = this.add
        .text(12, 48 + index * 36, item.toString(), {
          fontFamily: FONT_FAMILY,
          fontSize: "14px",
          color: "#ffffff",
          wordWrap: { width: width - 24, useAdvancedWrap: true },
        })
        .setInteractive({ useHandCursor: true })
        .on("pointerdown", () => {
          this.engine.setCurrentValue(item.result);
          this.toggleHistory();
          this.refresh();
        });
      this.historyPanel.add(entry);
    });

    const clearButton = this.add
      .text(12, height - 32, "Clear History", {
        fontFamily: FONT_FAMILY,
        fontSize: "14px",
        color: "#e94560",
      })
      .setInteractive({ useHandCursor: true })
      .on("pointerdown", () => {
        this.history.clearHistory(this.engine.mode);
        this.rebuildHistoryPanel();
      });
    this.historyPanel.add(clearButton);
  }

  // ===========================================================================
  // RENDERING
  // ===========================================================================

  private applyMode(): void {
    const scientific = this.engine.mode === "scientific";
    for (const key of this.scientificKeys) {
      key.setVisible(scientific);
    }
    this.modeButton.setText(`Mode: ${scientific ? "Scientific" : "Standard"}`);
    if (this.historyVisible) {
      this.rebuildHistoryPanel();
    }
  }

  private refresh(): void {
    const display = this.engine.currentDisplay;
    this.displayText.setText(display);
    this.displayText.setFontSize(this.displayFontSize(display.length));
    this.displayText.setColor(this.engine.hasError ? "#e94560" : "#ffffff");
    this.expressionText.setText(this.engine.currentExpression);
  }

  private displayFontSize(length: number): number {
    if (length <= 12) return 40;
    if (length <= 20) return 28;
    if (length <= 32) return 18;
    return 14;
  }
}
