import type { ICalculationEngine } from "@/engine";
import type { DebugInfo } from "@/types";
import Phaser from "phaser";

/**
 * Debug overlay showing renderer stats and the engine's internal state
 */
export class DebugView {
  private scene: Phaser.Scene;
  private engine: ICalculationEngine;
  private textObject: Phaser.GameObjects.Text | null = null;
  private visible = false;

  constructor(scene: Phaser.Scene, engine: ICalculationEngine) {
    this.scene = scene;
    this.engine = engine;
  }

  /** Initialize the debug text display */
  create(): void {
    this.textObject = this.scene.add.text(10, 10, "", {
      fontFamily: "JetBrains Mono, monospace",
      fontSize: "12px",
      color: "#00ff88",
      backgroundColor: "rgba(0, 0, 0, 0.8)",
      padding: { x: 8, y: 6 },
    });
    this.textObject.setDepth(9999);
    this.textObject.setVisible(this.visible);
  }

  /** Toggle debug view visibility */
  toggle(): void {
    this.visible = !this.visible;
    this.textObject?.setVisible(this.visible);
  }

  /** Update the debug display */
  update(): void {
    if (!this.visible || !this.textObject) return;

    const info = this.getDebugInfo();
    const lines = Object.entries(info).map(([key, value]) => `${key}: ${value}`);
    this.textObject.setText(lines.join("\n"));
  }

  private getDebugInfo(): DebugInfo {
    const renderer = this.scene.game.renderer;

    return {
      fps: Math.round(this.scene.game.loop.actualFps),
      renderer: renderer.type === Phaser.WEBGL ? "WebGL" : "Canvas",
      mode: this.engine.mode,
      precision: this.engine.displayPrecision,
      value: this.engine.value.toFraction(),
      pending: this.engine.pendingOperation ?? "none",
      awaitingEntry: this.engine.isAwaitingNewEntry,
      error: this.engine.errorMessage ?? "none",
    };
  }

  /** Clean up resources */
  destroy(): void {
    this.textObject?.destroy();
    this.textObject = null;
  }
}
