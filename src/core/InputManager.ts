import type { CalculatorInput } from "@/types";
import type Phaser from "phaser";
import { resolveKey } from "./KeyMap";

/** Receives every key press the calculator understands */
export type InputHandler = (input: CalculatorInput) => void;

/**
 * Manages keyboard input for the calculator scene
 *
 * Key codes registered with onKeyPress take priority (debug toggles);
 * everything else goes through the key map to the input handler.
 */
export class InputManager {
  private scene: Phaser.Scene;
  private keyCallbacks: Map<string, () => void> = new Map();
  private inputHandler: InputHandler | null = null;

  constructor(scene: Phaser.Scene) {
    this.scene = scene;
    this.setupInputListeners();
  }

  private setupInputListeners(): void {
    this.scene.input.keyboard?.on("keydown", (event: KeyboardEvent) => {
      const callback = this.keyCallbacks.get(event.code);
      if (callback) {
        callback();
        return;
      }

      const input = resolveKey(event);
      if (input && this.inputHandler) {
        // Keeps Backspace and "/" from triggering browser shortcuts
        event.preventDefault();
        this.inputHandler(input);
      }
    });
  }

  /** Route calculator input (digits and operations) to a handler */
  onInput(handler: InputHandler): void {
    this.inputHandler = handler;
  }

  /** Register a callback for a specific key code */
  onKeyPress(keyCode: string, callback: () => void): void {
    this.keyCallbacks.set(keyCode, callback);
  }

  /** Clean up input listeners */
  destroy(): void {
    this.scene.input.keyboard?.off("keydown");
    this.keyCallbacks.clear();
    this.inputHandler = null;
  }
}
