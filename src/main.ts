import Phaser from "phaser";
import { createGameConfig } from "@/config/gameConfig";
import { CalculatorScene } from "@/scenes";

/**
 * Main entry point for the calculator front end
 */
function startCalculator(): void {
  const config = createGameConfig([CalculatorScene]);
  new Phaser.Game(config);
  console.log("🧮 Calculator started - press ` for the debug overlay");
}

startCalculator();
