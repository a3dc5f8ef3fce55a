import type { CalculatorMode, EngineOptions } from "@/types";

/** Fractional digits rendered in standard mode */
export const STANDARD_MODE_PRECISION = 16;

/** Fractional digits rendered in scientific mode */
export const SCIENTIFIC_MODE_PRECISION = 32;

/** Items kept per mode before the oldest is evicted */
export const MAX_HISTORY_ITEMS = 100;

/**
 * Default engine options
 */
export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  mode: "standard",
  standardPrecision: STANDARD_MODE_PRECISION,
  scientificPrecision: SCIENTIFIC_MODE_PRECISION,
};

/**
 * Merge caller overrides onto the defaults
 */
export function createEngineOptions(options: Partial<EngineOptions> = {}): EngineOptions {
  return { ...DEFAULT_ENGINE_OPTIONS, ...options };
}

/**
 * Rendering precision for a mode under the given options
 */
export function precisionForMode(mode: CalculatorMode, options: EngineOptions): number {
  return mode === "standard" ? options.standardPrecision : options.scientificPrecision;
}
