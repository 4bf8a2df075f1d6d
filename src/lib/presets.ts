/**
 * Preset table - Named resolution tiers, ordered by decreasing resolution
 */

import { InvalidPresetError } from "@/lib/errors/job-errors";
import type { Preset, PresetName } from "@/types";

function preset(name: PresetName, maxOutputSide: number, maxFallbackInputSide: number): Preset {
  return Object.freeze({ name, maxOutputSide, maxFallbackInputSide });
}

// "Full" renders at image resolution; its cap only bounds pathological inputs
const PRESETS: readonly Preset[] = Object.freeze([
  preset("Full", 8192, 2048),
  preset("High", 1920, 1920),
  preset("Balanced", 1536, 1536),
  preset("Medium", 1280, 1280),
  preset("Social", 960, 960),
  preset("Small", 720, 720),
]);

const PRESETS_BY_KEY: ReadonlyMap<string, Preset> = new Map(
  PRESETS.map((entry) => [entry.name.toLowerCase(), entry])
);

export const DEFAULT_PRESET_NAME: PresetName = "Balanced";

/**
 * Resolve a preset by name (case-insensitive)
 */
export function resolvePreset(name: string): Preset {
  const found = PRESETS_BY_KEY.get(name.trim().toLowerCase());
  if (!found) {
    throw new InvalidPresetError(name);
  }
  return found;
}

export function listPresets(): readonly Preset[] {
  return PRESETS;
}
