export type PresetName = "Full" | "High" | "Balanced" | "Medium" | "Social" | "Small";

export interface Preset {
  readonly name: PresetName;
  readonly maxOutputSide: number;
  readonly maxFallbackInputSide: number;
}
