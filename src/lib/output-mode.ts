/**
 * Output modes - Which files a job produces
 */

import { z } from "zod";
import { InvalidInputError } from "@/lib/errors/job-errors";
import type { OutputMode } from "@/types";

export const OUTPUT_MODES: readonly OutputMode[] = ["video", "both", "ply"];

export const DEFAULT_OUTPUT_MODE: OutputMode = "video";

// "depth" is what older clients send for a video-only render
const OUTPUT_ALIASES: Readonly<Record<string, OutputMode>> = {
  depth: "video",
  mp4: "video",
};

const OutputModeSchema = z.enum(["video", "both", "ply"]);

/**
 * Resolve a submitted mode name; `exportPly` upgrades "video" to "both"
 */
export function resolveOutputMode(requested?: string, exportPly = false): OutputMode {
  const name = requested?.trim().toLowerCase() || DEFAULT_OUTPUT_MODE;
  const parsed = OutputModeSchema.safeParse(OUTPUT_ALIASES[name] ?? name);
  if (!parsed.success) {
    throw new InvalidInputError(`Unknown output mode "${requested}"; expected one of ${OUTPUT_MODES.join(", ")}`, {
      outputMode: requested,
    });
  }
  return exportPly && parsed.data === "video" ? "both" : parsed.data;
}

export function producesVideo(output: OutputMode): boolean {
  return output !== "ply";
}

export function producesScene(output: OutputMode): boolean {
  return output !== "video";
}
