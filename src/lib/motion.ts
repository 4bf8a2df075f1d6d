/**
 * Motion parameters - Kind parsing and slider clamping
 */

import { z } from "zod";
import { InvalidInputError } from "@/lib/errors/job-errors";
import type { MotionKind, MotionParams, MotionRequest, MotionSliders } from "@/types";

export interface SliderRange {
  min: number;
  max: number;
  default: number;
  integer?: boolean;
}

export const SLIDER_RANGES: Readonly<Record<keyof MotionSliders, SliderRange>> = {
  durationS: { min: 0.2, max: 20, default: 4 },
  fps: { min: 6, max: 60, default: 30, integer: true },
  motionScale: { min: 0.05, max: 1, default: 0.2 },
  wobbleScale: { min: 0, max: 1, default: 0.25 },
  maxDisparity: { min: 0.01, max: 0.2, default: 0.08 },
  maxZoom: { min: 0, max: 0.4, default: 0.15 },
  numRepeats: { min: 1, max: 4, default: 1, integer: true },
};

export const MOTION_KINDS: readonly MotionKind[] = ["swipe", "shake", "rotate", "rotate_push"];

const KIND_ALIASES: Readonly<Record<string, MotionKind>> = {
  rotate_forward: "rotate_push",
  rotatepush: "rotate_push",
};

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function clampSlider(value: number | undefined, range: SliderRange): number {
  if (value === undefined) return range.default;
  const clamped = Math.max(range.min, Math.min(range.max, value));
  return range.integer ? Math.round(clamped) : clamped;
}

function slider(range: SliderRange) {
  return z.preprocess(toNumber, z.number().optional()).transform((value) => clampSlider(value, range));
}

const MotionRequestSchema = z.object({
  kind: z.string().optional(),
  durationS: slider(SLIDER_RANGES.durationS),
  fps: slider(SLIDER_RANGES.fps),
  motionScale: slider(SLIDER_RANGES.motionScale),
  wobbleScale: slider(SLIDER_RANGES.wobbleScale),
  maxDisparity: slider(SLIDER_RANGES.maxDisparity),
  maxZoom: slider(SLIDER_RANGES.maxZoom),
  numRepeats: slider(SLIDER_RANGES.numRepeats),
});

function isMotionKind(value: string): value is MotionKind {
  return MOTION_KINDS.some((kind) => kind === value);
}

export function parseMotionKind(raw: string | undefined): MotionKind {
  if (raw === undefined || raw.trim() === "") return "swipe";
  const normalized = raw.trim().toLowerCase().replace(/[\s+-]+/g, "_");
  const kind = KIND_ALIASES[normalized] ?? normalized;
  if (!isMotionKind(kind)) {
    throw new InvalidInputError(`Unknown motion kind "${raw}"`, { motionKind: raw });
  }
  return kind;
}

/**
 * Validate a motion request, clamping every slider into its declared range
 */
export function parseMotion(request: MotionRequest = {}): MotionParams {
  const result = MotionRequestSchema.safeParse(request);
  if (!result.success) {
    throw new InvalidInputError(`Invalid motion parameters: ${result.error.message}`);
  }

  const { kind, ...sliders } = result.data;
  return Object.freeze({
    kind: parseMotionKind(kind),
    sliders: Object.freeze(sliders),
  });
}

/**
 * Number of frames rendered for the clip
 */
export function frameCount(sliders: Pick<MotionSliders, "durationS" | "fps">): number {
  return Math.max(2, Math.round(sliders.durationS * sliders.fps));
}
