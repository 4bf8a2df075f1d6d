/**
 * Progress calculation utilities - Stage weights, ETA and durations
 */

import type { StageDefinition } from "@/config/pipeline.config";
import type { StageName } from "@/types";

/**
 * Clamp a fraction to [0, 1], mapping NaN to 0
 */
export function clampFraction(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/**
 * Cumulative progress before a stage starts
 */
export function progressBefore(stages: readonly StageDefinition[], stage: StageName): number {
  let total = 0;
  for (const definition of stages) {
    if (definition.name === stage) break;
    total += definition.weight;
  }
  return roundFraction(total);
}

/**
 * Cumulative progress once a stage completes
 */
export function progressAfter(stages: readonly StageDefinition[], stage: StageName): number {
  let total = 0;
  for (const definition of stages) {
    total += definition.weight;
    if (definition.name === stage) break;
  }
  return roundFraction(total);
}

function roundFraction(value: number): number {
  return clampFraction(Math.round(value * 10_000) / 10_000);
}

/**
 * Extrapolate the remaining seconds of a running job from elapsed time and progress
 */
export function calculateETA(startedAt: number | undefined, now: number, progress: number): number | undefined {
  if (!startedAt || progress <= 0) {
    return undefined;
  }

  const elapsedSeconds = Math.max(0, (now - startedAt) / 1000);
  if (progress >= 1) {
    return 0;
  }

  return Math.round((elapsedSeconds / progress) * (1 - progress));
}

/**
 * Calculate duration in seconds from job timestamps
 */
export function calculateDuration(startedAt?: number, finishedAt?: number): number | null {
  if (!startedAt || !finishedAt) {
    return null;
  }
  return Math.max(0, (finishedAt - startedAt) / 1000);
}
