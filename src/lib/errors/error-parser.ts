/**
 * Error parsing utilities - Extract JSON and classify stage CLI output
 */

import type { StageCliResult } from "@/types/sandbox.types";

export interface ParseResult<T> {
  data: T | null;
  error?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function matchesKeys(value: Record<string, unknown>, expectedKeys?: string[]): boolean {
  return !expectedKeys || expectedKeys.some((key) => key in value);
}

/**
 * Remove EXIT_CODE markers from output
 */
export function cleanExitCodeMarkers(output: string): string {
  return output.replace(/EXIT_CODE:\d+/g, "").trim();
}

/**
 * Extract a JSON object from noisy output
 */
export function extractJson(output: string, expectedKeys?: string[]): ParseResult<Record<string, unknown>> {
  const cleaned = cleanExitCodeMarkers(output);

  // Try line-by-line first (faster for well-formatted output)
  for (const line of cleaned.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
      try {
        const parsed: unknown = JSON.parse(trimmed);
        if (isRecord(parsed) && matchesKeys(parsed, expectedKeys)) {
          return { data: parsed };
        }
      } catch {
        // Not valid JSON, continue
      }
    }
  }

  // Try to find JSON by balanced braces
  let braceCount = 0;
  let startIdx = -1;
  for (let i = 0; i < cleaned.length; i++) {
    if (cleaned[i] === "{") {
      if (braceCount === 0) startIdx = i;
      braceCount++;
    } else if (cleaned[i] === "}" && braceCount > 0) {
      braceCount--;
      if (braceCount === 0 && startIdx !== -1) {
        const candidate = cleaned.substring(startIdx, i + 1);
        try {
          const parsed: unknown = JSON.parse(candidate);
          if (isRecord(parsed) && matchesKeys(parsed, expectedKeys)) {
            return { data: parsed };
          }
        } catch {
          // Not valid JSON, continue searching
        }
        startIdx = -1;
      }
    }
  }

  return { data: null, error: "No valid JSON found in output" };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

/**
 * Parse the JSON line printed by the stage CLI
 */
export function parseStageResult(output: string): ParseResult<StageCliResult> {
  const result = extractJson(output, ["ok", "error"]);
  if (!result.data) {
    return { data: null, error: result.error };
  }

  const raw = result.data;
  return {
    data: {
      ok: optionalBoolean(raw.ok),
      output: optionalString(raw.output),
      width: optionalNumber(raw.width),
      height: optionalNumber(raw.height),
      frame_count: optionalNumber(raw.frame_count),
      device: optionalString(raw.device),
      cuda: optionalBoolean(raw.cuda),
      gsplat: optionalBoolean(raw.gsplat),
      error: optionalString(raw.error),
      error_type: optionalString(raw.error_type),
    },
  };
}

/**
 * Check if output indicates segmentation fault
 */
export function hasSegmentationFault(output: string, exitCode?: number): boolean {
  if (exitCode === 139) return true; // 128 + SIGSEGV

  const lower = output.toLowerCase();
  return lower.includes("segmentation fault") || lower.includes("segfault") || lower.includes("sigsegv");
}

/**
 * Check if output indicates timeout
 */
export function hasTimeout(output: string, exitCode?: number): boolean {
  if (exitCode === 124 || exitCode === 143) return true; // 124 = timeout, 143 = SIGTERM

  return (
    /\d+:\s*\[unknown\]\s*terminated/i.test(output) ||
    /timeout:\s*command\s+terminated/i.test(output)
  );
}

/**
 * Extract exit code from output (handles EXIT_CODE marker)
 */
export function extractExitCode(output: string, defaultExitCode?: number): number | undefined {
  const match = output.match(/EXIT_CODE:(\d+)/);
  if (match) {
    return Number.parseInt(match[1], 10);
  }
  return defaultExitCode;
}
