/**
 * Backend selection - Pure function of device capability and job flags
 */

import { DeviceUnavailableError } from "@/lib/errors/job-errors";
import { producesScene } from "@/lib/output-mode";
import type { BackendKind, DeviceCapability, OutputMode } from "@/types";
import type { PipelineBackend } from "./pipeline-backend";

export interface SelectionOptions {
  forceFallback?: boolean;
  allowFallback?: boolean;
  output?: OutputMode;
}

export function selectBackend(capability: DeviceCapability, options: SelectionOptions = {}): BackendKind {
  const { forceFallback = false, allowFallback = true, output = "video" } = options;

  if (capability === "gsplat_cuda" && !forceFallback) {
    return "gaussian_trajectory";
  }
  // Only the Gaussian backend predicts a scene
  if (producesScene(output)) {
    throw DeviceUnavailableError.sceneExportUnavailable(capability);
  }
  if (!allowFallback) {
    throw DeviceUnavailableError.fallbackDisabled(capability);
  }
  return "depth_parallax";
}

export type BackendRegistry = Readonly<Record<BackendKind, PipelineBackend>>;
