/**
 * Pipeline configuration - Stage order, weights, deadlines, sandbox paths
 */

import { getEnvAsNumber } from "./app.config";
import type { BackendKind, OutputMode, StageName } from "@/types";

/**
 * A stage table: one per backend, plus the Gaussian variants that export the scene
 */
export type StagePlan = BackendKind | "gaussian_trajectory_ply" | "gaussian_scene_only";

export interface StageDefinition {
  name: StageName;
  label: string;
  weight: number;
}

function stageTimeout(stage: StageName, defaultMs: number): number {
  return getEnvAsNumber(`STAGE_TIMEOUT_${stage.toUpperCase()}_MS`, defaultMs);
}

/**
 * Pipeline configuration
 */
export const pipelineConfig = {
  // Stage order per plan; weights of a plan sum to 1
  stages: {
    gaussian_trajectory: [
      { name: "predict_gaussians", label: "Model", weight: 0.35 },
      { name: "render_trajectory", label: "Render", weight: 0.45 },
      { name: "encode_video", label: "Encode", weight: 0.2 },
    ],
    gaussian_trajectory_ply: [
      { name: "predict_gaussians", label: "Model", weight: 0.3 },
      { name: "export_ply", label: "PLY", weight: 0.05 },
      { name: "render_trajectory", label: "Render", weight: 0.45 },
      { name: "encode_video", label: "Encode", weight: 0.2 },
    ],
    gaussian_scene_only: [
      { name: "predict_gaussians", label: "Model", weight: 0.9 },
      { name: "export_ply", label: "PLY", weight: 0.1 },
    ],
    depth_parallax: [
      { name: "downscale_input", label: "Load", weight: 0.05 },
      { name: "estimate_depth", label: "Depth", weight: 0.35 },
      { name: "parallax_warp", label: "Warp", weight: 0.4 },
      { name: "encode_video", label: "Encode", weight: 0.2 },
    ],
  } satisfies Record<StagePlan, readonly StageDefinition[]>,

  // Soft deadlines in milliseconds
  timeouts: {
    downscale_input: stageTimeout("downscale_input", 60_000),
    predict_gaussians: stageTimeout("predict_gaussians", 600_000),
    export_ply: stageTimeout("export_ply", 120_000),
    estimate_depth: stageTimeout("estimate_depth", 300_000),
    render_trajectory: stageTimeout("render_trajectory", 900_000),
    parallax_warp: stageTimeout("parallax_warp", 600_000),
    encode_video: stageTimeout("encode_video", 300_000),
  } satisfies Record<StageName, number>,

  probeTimeoutMs: getEnvAsNumber("DEVICE_PROBE_TIMEOUT_MS", 120_000),

  // Stage CLI provided by the sandbox template
  command: {
    cli: "motion-stage",
    probe: "probe",
  },

  // Sandbox paths
  sandbox: {
    workDirectory: "/tmp/motion",
    inputBasename: "input",
    outputVideoPath: "/tmp/motion/output.mp4",
  },
} as const;

export function stagePlan(backend: BackendKind, output: OutputMode): StagePlan {
  if (backend === "depth_parallax" || output === "video") return backend;
  return output === "both" ? "gaussian_trajectory_ply" : "gaussian_scene_only";
}

export function stageDefinitions(backend: BackendKind, output: OutputMode = "video"): readonly StageDefinition[] {
  return pipelineConfig.stages[stagePlan(backend, output)];
}
