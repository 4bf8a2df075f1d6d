/**
 * Job types - Core types for motion job lifecycle
 */

import type { DeviceCapability } from "./accelerator.types";
import type { ImageFormat } from "./image.types";
import type { Preset } from "./preset.types";
import type { ArtifactStoreStats } from "./storage.types";

export type JobState = "queued" | "running" | "done" | "failed" | "cancelled";

export type TerminalJobState = Extract<JobState, "done" | "failed" | "cancelled">;

export type MotionKind = "swipe" | "shake" | "rotate" | "rotate_push";

export type BackendKind = "gaussian_trajectory" | "depth_parallax";

/**
 * What a job produces: the motion video, the Gaussian scene as a PLY file, or both
 */
export type OutputMode = "video" | "both" | "ply";

export type GaussianStage = "predict_gaussians" | "export_ply" | "render_trajectory" | "encode_video";

export type DepthParallaxStage = "downscale_input" | "estimate_depth" | "parallax_warp" | "encode_video";

export type StageName = GaussianStage | DepthParallaxStage;

export type StageStatus = "pending" | "running" | "done" | "error" | "skipped";

export type ErrorKind =
  | "invalid_input"
  | "invalid_preset"
  | "not_found"
  | "pipeline_stage_failed"
  | "stage_timeout"
  | "device_unavailable";

export interface MotionSliders {
  durationS: number;
  fps: number;
  motionScale: number;
  wobbleScale: number;
  maxDisparity: number;
  maxZoom: number;
  numRepeats: number;
}

export interface MotionParams {
  kind: MotionKind;
  sliders: Readonly<MotionSliders>;
}

export interface JobInput {
  bytes: Buffer;
  format: ImageFormat;
  name: string;
  width?: number;
  height?: number;
}

/**
 * What a job keeps about its upload once the bytes are gone
 */
export type JobInputInfo = Omit<JobInput, "bytes">;

export interface ErrorInfo {
  kind: ErrorKind;
  message: string;
  stage?: StageName;
}

export interface StageProgress {
  name: StageName;
  status: StageStatus;
  startedAt?: number;
  finishedAt?: number;
}

export type ArtifactKind = "video" | "scene";

export interface ArtifactHandle {
  id: string;
  jobId: string;
  kind: ArtifactKind;
  size: number;
  contentType: string;
  createdAt: number;
}

export interface JobOutputs {
  video?: ArtifactHandle;
  scene?: ArtifactHandle;
}

export interface SubmitJobInput {
  image?: Buffer | Uint8Array | null;
  imageName?: string;
  preset: string;
  motion?: MotionRequest;
  forceFallback?: boolean;
  /** Output mode name as submitted; defaults to "video" */
  output?: string;
  /** Legacy flag: also export the scene when the mode is "video" */
  exportPly?: boolean;
  sessionId?: string;
}

/**
 * Loosely-typed motion request as it arrives from a form or JSON body
 */
export interface MotionRequest {
  kind?: string;
  durationS?: unknown;
  fps?: unknown;
  motionScale?: unknown;
  wobbleScale?: unknown;
  maxDisparity?: unknown;
  maxZoom?: unknown;
  numRepeats?: unknown;
}

export interface JobView {
  id: string;
  state: JobState;
  stage?: StageName;
  progress: number;
  etaSeconds?: number;
  queuePosition?: number;
  backendKind?: BackendKind;
  output: OutputMode;
  preset: Preset;
  motion: MotionParams;
  stages: readonly StageProgress[];
  error?: ErrorInfo;
  detail?: string;
  device?: string;
  imageName: string;
  createdAt: number;
  startedAt?: number;
  finishedAt?: number;
  videoReady: boolean;
  plyReady: boolean;
  videoUrl?: string;
}

export interface QueueEntry {
  jobId: string;
  state: Extract<JobState, "queued" | "running">;
  imageName: string;
  position: number;
}

export interface QueueOverview {
  sessionId?: string;
  currentJobId: string | null;
  queue: QueueEntry[];
  waitingTotal: number;
  activeSessions: number;
  capability?: DeviceCapability;
  artifacts: ArtifactStoreStats;
  stats: SystemStatus;
}

export interface SystemStatus {
  runningJobs: number;
  queuedJobs: number;
  completedToday: number;
  failedToday: number;
  avgDurationSeconds: number;
}
