/**
 * Accelerator types - Contract of the inference, render and encode collaborators
 */

import type { ImageFormat } from "./image.types";
import type { MotionParams } from "./job.types";

export type DeviceCapability = "gsplat_cuda" | "cuda_no_gsplat" | "fallback_only";

export interface ProbeReport {
  cuda: boolean;
  gsplat: boolean;
  device: string;
}

/**
 * Opaque reference to an intermediate result held by the collaborator
 * (an uploaded image, a Gaussian scene, a depth map or a frame sequence)
 */
export interface StageRef {
  ref: string;
  width?: number;
  height?: number;
  frameCount?: number;
}

export interface TrajectorySpec {
  motion: MotionParams;
  renderSide: number;
  frameCount: number;
}

export interface EncodeOptions {
  fps: number;
}

export interface AcquireInput {
  jobId: string;
  image: Buffer;
  format: ImageFormat;
}

export interface AcceleratorSession {
  readonly id: string;
  /** Reference to the uploaded input image */
  readonly input: StageRef;
  predictGaussians(image: StageRef): Promise<StageRef>;
  /** Bytes of a predicted scene as a PLY file */
  exportScene(scene: StageRef): Promise<Buffer>;
  renderTrajectory(scene: StageRef, trajectory: TrajectorySpec): Promise<StageRef>;
  resizeImage(image: StageRef, maxSide: number): Promise<StageRef>;
  estimateDepth(image: StageRef): Promise<StageRef>;
  parallaxWarp(image: StageRef, depth: StageRef, trajectory: TrajectorySpec): Promise<StageRef>;
  encodeVideo(frames: StageRef, options: EncodeOptions): Promise<Buffer>;
  release(): Promise<void>;
}

export interface Accelerator {
  probe(): Promise<ProbeReport>;
  acquire(input: AcquireInput): Promise<AcceleratorSession>;
}
