/**
 * Depth-parallax backend - Monodepth estimate plus a 2D parallax warp; runs
 * on any device
 */

import { stageDefinitions, type StageDefinition } from "@/config/pipeline.config";
import type { Logger } from "@/lib/logger";
import { frameCount } from "@/lib/motion";
import { producesScene } from "@/lib/output-mode";
import type { Accelerator, DeviceCapability, OutputMode, StageName } from "@/types";
import {
  cappedSide,
  requireRef,
  runStageSequence,
  type PipelineBackend,
  type PipelineJob,
  type PipelineOutcome,
  type ProgressSink,
  type StageStep,
} from "./pipeline-backend";

export class DepthParallaxBackend implements PipelineBackend {
  readonly kind = "depth_parallax" as const;

  constructor(
    private readonly accelerator: Accelerator,
    private readonly timeouts?: Readonly<Record<StageName, number>>,
    private readonly logger?: Logger
  ) {}

  stagesFor(_output: OutputMode): readonly StageDefinition[] {
    return stageDefinitions(this.kind);
  }

  /**
   * Runs anywhere, but has no scene to export
   */
  eligible(_capability: DeviceCapability, output: OutputMode): boolean {
    return !producesScene(output);
  }

  run(job: PipelineJob, sink: ProgressSink, signal: AbortSignal): Promise<PipelineOutcome> {
    const maxSide = job.preset.maxFallbackInputSide;

    const steps: StageStep[] = [
      {
        name: "downscale_input",
        run: async (session, state) => ({ ...state, image: await session.resizeImage(state.image, maxSide) }),
      },
      {
        name: "estimate_depth",
        run: async (session, state) => ({ ...state, depth: await session.estimateDepth(state.image) }),
      },
      {
        name: "parallax_warp",
        run: async (session, state) => {
          // Width/height reported by the resize stage win over the upload's header
          const width = state.image.width ?? job.input.width;
          const height = state.image.height ?? job.input.height;
          const frames = await session.parallaxWarp(state.image, requireRef(state.depth, "parallax_warp", "depth map"), {
            motion: job.motion,
            renderSide: cappedSide(width, height, maxSide),
            frameCount: frameCount(job.motion.sliders),
          });
          return { ...state, frames };
        },
      },
      {
        name: "encode_video",
        run: async (session, state) => ({
          ...state,
          video: await session.encodeVideo(requireRef(state.frames, "encode_video", "frames"), {
            fps: job.motion.sliders.fps,
          }),
        }),
      },
    ];

    return runStageSequence(job, this.stagesFor(job.output), steps, sink, signal, {
      accelerator: this.accelerator,
      timeouts: this.timeouts,
      logger: this.logger,
    });
  }
}
