/**
 * Gaussian trajectory backend - 3D Gaussian prediction rendered along a
 * camera trajectory with gsplat (CUDA only); can also hand back the
 * predicted scene as a PLY file
 */

import { stageDefinitions, type StageDefinition } from "@/config/pipeline.config";
import type { Logger } from "@/lib/logger";
import { frameCount } from "@/lib/motion";
import { producesScene, producesVideo } from "@/lib/output-mode";
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

export class GaussianTrajectoryBackend implements PipelineBackend {
  readonly kind = "gaussian_trajectory" as const;

  constructor(
    private readonly accelerator: Accelerator,
    private readonly timeouts?: Readonly<Record<StageName, number>>,
    private readonly logger?: Logger
  ) {}

  stagesFor(output: OutputMode): readonly StageDefinition[] {
    return stageDefinitions(this.kind, output);
  }

  eligible(capability: DeviceCapability, _output: OutputMode): boolean {
    return capability === "gsplat_cuda";
  }

  run(job: PipelineJob, sink: ProgressSink, signal: AbortSignal): Promise<PipelineOutcome> {
    // Full input resolution, capped by the preset
    const trajectory = {
      motion: job.motion,
      renderSide: cappedSide(job.input.width, job.input.height, job.preset.maxOutputSide),
      frameCount: frameCount(job.motion.sliders),
    };

    const steps: StageStep[] = [
      {
        name: "predict_gaussians",
        run: async (session, state) => ({ ...state, scene: await session.predictGaussians(state.image) }),
      },
    ];

    if (producesScene(job.output)) {
      steps.push({
        name: "export_ply",
        run: async (session, state) => ({
          ...state,
          sceneFile: await session.exportScene(requireRef(state.scene, "export_ply", "scene")),
        }),
      });
    }

    if (producesVideo(job.output)) {
      steps.push(
        {
          name: "render_trajectory",
          run: async (session, state) => ({
            ...state,
            frames: await session.renderTrajectory(requireRef(state.scene, "render_trajectory", "scene"), trajectory),
          }),
        },
        {
          name: "encode_video",
          run: async (session, state) => ({
            ...state,
            video: await session.encodeVideo(requireRef(state.frames, "encode_video", "frames"), {
              fps: job.motion.sliders.fps,
            }),
          }),
        }
      );
    }

    return runStageSequence(job, this.stagesFor(job.output), steps, sink, signal, {
      accelerator: this.accelerator,
      timeouts: this.timeouts,
      logger: this.logger,
    });
  }
}
