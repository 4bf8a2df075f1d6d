/**
 * Pipeline backend contract and the shared staged runner
 */

import { pipelineConfig, type StageDefinition } from "@/config/pipeline.config";
import { JobError, PipelineStageError, SandboxTimeoutError, StageTimeoutError } from "@/lib/errors/job-errors";
import type { Logger } from "@/lib/logger";
import { producesScene, producesVideo } from "@/lib/output-mode";
import { progressAfter, progressBefore } from "@/lib/utils/progress-calculator.util";
import { withTimeout } from "@/lib/utils/timeout.util";
import type {
  Accelerator,
  AcceleratorSession,
  BackendKind,
  DeviceCapability,
  JobInput,
  MotionParams,
  OutputMode,
  Preset,
  StageName,
  StageRef,
} from "@/types";

export interface PipelineJob {
  id: string;
  input: JobInput;
  preset: Preset;
  motion: MotionParams;
  output: OutputMode;
}

/**
 * Receives (stage, progress) reports from the worker; written by the worker only
 */
export interface ProgressSink {
  stageStarted(stage: StageName, progress: number): void;
  stageCompleted(stage: StageName, progress: number): void;
}

/**
 * A completed run carries exactly the files the job's output mode asks for
 */
export interface CompletedOutcome {
  status: "completed";
  video?: Buffer;
  scene?: Buffer;
}

export type PipelineOutcome = CompletedOutcome | { status: "cancelled"; afterStage?: StageName };

export interface PipelineBackend {
  readonly kind: BackendKind;
  stagesFor(output: OutputMode): readonly StageDefinition[];
  eligible(capability: DeviceCapability, output: OutputMode): boolean;
  run(job: PipelineJob, sink: ProgressSink, signal: AbortSignal): Promise<PipelineOutcome>;
}

export interface PipelineState {
  image: StageRef;
  scene?: StageRef;
  /** PLY bytes of the scene, once exported */
  sceneFile?: Buffer;
  depth?: StageRef;
  frames?: StageRef;
  video?: Buffer;
}

export interface StageStep {
  name: StageName;
  run(session: AcceleratorSession, state: PipelineState): Promise<PipelineState>;
}

export interface StageRunnerOptions {
  accelerator: Accelerator;
  timeouts?: Readonly<Record<StageName, number>>;
  logger?: Logger;
}

function toStageError(stage: StageName, error: unknown): JobError {
  if (error instanceof JobError) return error;
  if (error instanceof SandboxTimeoutError) return new StageTimeoutError(stage, error.timeoutMs);
  return PipelineStageError.fromError(stage, error);
}

/**
 * Run stages in order inside one accelerator session.
 *
 * Cancellation is checked between stages only. The session is released on
 * every exit path.
 */
export async function runStageSequence(
  job: PipelineJob,
  definitions: readonly StageDefinition[],
  steps: readonly StageStep[],
  sink: ProgressSink,
  signal: AbortSignal,
  options: StageRunnerOptions
): Promise<PipelineOutcome> {
  const timeouts = options.timeouts ?? pipelineConfig.timeouts;
  const logger = options.logger ?? console;

  if (signal.aborted) {
    return { status: "cancelled" };
  }

  let session: AcceleratorSession;
  try {
    session = await options.accelerator.acquire({ jobId: job.id, image: job.input.bytes, format: job.input.format });
  } catch (error) {
    throw PipelineStageError.fromError(steps[0].name, error, { phase: "acquire" });
  }

  let lastCompleted: StageName | undefined;
  try {
    let state: PipelineState = { image: session.input };

    for (const step of steps) {
      if (signal.aborted) {
        return { status: "cancelled", afterStage: lastCompleted };
      }

      sink.stageStarted(step.name, progressBefore(definitions, step.name));
      const startedAt = Date.now();
      const timeoutMs = timeouts[step.name];

      try {
        state = await withTimeout(step.run(session, state), timeoutMs, () => new StageTimeoutError(step.name, timeoutMs));
      } catch (error) {
        throw toStageError(step.name, error);
      }

      sink.stageCompleted(step.name, progressAfter(definitions, step.name));
      lastCompleted = step.name;
      logger.info(`[pipeline] job ${job.id} ${step.name} done in ${Date.now() - startedAt}ms`);
    }

    if (signal.aborted) {
      return { status: "cancelled", afterStage: lastCompleted };
    }

    return completedOutcome(job.output, state);
  } finally {
    await session.release().catch((error: unknown) => {
      logger.error(`[pipeline] job ${job.id} failed to release accelerator ${session.id}:`, error);
    });
  }
}

function completedOutcome(output: OutputMode, state: PipelineState): CompletedOutcome {
  const outcome: CompletedOutcome = { status: "completed" };
  if (producesVideo(output)) {
    if (!state.video || state.video.length === 0) {
      throw new PipelineStageError("encode_video", "encoder returned an empty video");
    }
    outcome.video = state.video;
  }
  if (producesScene(output)) {
    if (!state.sceneFile || state.sceneFile.length === 0) {
      throw new PipelineStageError("export_ply", "scene export returned no data");
    }
    outcome.scene = state.sceneFile;
  }
  return outcome;
}

/**
 * Longest side the renderer may produce for an input under a cap
 */
export function cappedSide(width: number | undefined, height: number | undefined, cap: number): number {
  if (!width || !height) return cap;
  return Math.min(Math.max(width, height), cap);
}

export function requireRef(ref: StageRef | undefined, stage: StageName, what: string): StageRef {
  if (!ref) {
    throw new PipelineStageError(stage, `missing ${what} from the previous stage`);
  }
  return ref;
}
