/**
 * Sandbox accelerator - Runs the inference, render and encode collaborators
 * through the stage CLI of a GPU sandbox, one sandbox per job
 */

import { appConfig } from "@/config/app.config";
import { pipelineConfig } from "@/config/pipeline.config";
import { SandboxError, SandboxTimeoutError } from "@/lib/errors/job-errors";
import { extractExitCode, hasSegmentationFault, hasTimeout, parseStageResult } from "@/lib/errors/error-parser";
import { fileExtension } from "@/lib/utils/image-probe.util";
import { SandboxService } from "./sandbox.service";
import type {
  AcceleratorSession,
  Accelerator,
  AcquireInput,
  EncodeOptions,
  ProbeReport,
  StageName,
  StageRef,
  TrajectorySpec,
} from "@/types";
import type { SandboxInstance, StageCliResult } from "@/types/sandbox.types";

type StageCommand = "probe" | "resize" | "predict-gaussians" | "render-trajectory" | "estimate-depth" | "parallax-warp" | "encode-video";

// Shell-level cap for each command, aligned with the stage deadlines
const COMMAND_STAGE: Readonly<Record<Exclude<StageCommand, "probe">, StageName>> = {
  resize: "downscale_input",
  "predict-gaussians": "predict_gaussians",
  "render-trajectory": "render_trajectory",
  "estimate-depth": "estimate_depth",
  "parallax-warp": "parallax_warp",
  "encode-video": "encode_video",
};

interface StageInvocation {
  input?: string;
  output?: string;
  params?: Record<string, unknown>;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function commandTimeoutMs(command: StageCommand): number {
  return command === "probe" ? pipelineConfig.probeTimeoutMs : pipelineConfig.timeouts[COMMAND_STAGE[command]];
}

/**
 * Build a stage CLI command that reports its exit code through an EXIT_CODE marker
 */
export function buildStageCommand(command: StageCommand, invocation: StageInvocation, timeoutSeconds: number): string {
  const args: string[] = [pipelineConfig.command.cli, command];
  if (invocation.input) args.push("--input", shellQuote(invocation.input));
  if (invocation.output) args.push("--output", shellQuote(invocation.output));
  if (invocation.params) args.push("--params", shellQuote(JSON.stringify(invocation.params)));

  // Capture exit code before `true` masks it
  return `(timeout ${timeoutSeconds} ${args.join(" ")}; EXIT=$?; echo "EXIT_CODE:$EXIT" >&2; exit $EXIT) 2>&1; true`;
}

/**
 * Run one stage command and turn its output into a result or a typed failure
 */
export async function runStageCommand(
  sandboxService: SandboxService,
  sandbox: SandboxInstance,
  command: StageCommand,
  invocation: StageInvocation
): Promise<StageCliResult> {
  const timeoutMs = commandTimeoutMs(command);
  const shell = buildStageCommand(command, invocation, Math.max(1, Math.ceil(timeoutMs / 1000)));
  const result = await sandboxService.executeCommand(sandbox, shell, { timeoutMs: 0 });

  const allOutput = (result.stderr || "") + (result.stdout || "");
  const exitCode = extractExitCode(allOutput, result.exitCode);

  if (hasTimeout(allOutput, exitCode)) {
    throw new SandboxTimeoutError(timeoutMs, sandbox.sandboxId, { command });
  }
  if (hasSegmentationFault(allOutput, exitCode)) {
    throw SandboxError.fromSegmentationFault(sandbox.sandboxId, { command });
  }

  const parsed = parseStageResult(allOutput);
  if (!parsed.data) {
    throw new SandboxError(`No result from ${command}. Exit code: ${exitCode}`, sandbox.sandboxId, {
      command,
      output: allOutput.substring(0, 1000),
    });
  }
  if (parsed.data.error) {
    throw SandboxError.fromScriptError(sandbox.sandboxId, parsed.data.error, parsed.data.error_type);
  }
  if (exitCode !== undefined && exitCode !== 0) {
    throw new SandboxError(`${command} exited with code ${exitCode}`, sandbox.sandboxId, { command });
  }
  return parsed.data;
}

function toRef(result: StageCliResult, fallbackPath: string): StageRef {
  return {
    ref: result.output ?? fallbackPath,
    width: result.width,
    height: result.height,
    frameCount: result.frame_count,
  };
}

function workPath(name: string): string {
  return `${pipelineConfig.sandbox.workDirectory}/${name}`;
}

class SandboxAcceleratorSession implements AcceleratorSession {
  private released = false;

  constructor(
    private readonly sandboxService: SandboxService,
    private readonly sandbox: SandboxInstance,
    readonly input: StageRef
  ) {}

  get id(): string {
    return this.sandbox.sandboxId;
  }

  private async run(command: StageCommand, invocation: StageInvocation, output: string): Promise<StageRef> {
    const result = await runStageCommand(this.sandboxService, this.sandbox, command, { ...invocation, output });
    return toRef(result, output);
  }

  predictGaussians(image: StageRef): Promise<StageRef> {
    return this.run("predict-gaussians", { input: image.ref }, workPath("gaussians.ply"));
  }

  exportScene(scene: StageRef): Promise<Buffer> {
    return this.sandboxService.readFile(this.sandbox, scene.ref);
  }

  renderTrajectory(scene: StageRef, trajectory: TrajectorySpec): Promise<StageRef> {
    return this.run(
      "render-trajectory",
      { input: scene.ref, params: trajectoryParams(trajectory) },
      workPath("frames")
    );
  }

  resizeImage(image: StageRef, maxSide: number): Promise<StageRef> {
    return this.run("resize", { input: image.ref, params: { max_side: maxSide } }, workPath("input-resized.png"));
  }

  estimateDepth(image: StageRef): Promise<StageRef> {
    return this.run("estimate-depth", { input: image.ref }, workPath("depth.npy"));
  }

  parallaxWarp(image: StageRef, depth: StageRef, trajectory: TrajectorySpec): Promise<StageRef> {
    return this.run(
      "parallax-warp",
      { input: image.ref, params: { ...trajectoryParams(trajectory), depth: depth.ref } },
      workPath("frames")
    );
  }

  async encodeVideo(frames: StageRef, options: EncodeOptions): Promise<Buffer> {
    const output = pipelineConfig.sandbox.outputVideoPath;
    await runStageCommand(this.sandboxService, this.sandbox, "encode-video", {
      input: frames.ref,
      output,
      params: { fps: options.fps },
    });
    return this.sandboxService.readFile(this.sandbox, output);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await this.sandboxService.kill(this.sandbox);
  }
}

function trajectoryParams(trajectory: TrajectorySpec): Record<string, unknown> {
  const { sliders } = trajectory.motion;
  return {
    trajectory_type: trajectory.motion.kind,
    render_max_side: trajectory.renderSide,
    num_steps: trajectory.frameCount,
    motion_scale: sliders.motionScale,
    wobble_scale: sliders.wobbleScale,
    max_disparity: sliders.maxDisparity,
    max_zoom: sliders.maxZoom,
    num_repeats: sliders.numRepeats,
  };
}

/**
 * Accelerator backed by E2B GPU sandboxes
 */
export class SandboxAccelerator implements Accelerator {
  constructor(
    private readonly sandboxService: SandboxService = new SandboxService(),
    private readonly template: string = appConfig.e2b.template
  ) {}

  async probe(): Promise<ProbeReport> {
    const sandbox = await this.sandboxService.create({ template: this.template });
    try {
      const result = await runStageCommand(this.sandboxService, sandbox, "probe", {});
      return {
        cuda: result.cuda === true,
        gsplat: result.gsplat === true,
        device: result.device ?? "unknown",
      };
    } finally {
      await this.sandboxService.kill(sandbox);
    }
  }

  async acquire(input: AcquireInput): Promise<AcceleratorSession> {
    const sandbox = await this.sandboxService.create({ template: this.template });
    try {
      const inputPath = workPath(`${pipelineConfig.sandbox.inputBasename}.${fileExtension(input.format)}`);
      await this.sandboxService.executeCommand(sandbox, `mkdir -p ${pipelineConfig.sandbox.workDirectory}`, {
        timeoutMs: 30_000,
      });
      await this.sandboxService.uploadFile(sandbox, inputPath, input.image);
      return new SandboxAcceleratorSession(this.sandboxService, sandbox, { ref: inputPath });
    } catch (error) {
      await this.sandboxService.kill(sandbox);
      throw error;
    }
  }
}
