/**
 * Job record - Mutable job state owned by the queue, with its state machine
 * and progress sink
 */

import type { StageDefinition } from "@/config/pipeline.config";
import { clampFraction } from "@/lib/utils/progress-calculator.util";
import type {
  BackendKind,
  ErrorInfo,
  JobInput,
  JobInputInfo,
  JobOutputs,
  JobState,
  MirroredArtifact,
  MotionParams,
  OutputMode,
  Preset,
  StageName,
  StageProgress,
  TerminalJobState,
} from "@/types";
import type { PipelineJob, ProgressSink } from "./pipeline/pipeline-backend";

const TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  queued: ["running", "failed", "cancelled"],
  running: ["done", "failed", "cancelled"],
  done: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(state: JobState): state is TerminalJobState {
  return TRANSITIONS[state].length === 0;
}

export interface JobRecordInit {
  id: string;
  input: JobInput;
  preset: Preset;
  motion: MotionParams;
  output: OutputMode;
  forceFallback: boolean;
  sessionId?: string;
  createdAt: number;
}

function megabytes(size: number): string {
  return (size / 1_000_000).toFixed(1);
}

export class JobRecord implements ProgressSink {
  readonly id: string;
  readonly input: JobInputInfo;
  readonly preset: Preset;
  readonly motion: MotionParams;
  readonly output: OutputMode;
  readonly forceFallback: boolean;
  readonly sessionId?: string;
  readonly createdAt: number;

  state: JobState = "queued";
  stage?: StageName;
  progress = 0;
  stages: StageProgress[] = [];
  backendKind?: BackendKind;
  device?: string;
  detail?: string = "Queued.";
  error?: ErrorInfo;
  outputs: JobOutputs = {};
  mirrored?: MirroredArtifact;
  startedAt?: number;
  finishedAt?: number;
  /** Bumped on every change; subscribers compare it to detect updates */
  version = 0;

  private controller: AbortController | null = null;
  /** Upload bytes; dropped once the job is terminal */
  private bytes: Buffer | null;

  constructor(
    init: JobRecordInit,
    private readonly onChange: (record: JobRecord) => void,
    private readonly now: () => number
  ) {
    const { bytes, ...info } = init.input;
    this.id = init.id;
    this.input = info;
    this.bytes = bytes;
    this.preset = init.preset;
    this.motion = init.motion;
    this.output = init.output;
    this.forceFallback = init.forceFallback;
    this.sessionId = init.sessionId;
    this.createdAt = init.createdAt;
  }

  get terminal(): boolean {
    return isTerminal(this.state);
  }

  pipelineJob(): PipelineJob {
    if (!this.bytes) {
      throw new Error(`Job ${this.id} no longer holds its input image`);
    }
    return {
      id: this.id,
      input: { ...this.input, bytes: this.bytes },
      preset: this.preset,
      motion: this.motion,
      output: this.output,
    };
  }

  /**
   * Mirror URL, unless its signature has expired
   */
  videoUrlAt(now: number): string | undefined {
    const { mirrored } = this;
    if (!mirrored || (mirrored.expiresAt !== undefined && now >= mirrored.expiresAt)) return undefined;
    return mirrored.url;
  }

  private transition(next: JobState): boolean {
    if (!TRANSITIONS[this.state].includes(next)) {
      return false;
    }
    this.state = next;
    if (isTerminal(next)) {
      this.bytes = null;
    }
    return true;
  }

  private changed(): void {
    this.version += 1;
    this.onChange(this);
  }

  /**
   * queued -> running; the backend choice is fixed from here on
   */
  start(backendKind: BackendKind, definitions: readonly StageDefinition[], device: string): AbortSignal {
    if (!this.transition("running")) {
      throw new Error(`Job ${this.id} cannot start from state ${this.state}`);
    }
    this.controller = new AbortController();
    this.backendKind = backendKind;
    this.device = device;
    this.stages = definitions.map((definition) => ({ name: definition.name, status: "pending" }));
    this.startedAt = this.now();
    this.detail = "Starting render…";
    this.changed();
    return this.controller.signal;
  }

  stageStarted(stage: StageName, progress: number): void {
    if (this.state !== "running") return;
    const index = this.stages.findIndex((entry) => entry.name === stage);
    if (index < 0 || index < this.currentStageIndex()) return;

    this.stage = stage;
    this.progress = Math.max(this.progress, clampFraction(progress));
    this.stages[index] = { ...this.stages[index], status: "running", startedAt: this.now() };
    this.changed();
  }

  stageCompleted(stage: StageName, progress: number): void {
    if (this.state !== "running") return;
    const index = this.stages.findIndex((entry) => entry.name === stage);
    if (index < 0 || index < this.currentStageIndex()) return;

    this.stage = stage;
    this.progress = Math.max(this.progress, clampFraction(progress));
    this.stages[index] = { ...this.stages[index], status: "done", finishedAt: this.now() };
    this.changed();
  }

  private currentStageIndex(): number {
    return this.stage ? this.stages.findIndex((entry) => entry.name === this.stage) : -1;
  }

  /**
   * Ask a running job to stop at the next stage boundary
   */
  requestCancel(detail = "Cancelling…"): void {
    if (this.state !== "running" || !this.controller || this.controller.signal.aborted) return;
    this.controller.abort();
    this.detail = detail;
    this.changed();
  }

  finish(outputs: JobOutputs): void {
    if (!this.transition("done")) return;
    this.outputs = outputs;
    this.progress = 1;
    this.finishedAt = this.now();
    const sizes: string[] = [];
    if (outputs.video) sizes.push(`MP4 ${megabytes(outputs.video.size)} MB`);
    if (outputs.scene) sizes.push(`PLY ${megabytes(outputs.scene.size)} MB`);
    this.detail = `Done. ${sizes.join(" + ")}`;
    this.changed();
  }

  fail(error: ErrorInfo): void {
    if (!this.transition("failed")) return;
    this.error = error;
    this.finishedAt = this.now();
    this.detail = "Render failed.";
    this.stages = this.stages.map((entry) => {
      if (entry.status === "running") return { ...entry, status: "error", finishedAt: this.finishedAt };
      if (entry.status === "pending") return { ...entry, status: "skipped" };
      return entry;
    });
    this.changed();
  }

  cancel(detail = "Cancelled."): void {
    if (!this.transition("cancelled")) return;
    this.finishedAt = this.now();
    this.detail = detail;
    this.stages = this.stages.map((entry) => (entry.status === "pending" ? { ...entry, status: "skipped" } : entry));
    this.changed();
  }

  setMirrored(mirrored: MirroredArtifact): void {
    this.mirrored = mirrored;
    this.changed();
  }
}
