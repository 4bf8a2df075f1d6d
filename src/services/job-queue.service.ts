/**
 * Job queue - Accepts submissions and runs them one at a time on a single worker
 */

import { EventEmitter } from "events";
import { randomUUID } from "crypto";
import { appConfig } from "@/config/app.config";
import { DeviceUnavailableError, InvalidInputError, NotFoundError, toErrorInfo } from "@/lib/errors/job-errors";
import type { Logger } from "@/lib/logger";
import { calculateSystemStatus } from "@/lib/metrics";
import { parseMotion } from "@/lib/motion";
import { producesScene, resolveOutputMode } from "@/lib/output-mode";
import { resolvePreset } from "@/lib/presets";
import { fileExtension, probeImage } from "@/lib/utils/image-probe.util";
import { calculateDuration, calculateETA } from "@/lib/utils/progress-calculator.util";
import type {
  ArtifactHandle,
  ArtifactKind,
  ArtifactMirror,
  ArtifactStore,
  BackendKind,
  JobOutputs,
  JobView,
  QueueEntry,
  QueueOverview,
  SubmitJobInput,
} from "@/types";
import type { DeviceProbe } from "./device-probe.service";
import { JobRecord, isTerminal } from "./job-record";
import type { MetricsRecorder } from "./metrics.service";
import { selectBackend, type BackendRegistry } from "./pipeline/backend-selector";
import type { CompletedOutcome, PipelineBackend } from "./pipeline/pipeline-backend";

export interface JobQueueConfig {
  maxUploadBytes: number;
  allowFallback: boolean;
  jobRetentionMs: number;
}

export interface JobQueueOptions {
  probe: Pick<DeviceProbe, "snapshot" | "current">;
  backends: BackendRegistry;
  artifacts: ArtifactStore;
  mirror?: ArtifactMirror | null;
  metrics?: MetricsRecorder | null;
  config?: Partial<JobQueueConfig>;
  logger?: Logger;
  now?: () => number;
  generateId?: () => string;
}

export interface SubscribeOptions {
  signal?: AbortSignal;
}

const SHUTDOWN_DETAIL = "Cancelled: server shutting down.";

/**
 * Short job id: the first 12 hex digits of a random UUID
 */
export function generateJobId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 12);
}

export class JobQueue {
  private readonly config: JobQueueConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly generateId: () => string;

  private readonly jobs = new Map<string, JobRecord>();
  private readonly pending: string[] = [];
  private readonly changes = new EventEmitter();

  private current: JobRecord | null = null;
  private wake: (() => void) | null = null;
  private worker: Promise<void> | null = null;
  private accepting = true;
  private stopping = false;

  constructor(private readonly options: JobQueueOptions) {
    this.config = {
      maxUploadBytes: options.config?.maxUploadBytes ?? appConfig.queue.maxUploadBytes,
      allowFallback: options.config?.allowFallback ?? appConfig.queue.allowFallback,
      jobRetentionMs: options.config?.jobRetentionMs ?? appConfig.queue.jobRetentionMs,
    };
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? generateJobId;
    this.changes.setMaxListeners(0);
  }

  /**
   * Number of jobs waiting to run
   */
  get size(): number {
    return this.pending.length;
  }

  /**
   * Validate and enqueue a job; returns its id without waiting for any work
   */
  submit(input: SubmitJobInput): string {
    if (!this.accepting) {
      throw new InvalidInputError("queue is shutting down");
    }

    const image = input.image;
    if (!image || image.length === 0) {
      throw InvalidInputError.missingImage();
    }
    if (image.length > this.config.maxUploadBytes) {
      throw InvalidInputError.tooLarge(image.length, this.config.maxUploadBytes);
    }

    const info = probeImage(image);
    if (!info) {
      throw InvalidInputError.unsupportedFormat(input.imageName);
    }

    const preset = resolvePreset(input.preset);
    const motion = parseMotion(input.motion);
    const output = resolveOutputMode(input.output, input.exportPly);
    const forceFallback = input.forceFallback ?? false;
    if (forceFallback && producesScene(output)) {
      throw new InvalidInputError("PLY export needs the Gaussian backend and cannot be combined with the fallback", {
        output,
      });
    }

    const id = this.generateId();
    const record = new JobRecord(
      {
        id,
        input: {
          bytes: Buffer.from(image),
          format: info.format,
          name: input.imageName || `upload.${fileExtension(info.format)}`,
          width: info.width,
          height: info.height,
        },
        preset,
        motion,
        output,
        forceFallback,
        sessionId: input.sessionId,
        createdAt: this.now(),
      },
      (changed) => this.changes.emit(changed.id),
      this.now
    );

    this.jobs.set(id, record);
    this.pending.push(id);
    this.logger.info(
      `[queue] Job ${id} queued (${preset.name}, ${motion.kind}, ${output}) at position ${this.pending.length}`
    );
    this.wakeWorker();
    return id;
  }

  status(id: string): JobView {
    return this.viewOf(this.require(id));
  }

  /**
   * Cancel a job. Queued jobs are cancelled at once; running jobs stop at the
   * next stage boundary. Terminal jobs are returned unchanged.
   */
  cancel(id: string): JobView {
    const record = this.require(id);

    if (record.state === "queued") {
      this.removePending(id);
      record.cancel("Cancelled before start.");
      this.logger.info(`[queue] Job ${id} cancelled while queued`);
    } else if (record.state === "running") {
      record.requestCancel();
      this.logger.info(`[queue] Cancellation requested for running job ${id}`);
    }

    return this.viewOf(record);
  }

  /**
   * Stream snapshots of a job: the current one, then one per observed change,
   * ending after the terminal snapshot or when the signal aborts
   */
  async *subscribe(id: string, options: SubscribeOptions = {}): AsyncGenerator<JobView, void, undefined> {
    const record = this.require(id);
    const { signal } = options;
    let seenVersion = -1;

    while (!signal?.aborted) {
      if (record.version !== seenVersion) {
        seenVersion = record.version;
        const view = this.viewOf(record);
        yield view;
        if (isTerminal(view.state)) return;
        continue;
      }
      await this.nextChange(id, signal);
    }
  }

  overview(sessionId?: string): QueueOverview {
    const belongs = (record: JobRecord) => sessionId !== undefined && record.sessionId === sessionId;
    const queue: QueueEntry[] = [];
    const sessions = new Set<string>();

    // The dequeued job stays "queued" while the device is probed
    const current = this.current;
    if (current && (current.state === "running" || current.state === "queued")) {
      if (belongs(current)) {
        queue.push({ jobId: current.id, state: current.state, imageName: current.input.name, position: 0 });
      }
      if (current.sessionId) sessions.add(current.sessionId);
    }

    this.pending.forEach((pendingId, index) => {
      const record = this.jobs.get(pendingId);
      if (!record) return;
      if (record.sessionId) sessions.add(record.sessionId);
      if (belongs(record)) {
        queue.push({ jobId: record.id, state: "queued", imageName: record.input.name, position: index + 1 });
      }
    });

    return {
      sessionId,
      currentJobId: this.current?.id ?? null,
      queue,
      waitingTotal: this.pending.length,
      activeSessions: sessions.size,
      capability: this.options.probe.current()?.capability,
      artifacts: this.options.artifacts.stats(),
      stats: calculateSystemStatus([...this.jobs.values()], this.now()),
    };
  }

  /**
   * Start the single worker; calling it again is a no-op
   */
  start(): void {
    if (this.worker) return;
    this.accepting = true;
    this.stopping = false;
    this.worker = this.runWorker();
  }

  /**
   * Stop accepting work, cancel queued jobs, cancel the running job and wait
   * for the worker to finish
   */
  async shutdown(): Promise<void> {
    this.accepting = false;
    this.stopping = true;

    for (const id of this.pending.splice(0)) {
      this.jobs.get(id)?.cancel(SHUTDOWN_DETAIL);
    }
    if (this.current?.state === "queued") {
      // Dequeued but still waiting on the device probe
      this.current.cancel(SHUTDOWN_DETAIL);
    } else {
      this.current?.requestCancel("Server shutting down…");
    }
    this.wakeWorker();

    if (this.worker) {
      await this.worker;
      this.worker = null;
    }
  }

  /**
   * Forget terminal jobs older than the retention window and evict their
   * artifacts; returns how many jobs were dropped
   */
  async prune(now: number = this.now()): Promise<number> {
    const expired = [...this.jobs.values()].filter(
      (record) =>
        record.terminal && record.finishedAt !== undefined && now - record.finishedAt >= this.config.jobRetentionMs
    );

    for (const record of expired) {
      this.jobs.delete(record.id);
      this.changes.removeAllListeners(record.id);
      await this.evictOutputs(record.outputs);
    }
    if (expired.length > 0) {
      this.logger.info(`[queue] Pruned ${expired.length} finished job(s)`);
    }
    return expired.length;
  }

  /**
   * Video or scene of a finished job, if it is still stored
   */
  artifactOf(id: string, kind: ArtifactKind = "video"): ArtifactHandle | undefined {
    const record = this.require(id);
    const handle = record.outputs[kind];
    return record.state === "done" && this.isStored(handle) ? handle : undefined;
  }

  private isStored(handle: ArtifactHandle | undefined): handle is ArtifactHandle {
    return handle !== undefined && this.options.artifacts.has(handle);
  }

  private require(id: string): JobRecord {
    const record = this.jobs.get(id);
    if (!record) {
      throw new NotFoundError(id);
    }
    return record;
  }

  private viewOf(record: JobRecord): JobView {
    const position = record.state === "queued" ? this.pending.indexOf(record.id) + 1 : 0;
    const done = record.state === "done";
    const now = this.now();

    return Object.freeze({
      id: record.id,
      state: record.state,
      stage: record.stage,
      progress: record.progress,
      etaSeconds: record.state === "running" ? calculateETA(record.startedAt, now, record.progress) : undefined,
      queuePosition: position > 0 ? position : undefined,
      backendKind: record.backendKind,
      output: record.output,
      preset: record.preset,
      motion: record.motion,
      stages: Object.freeze(record.stages.map((entry) => Object.freeze({ ...entry }))),
      error: record.error ? Object.freeze({ ...record.error }) : undefined,
      detail: record.detail,
      device: record.device,
      imageName: record.input.name,
      createdAt: record.createdAt,
      startedAt: record.startedAt,
      finishedAt: record.finishedAt,
      videoReady: done && this.isStored(record.outputs.video),
      plyReady: done && this.isStored(record.outputs.scene),
      videoUrl: record.videoUrlAt(now),
    });
  }

  private nextChange(id: string, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        this.changes.off(id, done);
        signal?.removeEventListener("abort", done);
        resolve();
      };
      this.changes.on(id, done);
      signal?.addEventListener("abort", done, { once: true });
    });
  }

  private removePending(id: string): void {
    const index = this.pending.indexOf(id);
    if (index >= 0) {
      this.pending.splice(index, 1);
    }
  }

  private wakeWorker(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private takeNext(): JobRecord | undefined {
    while (this.pending.length > 0) {
      const id = this.pending.shift();
      const record = id === undefined ? undefined : this.jobs.get(id);
      if (record && record.state === "queued") {
        return record;
      }
    }
    return undefined;
  }

  private async runWorker(): Promise<void> {
    this.logger.info("[queue] Worker started");
    while (!this.stopping) {
      const record = this.takeNext();
      if (!record) {
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }
      await this.execute(record);
    }
    this.logger.info("[queue] Worker stopped");
  }

  /**
   * Run one job to a terminal state. Never throws: every failure is recorded
   * on the job and the worker moves on.
   */
  private async execute(record: JobRecord): Promise<void> {
    this.current = record;
    try {
      const device = await this.options.probe.snapshot();
      if (record.state !== "queued") {
        return;
      }

      let backend: PipelineBackend;
      try {
        const kind = selectBackend(device.capability, {
          forceFallback: record.forceFallback,
          allowFallback: this.config.allowFallback,
          output: record.output,
        });
        backend = this.options.backends[kind];
        if (!backend.eligible(device.capability, record.output)) {
          throw DeviceUnavailableError.notEligible(kind, device.capability);
        }
      } catch (error) {
        record.fail(toErrorInfo(error));
        this.logger.warn(`[queue] Job ${record.id} has no eligible backend on ${device.capability}`);
        return;
      }

      const signal = record.start(backend.kind, backend.stagesFor(record.output), device.device);
      this.logger.info(`[queue] Job ${record.id} started on ${backend.kind} (${device.capability}, ${device.device})`);

      const outcome = await backend.run(record.pipelineJob(), record, signal);
      if (outcome.status === "cancelled") {
        record.cancel(this.stopping ? SHUTDOWN_DETAIL : "Cancelled.");
        this.logger.info(`[queue] Job ${record.id} cancelled${outcome.afterStage ? ` after ${outcome.afterStage}` : ""}`);
        return;
      }

      const outputs = await this.storeOutputs(record.id, outcome);
      if (signal.aborted) {
        await this.evictOutputs(outputs);
        record.cancel(this.stopping ? SHUTDOWN_DETAIL : "Cancelled.");
        this.logger.info(`[queue] Job ${record.id} cancelled while storing its outputs`);
        return;
      }

      record.finish(outputs);
      this.logger.info(`[queue] Job ${record.id} done: ${record.detail}`);
      await this.afterDone(record, outputs, outcome, backend.kind);
    } catch (error) {
      const info = toErrorInfo(error, record.stage);
      record.fail(info);
      this.logger.error(`[queue] Job ${record.id} failed${info.stage ? ` in ${info.stage}` : ""}: ${info.message}`);
    } finally {
      this.current = null;
    }
  }

  /**
   * Write every produced file; a failed write removes the ones already stored
   */
  private async storeOutputs(jobId: string, outcome: CompletedOutcome): Promise<JobOutputs> {
    const outputs: JobOutputs = {};
    try {
      if (outcome.video) outputs.video = await this.options.artifacts.put(jobId, outcome.video, "video");
      if (outcome.scene) outputs.scene = await this.options.artifacts.put(jobId, outcome.scene, "scene");
    } catch (error) {
      await this.evictOutputs(outputs);
      throw error;
    }
    return outputs;
  }

  private async evictOutputs(outputs: JobOutputs): Promise<void> {
    for (const handle of [outputs.video, outputs.scene]) {
      if (handle) await this.options.artifacts.evict(handle);
    }
  }

  private async afterDone(record: JobRecord, outputs: JobOutputs, outcome: CompletedOutcome, backendKind: BackendKind) {
    const { metrics, mirror } = this.options;
    const { video: handle } = outputs;
    const { video } = outcome;
    // Scene-only jobs have no video to time or mirror
    if (!handle || !video) return;

    if (metrics) {
      try {
        await metrics.record({
          jobId: record.id,
          requestedAt: record.createdAt,
          finishedAt: record.finishedAt ?? this.now(),
          durationS: calculateDuration(record.startedAt, record.finishedAt) ?? 0,
          imageWidth: record.input.width,
          imageHeight: record.input.height,
          backendKind,
          preset: record.preset.name,
          device: record.device,
        });
      } catch (error) {
        this.logger.warn(`[queue] Failed to record metrics for job ${record.id}:`, error);
      }
    }

    if (mirror) {
      try {
        record.setMirrored(await mirror.publish(handle, video));
      } catch (error) {
        this.logger.warn(`[queue] Mirror upload for job ${record.id} failed:`, error);
      }
    }
  }
}
