/**
 * Runtime - Composition root shared by every route handler of the process
 */

import { appConfig } from "@/config/app.config";
import type { Logger } from "@/lib/logger";
import { LocalArtifactStore } from "@/services/artifact-store.service";
import { DeviceProbe } from "@/services/device-probe.service";
import { JobQueue } from "@/services/job-queue.service";
import { JobStatusService } from "@/services/job-status.service";
import { FileMetricsStore, type MetricsRecorder } from "@/services/metrics.service";
import type { BackendRegistry } from "@/services/pipeline/backend-selector";
import { DepthParallaxBackend } from "@/services/pipeline/depth-parallax.backend";
import { GaussianTrajectoryBackend } from "@/services/pipeline/gaussian-trajectory.backend";
import { SandboxAccelerator } from "@/services/sandbox-accelerator.service";
import { createSupabaseMirror } from "@/services/storage.service";
import type { Accelerator, ArtifactMirror, ArtifactStore } from "@/types";

export interface JobRuntime {
  queue: JobQueue;
  probe: DeviceProbe;
  artifacts: ArtifactStore;
  metrics: MetricsRecorder;
  statuses: JobStatusService;
  stop(): Promise<void>;
}

export interface RuntimeOptions {
  accelerator?: Accelerator;
  artifacts?: ArtifactStore;
  metrics?: MetricsRecorder;
  mirror?: ArtifactMirror | null;
  logger?: Logger;
  sweepIntervalMs?: number;
}

/**
 * Wire the queue, its backends and stores, start the worker and the
 * periodic artifact sweep
 */
export function createRuntime(options: RuntimeOptions = {}): JobRuntime {
  const logger = options.logger ?? console;
  const accelerator = options.accelerator ?? new SandboxAccelerator();
  const artifacts = options.artifacts ?? new LocalArtifactStore({ logger });
  const metrics = options.metrics ?? new FileMetricsStore(appConfig.storage.metricsFile, logger);
  const mirror = options.mirror === undefined ? createSupabaseMirror(logger) : options.mirror;

  const probe = new DeviceProbe(accelerator, logger);
  const backends: BackendRegistry = {
    gaussian_trajectory: new GaussianTrajectoryBackend(accelerator, undefined, logger),
    depth_parallax: new DepthParallaxBackend(accelerator, undefined, logger),
  };

  const queue = new JobQueue({ probe, backends, artifacts, mirror, metrics, logger });
  queue.start();

  const sweep = setInterval(() => {
    queue
      .prune()
      .then(() => artifacts.sweep())
      .catch((error: unknown) => {
        logger.error("[runtime] Sweep failed:", error);
      });
  }, options.sweepIntervalMs ?? appConfig.storage.sweepIntervalMs);
  sweep.unref();

  return {
    queue,
    probe,
    artifacts,
    metrics,
    statuses: new JobStatusService(queue),
    async stop() {
      clearInterval(sweep);
      await queue.shutdown();
    },
  };
}

/**
 * The part of `process` the shutdown hooks listen on
 */
export interface SignalSource {
  once(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ShutdownHookOptions {
  source?: SignalSource;
  signals?: readonly NodeJS.Signals[];
  logger?: Logger;
  /** Runs once the runtime has stopped; re-raises the signal by default */
  afterStop?: (signal: NodeJS.Signals) => void;
}

/**
 * Drain the queue when the process is told to stop: the running job ends
 * cancelled and the accelerator session is released. Returns a function that
 * removes the hooks.
 */
export function installShutdownHooks(runtime: Pick<JobRuntime, "stop">, options: ShutdownHookOptions = {}): () => void {
  const source = options.source ?? process;
  const signals = options.signals ?? ["SIGTERM", "SIGINT"];
  const logger = options.logger ?? console;
  const afterStop = options.afterStop ?? ((signal: NodeJS.Signals) => process.kill(process.pid, signal));

  const uninstall = () => {
    for (const signal of signals) source.off(signal, onSignal);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    uninstall();
    logger.info(`[runtime] ${signal} received, stopping the job queue`);
    void runtime
      .stop()
      .catch((error: unknown) => {
        logger.error("[runtime] Shutdown failed:", error);
      })
      .finally(() => afterStop(signal));
  };

  for (const signal of signals) source.once(signal, onSignal);
  return uninstall;
}

declare global {
  // Route bundles are evaluated separately; the runtime must be shared
  // eslint-disable-next-line no-var
  var motionRuntime: JobRuntime | undefined;
}

/**
 * Process-wide runtime, created on first use and stopped on SIGTERM or SIGINT
 */
export function getRuntime(): JobRuntime {
  if (!globalThis.motionRuntime) {
    const runtime = createRuntime();
    installShutdownHooks(runtime);
    globalThis.motionRuntime = runtime;
  }
  return globalThis.motionRuntime;
}
