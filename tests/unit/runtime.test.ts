import { EventEmitter } from "events";
import { afterEach, describe, expect, it } from "vitest";
import { silentLogger } from "@/lib/logger";
import { createRuntime, installShutdownHooks, type JobRuntime, type SignalSource } from "@/lib/runtime";
import type { MetricsRecorder } from "@/services/metrics.service";
import { Deferred, FakeAccelerator } from "./support/fake-accelerator";
import { pngHeader } from "./support/images";
import { MemoryArtifactStore } from "./support/memory-artifact-store";

class FakeSignals implements SignalSource {
  private readonly emitter = new EventEmitter();

  once(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): void {
    this.emitter.once(signal, listener);
  }

  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): void {
    this.emitter.off(signal, listener);
  }

  raise(signal: NodeJS.Signals): void {
    this.emitter.emit(signal, signal);
  }

  listening(): number {
    return this.emitter.listenerCount("SIGTERM") + this.emitter.listenerCount("SIGINT");
  }
}

const noMetrics: MetricsRecorder = {
  record: async () => undefined,
  model: async () => ({ slope: 0, intercept: 12, sampleCount: 0 }),
};

const runtimes: JobRuntime[] = [];

afterEach(async () => {
  await Promise.all(runtimes.splice(0).map((runtime) => runtime.stop()));
});

describe("installShutdownHooks", () => {
  it("cancels the running job and releases its session on SIGTERM", async () => {
    const gate = new Deferred();
    const entered = new Deferred();
    const accelerator = new FakeAccelerator({
      beforeOp: async (op) => {
        if (op === "renderTrajectory") {
          entered.resolve();
          await gate.promise;
        }
      },
    });
    const runtime = createRuntime({
      accelerator,
      artifacts: new MemoryArtifactStore(),
      metrics: noMetrics,
      mirror: null,
      logger: silentLogger,
    });
    runtimes.push(runtime);
    const signals = new FakeSignals();
    const stopped = new Deferred<NodeJS.Signals>();
    installShutdownHooks(runtime, { source: signals, logger: silentLogger, afterStop: (signal) => stopped.resolve(signal) });

    const id = runtime.queue.submit({ image: pngHeader(1600, 1200), imageName: "beach.png", preset: "Social" });
    await entered.promise;

    signals.raise("SIGTERM");
    gate.resolve();

    expect(await stopped.promise).toBe("SIGTERM");
    expect(runtime.queue.status(id)).toMatchObject({ state: "cancelled", detail: "Cancelled: server shutting down." });
    expect(accelerator.released).toBe(1);
    expect(signals.listening()).toBe(0);
    expect(() => runtime.queue.submit({ image: pngHeader(10, 10), preset: "Social" })).toThrow("queue is shutting down");
  });

  it("removes its listeners when uninstalled", () => {
    const signals = new FakeSignals();

    const uninstall = installShutdownHooks({ stop: async () => undefined }, { source: signals, logger: silentLogger });
    expect(signals.listening()).toBe(2);

    uninstall();
    expect(signals.listening()).toBe(0);
  });
});
