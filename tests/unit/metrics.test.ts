import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "@/lib/logger";
import { calculateSystemStatus, estimateDuration, fitDurationModel, type MetricsSample } from "@/lib/metrics";
import { FileMetricsStore } from "@/services/metrics.service";

function sample(overrides: Partial<MetricsSample> = {}): MetricsSample {
  return {
    jobId: "job-1",
    requestedAt: 1_000,
    finishedAt: 11_000,
    durationS: 10,
    imageWidth: 1000,
    imageHeight: 1000,
    backendKind: "depth_parallax",
    preset: "Balanced",
    ...overrides,
  };
}

describe("fitDurationModel", () => {
  it("falls back to a constant estimate without samples", () => {
    const model = fitDurationModel([]);

    expect(model).toEqual({ slope: 0, intercept: 12, sampleCount: 0 });
    expect(estimateDuration(model, 4000, 3000)).toBe(12);
  });

  it("uses the mean duration for a single sample", () => {
    expect(fitDurationModel([sample({ durationS: 30, imageWidth: 2000 })])).toEqual({
      slope: 0,
      intercept: 30,
      sampleCount: 1,
    });
  });

  it("fits duration against megapixels", () => {
    const model = fitDurationModel([
      sample({ durationS: 10, imageWidth: 1000, imageHeight: 1000 }),
      sample({ durationS: 20, imageWidth: 3000, imageHeight: 1000 }),
    ]);

    expect(model).toEqual({ slope: 5, intercept: 5, sampleCount: 2 });
    expect(estimateDuration(model, 2000, 2000)).toBe(25);
    expect(estimateDuration(model)).toBe(5);
  });

  it("ignores samples without image dimensions", () => {
    const model = fitDurationModel([sample({ durationS: 8 }), sample({ durationS: 99, imageWidth: undefined })]);

    expect(model).toEqual({ slope: 0, intercept: 8, sampleCount: 1 });
  });

  it("never estimates less than one second", () => {
    expect(estimateDuration({ slope: -10, intercept: 2, sampleCount: 2 }, 1000, 1000)).toBe(1);
  });
});

describe("calculateSystemStatus", () => {
  it("counts states and averages finished durations", () => {
    const now = new Date(2026, 0, 15, 12).getTime();
    const yesterday = new Date(2026, 0, 14, 12).getTime();

    const status = calculateSystemStatus(
      [
        { state: "running", startedAt: now - 5_000 },
        { state: "queued" },
        { state: "queued" },
        { state: "done", startedAt: now - 20_000, finishedAt: now - 10_000 },
        { state: "done", startedAt: yesterday - 30_000, finishedAt: yesterday },
        { state: "failed", startedAt: now - 3_000, finishedAt: now - 1_000 },
      ],
      now
    );

    expect(status).toEqual({
      runningJobs: 1,
      queuedJobs: 2,
      completedToday: 1,
      failedToday: 1,
      avgDurationSeconds: 20,
    });
  });
});

describe("FileMetricsStore", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "motion-metrics-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("persists samples and fits the model from them", async () => {
    const filePath = join(directory, "nested", "metrics.json");
    const store = new FileMetricsStore(filePath, silentLogger);

    await store.record(sample({ jobId: "a", durationS: 10 }));
    await store.record(sample({ jobId: "b", durationS: 20, imageWidth: 3000 }));

    const reloaded = new FileMetricsStore(filePath, silentLogger);
    expect((await reloaded.samples()).map((s) => s.jobId)).toEqual(["a", "b"]);
    expect(await reloaded.model()).toEqual({ slope: 5, intercept: 5, sampleCount: 2 });
  });

  it("keeps only the most recent samples", async () => {
    const filePath = join(directory, "metrics.json");
    const store = new FileMetricsStore(filePath, silentLogger, 2);

    await store.record(sample({ jobId: "a" }));
    await store.record(sample({ jobId: "b" }));
    await store.record(sample({ jobId: "c" }));

    const saved: unknown = JSON.parse(await readFile(filePath, "utf8"));
    expect(saved).toMatchObject({ samples: [{ jobId: "b" }, { jobId: "c" }] });
  });

  it("starts empty when the file is malformed", async () => {
    const filePath = join(directory, "metrics.json");
    await writeFile(filePath, JSON.stringify({ samples: [{ jobId: 42 }] }), "utf8");
    const logger = { ...silentLogger, warn: vi.fn() };

    const store = new FileMetricsStore(filePath, logger);

    expect(await store.samples()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(`[metrics] Ignoring malformed metrics file ${filePath}`);
  });

  it("starts empty when the file does not exist", async () => {
    const logger = { ...silentLogger, warn: vi.fn() };
    const store = new FileMetricsStore(join(directory, "missing.json"), logger);

    expect(await store.model()).toEqual({ slope: 0, intercept: 12, sampleCount: 0 });
    expect(logger.warn).not.toHaveBeenCalled();
  });
});
