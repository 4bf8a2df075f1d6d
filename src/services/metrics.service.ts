/**
 * Metrics service - Persists finished-job samples and fits the duration model
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { appConfig } from "@/config/app.config";
import type { Logger } from "@/lib/logger";
import { fitDurationModel, type MetricsSample } from "@/lib/metrics";
import type { DurationModel } from "@/types";

const sampleSchema = z.object({
  jobId: z.string(),
  requestedAt: z.number(),
  finishedAt: z.number(),
  durationS: z.number(),
  imageWidth: z.number().optional(),
  imageHeight: z.number().optional(),
  backendKind: z.enum(["gaussian_trajectory", "depth_parallax"]),
  preset: z.enum(["Full", "High", "Balanced", "Medium", "Social", "Small"]),
  device: z.string().optional(),
});

const metricsFileSchema = z.object({ samples: z.array(sampleSchema) });

export interface MetricsRecorder {
  record(sample: MetricsSample): Promise<void>;
  model(): Promise<DurationModel>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * JSON-file backed metrics; keeps the most recent samples only
 */
export class FileMetricsStore implements MetricsRecorder {
  private loading: Promise<MetricsSample[]> | null = null;
  private writing: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string = appConfig.storage.metricsFile,
    private readonly logger: Logger = console,
    private readonly maxSamples = 500
  ) {}

  samples(): Promise<MetricsSample[]> {
    if (!this.loading) {
      this.loading = this.read();
    }
    return this.loading;
  }

  async record(sample: MetricsSample): Promise<void> {
    const samples = await this.samples();
    samples.push(sample);
    if (samples.length > this.maxSamples) {
      samples.splice(0, samples.length - this.maxSamples);
    }

    const snapshot = JSON.stringify({ samples }, null, 2);
    // Writes are chained; a failed write is reported to its caller only
    const write = this.writing.then(() => this.persist(snapshot));
    this.writing = write.catch(() => undefined);
    await write;
  }

  async model(): Promise<DurationModel> {
    return fitDurationModel(await this.samples());
  }

  private async read(): Promise<MetricsSample[]> {
    try {
      const raw = await readFile(this.filePath, "utf8");
      const parsed = metricsFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.logger.warn(`[metrics] Ignoring malformed metrics file ${this.filePath}`);
        return [];
      }
      return parsed.data.samples;
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn(`[metrics] Failed to read ${this.filePath}:`, error);
      }
      return [];
    }
  }

  private async persist(contents: string): Promise<void> {
    const partialPath = `${this.filePath}.partial`;
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(partialPath, contents, "utf8");
    await rename(partialPath, this.filePath);
  }
}
