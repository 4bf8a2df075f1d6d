import { calculateDuration } from "@/lib/utils/progress-calculator.util"
import type { BackendKind, DurationModel, JobView, PresetName, SystemStatus } from "@/types"

export type MetricsSample = {
  jobId: string
  requestedAt: number
  finishedAt: number
  durationS: number
  imageWidth?: number
  imageHeight?: number
  backendKind: BackendKind
  preset: PresetName
  device?: string
}

// Used until the first job has finished
const DEFAULT_INTERCEPT_SECONDS = 12

/**
 * Image size of a sample in megapixels, when its dimensions were probed
 */
export function sampleMegapixels(sample: MetricsSample): number | null {
  if (!sample.imageWidth || !sample.imageHeight) {
    return null
  }
  return (sample.imageWidth * sample.imageHeight) / 1_000_000
}

/**
 * Least-squares fit of job duration against image megapixels
 */
export function fitDurationModel(samples: readonly MetricsSample[]): DurationModel {
  const points = samples
    .map((sample) => ({ x: sampleMegapixels(sample), y: sample.durationS }))
    .filter((point): point is { x: number; y: number } => point.x !== null && Number.isFinite(point.y))

  if (points.length === 0) {
    return { slope: 0, intercept: DEFAULT_INTERCEPT_SECONDS, sampleCount: 0 }
  }

  const meanX = points.reduce((sum, p) => sum + p.x, 0) / points.length
  const meanY = points.reduce((sum, p) => sum + p.y, 0) / points.length
  const variance = points.reduce((sum, p) => sum + (p.x - meanX) ** 2, 0)

  if (points.length === 1 || variance === 0) {
    return { slope: 0, intercept: meanY, sampleCount: points.length }
  }

  const covariance = points.reduce((sum, p) => sum + (p.x - meanX) * (p.y - meanY), 0)
  const slope = covariance / variance
  return { slope, intercept: meanY - slope * meanX, sampleCount: points.length }
}

/**
 * Predicted seconds for an image of the given size
 */
export function estimateDuration(model: DurationModel, width?: number, height?: number): number {
  const megapixels = width && height ? (width * height) / 1_000_000 : 0
  return Math.max(1, Math.round(model.intercept + model.slope * megapixels))
}

/**
 * Calculate system status metrics from job views
 */
export function calculateSystemStatus(
  jobs: readonly Pick<JobView, "state" | "startedAt" | "finishedAt">[],
  now: number = Date.now()
): SystemStatus {
  const todayStart = new Date(now)
  todayStart.setHours(0, 0, 0, 0)
  const finishedToday = (finishedAt?: number) => finishedAt !== undefined && finishedAt >= todayStart.getTime()

  const durations = jobs
    .filter((j) => j.state === "done")
    .map((j) => calculateDuration(j.startedAt, j.finishedAt))
    .filter((d): d is number => d !== null)

  const avgDuration = durations.length > 0 ? durations.reduce((sum, d) => sum + d, 0) / durations.length : 0

  return {
    runningJobs: jobs.filter((j) => j.state === "running").length,
    queuedJobs: jobs.filter((j) => j.state === "queued").length,
    completedToday: jobs.filter((j) => j.state === "done" && finishedToday(j.finishedAt)).length,
    failedToday: jobs.filter((j) => j.state === "failed" && finishedToday(j.finishedAt)).length,
    avgDurationSeconds: Math.round(avgDuration),
  }
}
