/**
 * Application configuration - Centralized environment variable management
 */

import { join } from "path";

function getEnv(name: string, defaultValue?: string): string | undefined {
  return process.env[name] ?? defaultValue;
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} is required but not set`);
  }
  return value;
}

export function getEnvAsBoolean(name: string, defaultValue = false): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  return value === "1" || value.toLowerCase() === "true";
}

export function getEnvAsNumber(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Application configuration
 */
export const appConfig = {
  // Supabase mirror for finished videos
  supabase: {
    isConfigured: () => Boolean(getEnv("SUPABASE_URL") && getEnv("SUPABASE_SERVICE_ROLE_KEY")),
  },

  storage: {
    artifactsDirectory: getEnv("ARTIFACTS_DIR", join(process.cwd(), "data", "artifacts")) ?? "data/artifacts",
    metricsFile: getEnv("METRICS_FILE", join(process.cwd(), "data", "job-metrics.json")) ?? "data/job-metrics.json",
    artifactTtlMs: getEnvAsNumber("ARTIFACT_TTL_MS", 3_600_000), // 1 hour
    sweepIntervalMs: getEnvAsNumber("ARTIFACT_SWEEP_INTERVAL_MS", 60_000),
    rendersBucket: getEnv("SUPABASE_STORAGE_BUCKET", "renders") ?? "renders",
    isRendersBucketPublic: getEnvAsBoolean("SUPABASE_STORAGE_PUBLIC", false),
  },

  // E2B configuration
  e2b: {
    template: getEnv("E2B_TEMPLATE", "motion-render-gpu") ?? "motion-render-gpu",
    defaultTimeoutMs: getEnvAsNumber("E2B_DEFAULT_TIMEOUT_MS", 3_600_000), // 1 hour
  },

  queue: {
    maxUploadBytes: getEnvAsNumber("MAX_UPLOAD_BYTES", 25 * 1024 * 1024),
    jobRetentionMs: getEnvAsNumber("JOB_RETENTION_MS", 30 * 60 * 1000),
    allowFallback: getEnvAsBoolean("PIPELINE_ALLOW_FALLBACK", true),
  },

  session: {
    cookieName: "motion_session",
    maxAgeSeconds: 60 * 60 * 24 * 30,
  },
} as const;

/**
 * Get Supabase URL
 */
export function getSupabaseUrl(): string {
  return requireEnv("SUPABASE_URL");
}

/**
 * Get Supabase service role key
 */
export function getSupabaseServiceRoleKey(): string {
  return requireEnv("SUPABASE_SERVICE_ROLE_KEY");
}
