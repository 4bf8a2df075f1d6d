/**
 * Storage service - Mirrors finished videos to a Supabase Storage bucket
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { appConfig, getSupabaseServiceRoleKey, getSupabaseUrl } from "@/config/app.config";
import { StorageError } from "@/lib/errors/job-errors";
import type { Logger } from "@/lib/logger";
import { retry } from "@/lib/retry";
import type {
  ArtifactHandle,
  ArtifactMirror,
  MirroredArtifact,
  StorageUploadOptions,
  StorageUrlOptions,
} from "@/types";

interface BucketError {
  message: string;
  /** HTTP status of the failed storage call, when the API reported one */
  status?: number;
}

/**
 * The subset of a Supabase Storage bucket the mirror uses
 */
export interface MirrorBucket {
  upload(path: string, body: Buffer, options: StorageUploadOptions): Promise<{ error: BucketError | null }>;
  getPublicUrl(path: string): string;
  createSignedUrl(path: string, expiresIn: number): Promise<{ signedUrl: string | null; error: BucketError | null }>;
}

export interface SupabaseMirrorOptions {
  isPublic?: boolean;
  logger?: Logger;
  /** First backoff delay between upload attempts */
  retryDelayMs?: number;
  /** Lifetime of signed URLs; defaults to the local artifact TTL */
  urlTtlSeconds?: number;
  now?: () => number;
}

function toBucketError(error: Error | null): BucketError | null {
  if (!error) return null;
  const status = "status" in error && typeof error.status === "number" ? error.status : undefined;
  return { message: error.message, status };
}

/**
 * Wrap a Supabase Storage bucket
 */
export function supabaseBucket(client: SupabaseClient, bucketName: string): MirrorBucket {
  const api = client.storage.from(bucketName);
  return {
    async upload(path, body, options) {
      const { error } = await api.upload(path, body, {
        contentType: options.contentType || "application/octet-stream",
        upsert: options.upsert ?? true,
        cacheControl: options.cacheControl,
      });
      return { error: toBucketError(error) };
    },
    getPublicUrl(path) {
      return api.getPublicUrl(path).data.publicUrl;
    },
    async createSignedUrl(path, expiresIn) {
      const { data, error } = await api.createSignedUrl(path, expiresIn);
      return { signedUrl: data?.signedUrl ?? null, error: toBucketError(error) };
    },
  };
}

/**
 * Upload failures worth another attempt: no status, a server error, a
 * timeout or rate limiting
 */
export function isTransientUploadError(error: unknown): boolean {
  if (!(error instanceof StorageError)) return true;
  const status = error.context?.status;
  return typeof status !== "number" || status >= 500 || status === 408 || status === 429;
}

/**
 * Uploads finished videos and returns a public or signed URL for them
 */
export class SupabaseArtifactMirror implements ArtifactMirror {
  private readonly isPublic: boolean;
  private readonly logger: Logger;
  private readonly retryDelayMs: number;
  private readonly urlTtlSeconds: number;
  private readonly now: () => number;

  constructor(
    private readonly bucket: MirrorBucket,
    options: SupabaseMirrorOptions = {}
  ) {
    this.isPublic = options.isPublic ?? appConfig.storage.isRendersBucketPublic;
    this.logger = options.logger ?? console;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.urlTtlSeconds = options.urlTtlSeconds ?? Math.ceil(appConfig.storage.artifactTtlMs / 1000);
    this.now = options.now ?? Date.now;
  }

  async publish(handle: ArtifactHandle, data: Buffer): Promise<MirroredArtifact> {
    const objectPath = `${handle.jobId}.mp4`;

    await retry(
      async () => {
        const { error } = await this.bucket.upload(objectPath, data, { contentType: handle.contentType, upsert: true });
        if (error) {
          throw StorageError.fromUpload("supabase", error.message, { objectPath, status: error.status });
        }
      },
      {
        attempts: 3,
        initialDelayMs: this.retryDelayMs,
        retryable: isTransientUploadError,
        onRetry: (error, attempt) => {
          this.logger.warn(`[storage] Upload of ${objectPath} failed (attempt ${attempt}), retrying:`, error);
        },
      }
    );

    const signedAt = this.now();
    const url = await this.getUrl(objectPath);
    return this.isPublic ? { url } : { url, expiresAt: signedAt + this.urlTtlSeconds * 1000 };
  }

  async getUrl(objectPath: string, options: StorageUrlOptions = {}): Promise<string> {
    const { expiresIn = this.urlTtlSeconds } = options;

    if (this.isPublic) {
      return this.bucket.getPublicUrl(objectPath);
    }

    const { signedUrl, error } = await this.bucket.createSignedUrl(objectPath, expiresIn);
    if (error || !signedUrl) {
      throw StorageError.fromUrlGeneration("supabase", error?.message ?? "no signed URL returned", { objectPath });
    }
    return signedUrl;
  }
}

/**
 * Mirror for the configured Supabase project, or null when Supabase is not configured
 */
export function createSupabaseMirror(logger: Logger = console): SupabaseArtifactMirror | null {
  if (!appConfig.supabase.isConfigured()) {
    return null;
  }

  const client = createClient(getSupabaseUrl(), getSupabaseServiceRoleKey(), {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return new SupabaseArtifactMirror(supabaseBucket(client, appConfig.storage.rendersBucket), { logger });
}
