import { createClient } from "@supabase/supabase-js";
import { describe, expect, it, vi } from "vitest";
import { StorageError } from "@/lib/errors/job-errors";
import { silentLogger } from "@/lib/logger";
import {
  isTransientUploadError,
  supabaseBucket,
  SupabaseArtifactMirror,
  type MirrorBucket,
} from "@/services/storage.service";
import type { ArtifactHandle } from "@/types";

const handle: ArtifactHandle = {
  id: "artifact-1",
  jobId: "abc123",
  kind: "video",
  size: 3,
  contentType: "video/mp4",
  createdAt: 0,
};

function fakeBucket(overrides: Partial<MirrorBucket> = {}) {
  const bucket = {
    upload: vi.fn<MirrorBucket["upload"]>(async () => ({ error: null })),
    getPublicUrl: vi.fn<MirrorBucket["getPublicUrl"]>((path) => `https://storage.test/public/${path}`),
    createSignedUrl: vi.fn<MirrorBucket["createSignedUrl"]>(async (path, expiresIn) => ({
      signedUrl: `https://storage.test/signed/${path}?expires=${expiresIn}`,
      error: null,
    })),
    ...overrides,
  };
  return bucket;
}

describe("SupabaseArtifactMirror", () => {
  it("uploads under the job id and returns a signed URL that expires with the local copy", async () => {
    const bucket = fakeBucket();
    const mirror = new SupabaseArtifactMirror(bucket, { isPublic: false, logger: silentLogger, now: () => 5_000 });

    const mirrored = await mirror.publish(handle, Buffer.from("mp4"));

    expect(mirrored).toEqual({ url: "https://storage.test/signed/abc123.mp4?expires=3600", expiresAt: 3_605_000 });
    expect(bucket.upload).toHaveBeenCalledWith("abc123.mp4", Buffer.from("mp4"), {
      contentType: "video/mp4",
      upsert: true,
    });
  });

  it("returns the public URL for a public bucket", async () => {
    const bucket = fakeBucket();
    const mirror = new SupabaseArtifactMirror(bucket, { isPublic: true, logger: silentLogger });

    expect(await mirror.publish(handle, Buffer.from("mp4"))).toEqual({ url: "https://storage.test/public/abc123.mp4" });
    expect(bucket.createSignedUrl).not.toHaveBeenCalled();
  });

  it("retries a failed upload", async () => {
    const upload = vi
      .fn<MirrorBucket["upload"]>()
      .mockResolvedValueOnce({ error: { message: "bucket busy" } })
      .mockResolvedValueOnce({ error: null });
    const logger = { ...silentLogger, warn: vi.fn() };
    const mirror = new SupabaseArtifactMirror(fakeBucket({ upload }), { isPublic: true, logger, retryDelayMs: 1 });

    await mirror.publish(handle, Buffer.from("mp4"));

    expect(upload).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("gives up after three attempts", async () => {
    const upload = vi.fn<MirrorBucket["upload"]>(async () => ({ error: { message: "bucket busy" } }));
    const mirror = new SupabaseArtifactMirror(fakeBucket({ upload }), {
      isPublic: true,
      logger: silentLogger,
      retryDelayMs: 1,
    });

    await expect(mirror.publish(handle, Buffer.from("mp4"))).rejects.toThrow("Failed to upload to supabase: bucket busy");
    expect(upload).toHaveBeenCalledTimes(3);
  });

  it("signs for the configured lifetime", async () => {
    const bucket = fakeBucket();
    const mirror = new SupabaseArtifactMirror(bucket, {
      isPublic: false,
      logger: silentLogger,
      urlTtlSeconds: 600,
      now: () => 0,
    });

    expect(await mirror.publish(handle, Buffer.from("mp4"))).toEqual({
      url: "https://storage.test/signed/abc123.mp4?expires=600",
      expiresAt: 600_000,
    });
  });

  it("does not retry an upload the API refused", async () => {
    const upload = vi.fn<MirrorBucket["upload"]>(async () => ({ error: { message: "permission denied", status: 403 } }));
    const mirror = new SupabaseArtifactMirror(fakeBucket({ upload }), {
      isPublic: true,
      logger: silentLogger,
      retryDelayMs: 1,
    });

    await expect(mirror.publish(handle, Buffer.from("mp4"))).rejects.toThrow(
      "Failed to upload to supabase: permission denied"
    );
    expect(upload).toHaveBeenCalledTimes(1);
  });

  it("fails when no signed URL comes back", async () => {
    const bucket = fakeBucket({
      createSignedUrl: async () => ({ signedUrl: null, error: { message: "forbidden" } }),
    });
    const mirror = new SupabaseArtifactMirror(bucket, { isPublic: false, logger: silentLogger });

    await expect(mirror.getUrl("abc123.mp4")).rejects.toThrow("Failed to generate URL from supabase: forbidden");
  });
});

describe("isTransientUploadError", () => {
  const refused = (status?: number) => StorageError.fromUpload("supabase", "refused", { status });

  it("retries server errors, timeouts, rate limits and unknown failures", () => {
    expect(isTransientUploadError(refused(503))).toBe(true);
    expect(isTransientUploadError(refused(408))).toBe(true);
    expect(isTransientUploadError(refused(429))).toBe(true);
    expect(isTransientUploadError(refused())).toBe(true);
    expect(isTransientUploadError(new Error("socket hang up"))).toBe(true);
  });

  it("gives up on other client errors", () => {
    expect(isTransientUploadError(refused(400))).toBe(false);
    expect(isTransientUploadError(refused(413))).toBe(false);
  });
});

describe("supabaseBucket", () => {
  it("builds public URLs from a real client without calling the API", () => {
    const client = createClient("http://localhost:54321", "test-service-key", {
      auth: { persistSession: false, autoRefreshToken: false },
    });

    const bucket = supabaseBucket(client, "renders");

    expect(bucket.getPublicUrl("abc123.mp4")).toBe("http://localhost:54321/storage/v1/object/public/renders/abc123.mp4");
  });
});
