import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StorageError } from "@/lib/errors/job-errors";
import { silentLogger } from "@/lib/logger";
import { LocalArtifactStore } from "@/services/artifact-store.service";
import type { Readable } from "stream";

async function drain(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

function closed(stream: Readable): Promise<void> {
  return new Promise((resolve) => stream.once("close", () => resolve()));
}

describe("LocalArtifactStore", () => {
  let directory: string;
  let clock: number;
  let store: LocalArtifactStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "motion-artifacts-"));
    clock = 1_000;
    store = new LocalArtifactStore({ directory, ttlMs: 10_000, logger: silentLogger, now: () => clock });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("stores the video under the job id with no partial file left behind", async () => {
    const handle = await store.put("abc123", Buffer.from("video-bytes"));

    expect(handle).toMatchObject({ jobId: "abc123", size: 11, contentType: "video/mp4", createdAt: 1_000 });
    expect(await readdir(directory)).toEqual(["abc123.mp4"]);
    expect(await readFile(join(directory, "abc123.mp4"), "utf8")).toBe("video-bytes");
    expect(store.has(handle)).toBe(true);
    expect(store.stats()).toEqual({ count: 1, totalBytes: 11, pinned: 0 });
  });

  it("stores a scene beside the video of the same job", async () => {
    const video = await store.put("abc123", Buffer.from("video-bytes"));
    const scene = await store.put("abc123", Buffer.from("ply\n"), "scene");

    expect(video.kind).toBe("video");
    expect(scene).toMatchObject({ jobId: "abc123", kind: "scene", size: 4, contentType: "application/octet-stream" });
    expect((await readdir(directory)).sort()).toEqual(["abc123.mp4", "abc123.ply"]);
    expect(await readFile(join(directory, "abc123.ply"), "utf8")).toBe("ply\n");
  });

  it("streams the stored bytes", async () => {
    const handle = await store.put("job-a", Buffer.from("frame data"));

    const reader = store.open(handle);

    expect(reader.handle).toEqual(handle);
    expect((await drain(reader.stream)).toString("utf8")).toBe("frame data");
  });

  it("evicts an unpinned artifact immediately", async () => {
    const handle = await store.put("job-b", Buffer.from("x"));

    await store.evict(handle);

    expect(store.has(handle)).toBe(false);
    expect(await readdir(directory)).toEqual([]);
    expect(() => store.open(handle)).toThrow(StorageError);
  });

  it("defers eviction until the last reader closes", async () => {
    const handle = await store.put("job-c", Buffer.from("pinned"));
    const reader = store.open(handle);
    expect(store.stats().pinned).toBe(1);

    await store.evict(handle);

    expect(store.has(handle)).toBe(false);
    expect(await readdir(directory)).toEqual(["job-c.mp4"]);

    const done = closed(reader.stream);
    expect((await drain(reader.stream)).toString("utf8")).toBe("pinned");
    await done;
    // Deletion runs in the close handler
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(await readdir(directory)).toEqual([]);
  });

  it("sweeps artifacts older than the TTL", async () => {
    const old = await store.put("old", Buffer.from("1"));
    clock = 6_000;
    const fresh = await store.put("fresh", Buffer.from("2"));

    clock = 11_000;
    expect(await store.sweep()).toBe(1);

    expect(store.has(old)).toBe(false);
    expect(store.has(fresh)).toBe(true);
    expect(await readdir(directory)).toEqual(["fresh.mp4"]);
  });
});
