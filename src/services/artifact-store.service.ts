/**
 * Artifact store - Finished videos and scenes on local disk with pinning and
 * TTL eviction
 */

import { createReadStream } from "fs";
import { mkdir, rename, rm, writeFile } from "fs/promises";
import { join } from "path";
import { randomUUID } from "crypto";
import { appConfig } from "@/config/app.config";
import { StorageError } from "@/lib/errors/job-errors";
import type { Logger } from "@/lib/logger";
import type { ArtifactHandle, ArtifactKind, ArtifactReader, ArtifactStore, ArtifactStoreStats } from "@/types";

const ARTIFACT_FILES: Readonly<Record<ArtifactKind, { extension: string; contentType: string }>> = {
  video: { extension: "mp4", contentType: "video/mp4" },
  scene: { extension: "ply", contentType: "application/octet-stream" },
};

interface StoredArtifact {
  handle: ArtifactHandle;
  path: string;
  readers: number;
  evictPending: boolean;
}

export interface LocalArtifactStoreOptions {
  directory?: string;
  ttlMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Local filesystem artifact store.
 *
 * Files are written as `<jobId>.<ext>.partial` and renamed into place, so an
 * artifact is only visible once complete. Open readers pin the file; eviction
 * of a pinned artifact waits for the last reader to close.
 */
export class LocalArtifactStore implements ArtifactStore {
  private readonly directory: string;
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly artifacts = new Map<string, StoredArtifact>();

  constructor(options: LocalArtifactStoreOptions = {}) {
    this.directory = options.directory ?? appConfig.storage.artifactsDirectory;
    this.ttlMs = options.ttlMs ?? appConfig.storage.artifactTtlMs;
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
  }

  async put(jobId: string, data: Buffer, kind: ArtifactKind = "video"): Promise<ArtifactHandle> {
    const { extension, contentType } = ARTIFACT_FILES[kind];
    const path = join(this.directory, `${jobId}.${extension}`);
    const partialPath = `${path}.partial`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(partialPath, data);
      await rename(partialPath, path);
    } catch (error) {
      await rm(partialPath, { force: true });
      throw StorageError.fromUpload("local", error, { jobId, path });
    }

    const handle: ArtifactHandle = Object.freeze({
      id: randomUUID(),
      jobId,
      kind,
      size: data.length,
      contentType,
      createdAt: this.now(),
    });
    this.artifacts.set(handle.id, { handle, path, readers: 0, evictPending: false });
    return handle;
  }

  has(handle: ArtifactHandle): boolean {
    const stored = this.artifacts.get(handle.id);
    return stored !== undefined && !stored.evictPending;
  }

  /**
   * Open a byte stream; the artifact stays on disk until the stream closes
   */
  open(handle: ArtifactHandle): ArtifactReader {
    const stored = this.artifacts.get(handle.id);
    if (!stored || stored.evictPending) {
      throw new StorageError(`Artifact ${handle.id} is not available`, "local", { jobId: handle.jobId });
    }

    stored.readers += 1;
    const stream = createReadStream(stored.path);
    stream.once("close", () => {
      stored.readers -= 1;
      if (stored.readers === 0 && stored.evictPending) {
        this.remove(stored).catch((error: unknown) => {
          this.logger.error(`[artifacts] Failed to delete ${stored.path}:`, error);
        });
      }
    });
    return { handle: stored.handle, stream };
  }

  async evict(handle: ArtifactHandle): Promise<void> {
    const stored = this.artifacts.get(handle.id);
    if (!stored || stored.evictPending) return;

    stored.evictPending = true;
    if (stored.readers > 0) {
      this.logger.info(`[artifacts] Eviction of ${handle.jobId} deferred, ${stored.readers} reader(s) open`);
      return;
    }
    await this.remove(stored);
  }

  /**
   * Evict artifacts older than the TTL; returns how many were evicted
   */
  async sweep(now: number = this.now()): Promise<number> {
    const expired = [...this.artifacts.values()].filter(
      (stored) => !stored.evictPending && now - stored.handle.createdAt >= this.ttlMs
    );
    for (const stored of expired) {
      await this.evict(stored.handle);
    }
    if (expired.length > 0) {
      this.logger.info(`[artifacts] Swept ${expired.length} expired artifact(s)`);
    }
    return expired.length;
  }

  stats(): ArtifactStoreStats {
    let totalBytes = 0;
    let pinned = 0;
    let count = 0;
    for (const stored of this.artifacts.values()) {
      if (stored.evictPending) continue;
      count += 1;
      totalBytes += stored.handle.size;
      if (stored.readers > 0) pinned += 1;
    }
    return { count, totalBytes, pinned };
  }

  private async remove(stored: StoredArtifact): Promise<void> {
    this.artifacts.delete(stored.handle.id);
    await rm(stored.path, { force: true });
    this.logger.info(`[artifacts] Evicted artifact for job ${stored.handle.jobId}`);
  }
}
