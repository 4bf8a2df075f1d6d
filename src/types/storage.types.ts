/**
 * Storage types - Local artifact store and Supabase mirror abstractions
 */

import type { Readable } from "stream";
import type { ArtifactHandle, ArtifactKind } from "./job.types";

export interface StorageUploadOptions {
  contentType?: string;
  upsert?: boolean;
  cacheControl?: string;
}

export interface StorageUrlOptions {
  expiresIn?: number; // seconds for signed URLs
}

export interface ArtifactReader {
  handle: ArtifactHandle;
  stream: Readable;
}

export interface ArtifactStore {
  put(jobId: string, data: Buffer, kind?: ArtifactKind): Promise<ArtifactHandle>;
  open(handle: ArtifactHandle): ArtifactReader;
  has(handle: ArtifactHandle): boolean;
  evict(handle: ArtifactHandle): Promise<void>;
  sweep(now?: number): Promise<number>;
  stats(): ArtifactStoreStats;
}

export interface MirroredArtifact {
  url: string;
  /** When a signed URL stops working; absent for public URLs */
  expiresAt?: number;
}

export interface ArtifactMirror {
  publish(handle: ArtifactHandle, data: Buffer): Promise<MirroredArtifact>;
}

export interface ArtifactStoreStats {
  count: number;
  totalBytes: number;
  pinned: number;
}
