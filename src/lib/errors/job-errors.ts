/**
 * Custom error classes for the motion job system
 */

import type { ErrorInfo, ErrorKind, StageName } from "@/types";

export class JobError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toInfo(): ErrorInfo {
    return { kind: this.kind, message: this.message };
  }
}

export class InvalidInputError extends JobError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "invalid_input", "INVALID_INPUT", context);
  }

  static missingImage(): InvalidInputError {
    return new InvalidInputError("No image provided");
  }

  static tooLarge(size: number, maxBytes: number): InvalidInputError {
    return new InvalidInputError(
      `Image is ${size} bytes, larger than the ${maxBytes} byte limit`,
      { size, maxBytes }
    );
  }

  static unsupportedFormat(name?: string): InvalidInputError {
    return new InvalidInputError("Only JPEG, PNG and HEIC images are supported", { imageName: name });
  }
}

export class InvalidPresetError extends JobError {
  constructor(public readonly presetName: string) {
    super(`Unknown preset "${presetName}"`, "invalid_preset", "INVALID_PRESET", { presetName });
  }
}

export class NotFoundError extends JobError {
  constructor(public readonly jobId: string) {
    super(`Unknown job id ${jobId}`, "not_found", "NOT_FOUND", { jobId });
  }
}

export class DeviceUnavailableError extends JobError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "device_unavailable", "DEVICE_UNAVAILABLE", context);
  }

  static fallbackDisabled(capability: string): DeviceUnavailableError {
    return new DeviceUnavailableError(
      `No eligible backend: device capability is ${capability} and the depth-parallax fallback is disabled`,
      { capability }
    );
  }

  static sceneExportUnavailable(capability: string): DeviceUnavailableError {
    return new DeviceUnavailableError(
      `PLY export needs the Gaussian backend, which cannot run on device capability ${capability}`,
      { capability }
    );
  }

  static notEligible(backend: string, capability: string): DeviceUnavailableError {
    return new DeviceUnavailableError(`Backend ${backend} cannot run on device capability ${capability}`, {
      backend,
      capability,
    });
  }
}

export class PipelineStageError extends JobError {
  constructor(
    public readonly stage: StageName,
    public readonly reason: string,
    context?: Record<string, unknown>
  ) {
    super(`Stage ${stage} failed: ${reason}`, "pipeline_stage_failed", "PIPELINE_STAGE_FAILED", {
      ...context,
      stage,
    });
  }

  static fromError(stage: StageName, error: unknown, context?: Record<string, unknown>): PipelineStageError {
    const message = error instanceof Error ? error.message : String(error);
    return new PipelineStageError(stage, message, { ...context, originalError: message });
  }

  override toInfo(): ErrorInfo {
    return { kind: this.kind, message: this.message, stage: this.stage };
  }
}

export class StageTimeoutError extends JobError {
  constructor(
    public readonly stage: StageName,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Stage ${stage} exceeded its ${Math.round(timeoutMs / 1000)}s deadline`,
      "stage_timeout",
      "STAGE_TIMEOUT",
      { ...context, stage, timeoutMs }
    );
  }

  override toInfo(): ErrorInfo {
    return { kind: this.kind, message: this.message, stage: this.stage };
  }
}

/**
 * Infrastructure errors raised by collaborators; the backend wraps them into
 * PipelineStageError when they happen inside a stage
 */
export class SandboxError extends Error {
  constructor(
    message: string,
    public readonly sandboxId?: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  static fromConnection(sandboxId: string, error: unknown, context?: Record<string, unknown>): SandboxError {
    const message = error instanceof Error ? error.message : String(error);
    return new SandboxError(
      `Failed to connect to sandbox ${sandboxId}: ${message}`,
      sandboxId,
      { ...context, originalError: message }
    );
  }

  static fromFileNotFound(sandboxId: string, filePath: string, context?: Record<string, unknown>): SandboxError {
    return new SandboxError(
      `File not found in sandbox ${sandboxId}: ${filePath}`,
      sandboxId,
      { ...context, filePath }
    );
  }

  static fromSegmentationFault(sandboxId: string, context?: Record<string, unknown>): SandboxError {
    return new SandboxError(
      "Stage process crashed with a segmentation fault (accelerator out of memory or driver fault)",
      sandboxId,
      context
    );
  }

  static fromScriptError(sandboxId: string, error: string, errorType?: string): SandboxError {
    return new SandboxError(
      `${error}${errorType ? ` (error_type: ${errorType})` : ""}`,
      sandboxId,
      { errorType }
    );
  }
}

/**
 * Stage command killed by its shell-level deadline
 */
export class SandboxTimeoutError extends SandboxError {
  constructor(
    public readonly timeoutMs: number,
    sandboxId?: string,
    context?: Record<string, unknown>
  ) {
    super(`Command timed out after ${Math.round(timeoutMs / 1000)} seconds`, sandboxId, context);
  }
}

export class StorageError extends Error {
  constructor(
    message: string,
    public readonly provider?: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  static fromUpload(provider: string, error: unknown, context?: Record<string, unknown>): StorageError {
    const message = error instanceof Error ? error.message : String(error);
    return new StorageError(
      `Failed to upload to ${provider}: ${message}`,
      provider,
      { ...context, originalError: message }
    );
  }

  static fromUrlGeneration(provider: string, error: unknown, context?: Record<string, unknown>): StorageError {
    const message = error instanceof Error ? error.message : String(error);
    return new StorageError(
      `Failed to generate URL from ${provider}: ${message}`,
      provider,
      { ...context, originalError: message }
    );
  }
}

/**
 * Turn anything thrown during a job into the description shown to clients
 */
export function toErrorInfo(error: unknown, stage?: StageName): ErrorInfo {
  if (error instanceof JobError) return error.toInfo();
  const message = error instanceof Error ? error.message : String(error);
  return { kind: "pipeline_stage_failed", message, stage };
}
