/**
 * Sandbox service - E2B sandbox lifecycle management
 */

import { Sandbox } from "e2b";
import { appConfig } from "@/config/app.config";
import { SandboxError } from "@/lib/errors/job-errors";
import { retry } from "@/lib/retry";
import { toArrayBuffer, toBuffer } from "@/lib/utils/sandbox-output.util";
import type {
  SandboxCommandOptions,
  SandboxCommandResult,
  SandboxCreationOptions,
  SandboxFactory,
  SandboxInstance,
} from "@/types/sandbox.types";

/**
 * Adapt an E2B sandbox to the narrow interface the accelerator drives
 */
function wrapE2BSandbox(sandbox: Sandbox): SandboxInstance {
  return {
    sandboxId: sandbox.sandboxId,
    async writeFile(path, data) {
      await sandbox.files.write(path, data);
    },
    readFile(path) {
      return sandbox.files.read(path, { format: "bytes" });
    },
    run(command, options = {}) {
      return sandbox.commands.run(command, { timeoutMs: options.timeoutMs });
    },
    kill() {
      return sandbox.kill();
    },
  };
}

// E2B errors that another attempt cannot fix: bad key, bad arguments, unknown template
const PERMANENT_E2B_ERRORS: ReadonlySet<string> = new Set([
  "AuthenticationError",
  "InvalidArgumentError",
  "NotFoundError",
  "TemplateError",
]);

export function isTransientSandboxError(error: unknown): boolean {
  return !(error instanceof Error && PERMANENT_E2B_ERRORS.has(error.name));
}

export const createE2BSandbox: SandboxFactory = async (template, options) => {
  const sandbox = await Sandbox.create(template, { timeoutMs: options.timeoutMs });
  return wrapE2BSandbox(sandbox);
};

/**
 * Sandbox service for E2B operations
 */
export class SandboxService {
  constructor(
    private readonly factory: SandboxFactory = createE2BSandbox,
    private readonly retryDelayMs = 2000
  ) {}

  /**
   * Create a new sandbox
   */
  async create(options: SandboxCreationOptions = {}): Promise<SandboxInstance> {
    const template = options.template || appConfig.e2b.template;
    const timeoutMs = options.timeoutMs || appConfig.e2b.defaultTimeoutMs;

    try {
      return await retry(() => this.factory(template, { timeoutMs }), {
        attempts: 3,
        initialDelayMs: this.retryDelayMs,
        retryable: isTransientSandboxError,
        onRetry: (error, attempt) => {
          console.warn(`[sandbox] create attempt ${attempt} failed:`, error instanceof Error ? error.message : error);
        },
      });
    } catch (error) {
      throw SandboxError.fromConnection("new", error, { template });
    }
  }

  /**
   * Upload file to sandbox
   */
  async uploadFile(sandbox: SandboxInstance, sandboxPath: string, data: Buffer | Uint8Array | string): Promise<void> {
    try {
      await sandbox.writeFile(sandboxPath, typeof data === "string" ? data : toArrayBuffer(data));
    } catch (error) {
      throw new SandboxError(
        `Failed to upload file to sandbox ${sandbox.sandboxId}: ${sandboxPath}`,
        sandbox.sandboxId,
        { filePath: sandboxPath, error: error instanceof Error ? error.message : String(error) }
      );
    }
  }

  /**
   * Read file from sandbox
   */
  async readFile(sandbox: SandboxInstance, sandboxPath: string): Promise<Buffer> {
    try {
      const data = await sandbox.readFile(sandboxPath);
      return toBuffer(data);
    } catch (error) {
      throw SandboxError.fromFileNotFound(sandbox.sandboxId, sandboxPath, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Execute command in sandbox
   */
  async executeCommand(
    sandbox: SandboxInstance,
    command: string,
    options: SandboxCommandOptions = {}
  ): Promise<SandboxCommandResult> {
    try {
      const result = await sandbox.run(command, { timeoutMs: options.timeoutMs ?? 0 });
      return {
        exitCode: result.exitCode,
        stdout: result.stdout || "",
        stderr: result.stderr || "",
      };
    } catch (error: unknown) {
      // E2B SDK throws CommandExitError when exit code is non-zero
      if (typeof error === "object" && error !== null && "exitCode" in error) {
        const exitCode = "exitCode" in error && typeof error.exitCode === "number" ? error.exitCode : undefined;
        const stdout = "stdout" in error && typeof error.stdout === "string" ? error.stdout : "";
        const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
        return { exitCode, stdout, stderr };
      }

      throw new SandboxError(`Command execution failed in sandbox ${sandbox.sandboxId}`, sandbox.sandboxId, {
        command,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Kill sandbox (cleanup)
   */
  async kill(sandbox: SandboxInstance): Promise<void> {
    try {
      await sandbox.kill();
    } catch (error) {
      // Log but don't throw - cleanup errors shouldn't fail the operation
      console.error(`[sandbox] Failed to kill sandbox ${sandbox.sandboxId}:`, error);
    }
  }
}
