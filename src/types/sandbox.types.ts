/**
 * Sandbox types - E2B sandbox related types
 */

export interface SandboxCommandResult {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

export interface SandboxCommandOptions {
  timeoutMs?: number;
}

export interface SandboxCreationOptions {
  timeoutMs?: number;
  template?: string;
}

/**
 * The part of an E2B sandbox the accelerator drives
 */
export interface SandboxInstance {
  readonly sandboxId: string;
  writeFile(path: string, data: ArrayBuffer | string): Promise<void>;
  readFile(path: string): Promise<Uint8Array>;
  run(command: string, options?: SandboxCommandOptions): Promise<SandboxCommandResult>;
  kill(): Promise<void>;
}

export type SandboxFactory = (template: string, options: { timeoutMs: number }) => Promise<SandboxInstance>;

/**
 * JSON line printed by the stage CLI inside the sandbox
 */
export interface StageCliResult {
  ok?: boolean;
  output?: string;
  width?: number;
  height?: number;
  frame_count?: number;
  device?: string;
  cuda?: boolean;
  gsplat?: boolean;
  error?: string;
  error_type?: string;
}
