/**
 * Device probe - Detects the rendering capability once per process
 */

import type { Accelerator, DeviceCapability, ProbeReport } from "@/types";
import type { Logger } from "@/lib/logger";

export interface DeviceSnapshot {
  capability: DeviceCapability;
  device: string;
}

/**
 * Map a probe report to a capability
 */
export function capabilityFromReport(report: ProbeReport): DeviceCapability {
  if (report.cuda && report.gsplat) return "gsplat_cuda";
  if (report.cuda) return "cuda_no_gsplat";
  return "fallback_only";
}

/**
 * Memoized capability probe; a failed probe degrades to fallback_only
 */
export class DeviceProbe {
  private pending: Promise<DeviceSnapshot> | null = null;
  private resolved: DeviceSnapshot | undefined;

  constructor(
    private readonly accelerator: Pick<Accelerator, "probe">,
    private readonly logger: Logger = console
  ) {}

  snapshot(): Promise<DeviceSnapshot> {
    if (!this.pending) {
      this.pending = this.detect().then((snapshot) => {
        this.resolved = Object.freeze(snapshot);
        return this.resolved;
      });
    }
    return this.pending;
  }

  /**
   * Capability if the probe already finished
   */
  current(): DeviceSnapshot | undefined {
    return this.resolved;
  }

  private async detect(): Promise<DeviceSnapshot> {
    try {
      const report = await this.accelerator.probe();
      const capability = capabilityFromReport(report);
      this.logger.info(`[device-probe] ${report.device}: ${capability}`);
      return { capability, device: report.device };
    } catch (error) {
      this.logger.warn(
        "[device-probe] Probe failed, using fallback_only:",
        error instanceof Error ? error.message : String(error)
      );
      return { capability: "fallback_only", device: "unknown" };
    }
  }
}
