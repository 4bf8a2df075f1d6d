import { describe, expect, it } from "vitest";
import { silentLogger } from "@/lib/logger";
import { capabilityFromReport, DeviceProbe } from "@/services/device-probe.service";
import { FakeAccelerator } from "./support/fake-accelerator";

describe("capabilityFromReport", () => {
  it("maps probe reports to capabilities", () => {
    expect(capabilityFromReport({ cuda: true, gsplat: true, device: "gpu" })).toBe("gsplat_cuda");
    expect(capabilityFromReport({ cuda: true, gsplat: false, device: "gpu" })).toBe("cuda_no_gsplat");
    expect(capabilityFromReport({ cuda: false, gsplat: true, device: "cpu" })).toBe("fallback_only");
  });
});

describe("DeviceProbe", () => {
  it("probes once and memoizes the result", async () => {
    const accelerator = new FakeAccelerator({ report: { cuda: true, gsplat: false, device: "Test GPU" } });
    const probe = new DeviceProbe(accelerator, silentLogger);

    expect(probe.current()).toBeUndefined();
    const [first, second] = await Promise.all([probe.snapshot(), probe.snapshot()]);

    expect(first.capability).toBe("cuda_no_gsplat");
    expect(second).toBe(first);
    expect(accelerator.probes).toBe(1);
    expect(probe.current()).toEqual({ capability: "cuda_no_gsplat", device: "Test GPU" });
  });

  it("degrades to fallback_only when the probe fails", async () => {
    const accelerator = new FakeAccelerator({ probeError: new Error("no sandbox") });
    const probe = new DeviceProbe(accelerator, silentLogger);

    await expect(probe.snapshot()).resolves.toEqual({ capability: "fallback_only", device: "unknown" });
    expect(Object.isFrozen(probe.current())).toBe(true);
  });
});
