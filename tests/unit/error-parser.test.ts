import { describe, expect, it } from "vitest";
import {
  cleanExitCodeMarkers,
  extractExitCode,
  extractJson,
  hasSegmentationFault,
  hasTimeout,
  parseStageResult,
} from "@/lib/errors/error-parser";

describe("extractJson", () => {
  it("finds a JSON line among log noise", () => {
    const output = 'loading weights\n{"ok": true, "output": "/tmp/motion/frames"}\nEXIT_CODE:0';
    expect(extractJson(output).data).toEqual({ ok: true, output: "/tmp/motion/frames" });
  });

  it("finds JSON embedded in a line by balanced braces", () => {
    const output = 'result => {"error": "CUDA out of memory", "error_type": "RuntimeError"} (exit)';
    expect(extractJson(output, ["error"]).data).toEqual({ error: "CUDA out of memory", error_type: "RuntimeError" });
  });

  it("skips objects without the expected keys", () => {
    const output = '{"progress": 0.5}\n{"ok": true}';
    expect(extractJson(output, ["ok", "error"]).data).toEqual({ ok: true });
  });

  it("reports missing JSON", () => {
    expect(extractJson("no json here")).toEqual({ data: null, error: "No valid JSON found in output" });
  });
});

describe("parseStageResult", () => {
  it("keeps only correctly typed fields", () => {
    const result = parseStageResult('{"ok": true, "width": 960, "height": "540", "frame_count": 120, "cuda": true}');
    expect(result.data).toEqual({
      ok: true,
      output: undefined,
      width: 960,
      height: undefined,
      frame_count: 120,
      device: undefined,
      cuda: true,
      gsplat: undefined,
      error: undefined,
      error_type: undefined,
    });
  });
});

describe("exit code helpers", () => {
  it("reads and strips EXIT_CODE markers", () => {
    expect(extractExitCode("done\nEXIT_CODE:3", 0)).toBe(3);
    expect(extractExitCode("done", 7)).toBe(7);
    expect(cleanExitCodeMarkers("done\nEXIT_CODE:3")).toBe("done");
  });

  it("classifies crashes and timeouts", () => {
    expect(hasSegmentationFault("", 139)).toBe(true);
    expect(hasSegmentationFault("Segmentation fault (core dumped)", 1)).toBe(true);
    expect(hasSegmentationFault("fine", 0)).toBe(false);
    expect(hasTimeout("", 124)).toBe(true);
    expect(hasTimeout("", 143)).toBe(true);
    expect(hasTimeout("ok", 0)).toBe(false);
  });
});
