import type {
  Accelerator,
  AcceleratorSession,
  AcquireInput,
  EncodeOptions,
  ProbeReport,
  StageRef,
  TrajectorySpec,
} from "@/types";

export type AcceleratorOp =
  | "predictGaussians"
  | "exportScene"
  | "renderTrajectory"
  | "resizeImage"
  | "estimateDepth"
  | "parallaxWarp"
  | "encodeVideo";

export interface FakeAcceleratorOptions {
  report?: ProbeReport;
  probeError?: Error;
  acquireError?: Error;
  failAt?: AcceleratorOp;
  video?: Buffer;
  scene?: Buffer;
  /** Size the fake resize stage reports back */
  resizedSide?: number;
  /** Awaited before every operation; lets a test hold a stage open */
  beforeOp?: (op: AcceleratorOp, jobId: string) => Promise<void> | void;
}

export class Deferred<T = void> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolve = resolve;
    });
  }
}

export const FAKE_VIDEO = Buffer.from("fake-mp4-bytes");

export const FAKE_SCENE = Buffer.from("ply\nformat binary_little_endian 1.0\n");

export class FakeAccelerator implements Accelerator {
  readonly calls: Array<{ jobId: string; op: AcceleratorOp }> = [];
  readonly trajectories: TrajectorySpec[] = [];
  readonly resizeSides: number[] = [];
  readonly encodeOptions: EncodeOptions[] = [];
  probes = 0;
  acquired = 0;
  released = 0;

  constructor(private readonly options: FakeAcceleratorOptions = {}) {}

  async probe(): Promise<ProbeReport> {
    this.probes += 1;
    if (this.options.probeError) throw this.options.probeError;
    return this.options.report ?? { cuda: true, gsplat: true, device: "Fake GPU" };
  }

  async acquire(input: AcquireInput): Promise<AcceleratorSession> {
    if (this.options.acquireError) throw this.options.acquireError;
    this.acquired += 1;

    const fake = this;
    const { options } = this;
    const step = async (op: AcceleratorOp): Promise<void> => {
      fake.calls.push({ jobId: input.jobId, op });
      await options.beforeOp?.(op, input.jobId);
      if (options.failAt === op) {
        throw new Error(`${op} exploded`);
      }
    };

    let released = false;
    return {
      id: `session-${input.jobId}`,
      input: { ref: `input.${input.format}` },
      async predictGaussians() {
        await step("predictGaussians");
        return { ref: "scene.ply" };
      },
      async exportScene() {
        await step("exportScene");
        return options.scene ?? FAKE_SCENE;
      },
      async renderTrajectory(_scene: StageRef, trajectory: TrajectorySpec) {
        await step("renderTrajectory");
        fake.trajectories.push(trajectory);
        return { ref: "frames", frameCount: trajectory.frameCount };
      },
      async resizeImage(_image: StageRef, maxSide: number) {
        await step("resizeImage");
        fake.resizeSides.push(maxSide);
        const side = options.resizedSide;
        return side ? { ref: "resized.png", width: side, height: Math.round(side / 2) } : { ref: "resized.png" };
      },
      async estimateDepth() {
        await step("estimateDepth");
        return { ref: "depth.npy" };
      },
      async parallaxWarp(_image: StageRef, _depth: StageRef, trajectory: TrajectorySpec) {
        await step("parallaxWarp");
        fake.trajectories.push(trajectory);
        return { ref: "frames", frameCount: trajectory.frameCount };
      },
      async encodeVideo(_frames: StageRef, encode: EncodeOptions) {
        await step("encodeVideo");
        fake.encodeOptions.push(encode);
        return options.video ?? FAKE_VIDEO;
      },
      async release() {
        if (released) return;
        released = true;
        fake.released += 1;
      },
    };
  }

  opsFor(jobId: string): AcceleratorOp[] {
    return this.calls.filter((call) => call.jobId === jobId).map((call) => call.op);
  }
}
