/**
 * Job route handlers - Built from a runtime so tests can drive them with fakes
 */

import type { Readable } from "stream";
import { NextResponse, type NextRequest } from "next/server";
import { InvalidInputError } from "@/lib/errors/job-errors";
import { estimateDuration } from "@/lib/metrics";
import { MOTION_KINDS, SLIDER_RANGES } from "@/lib/motion";
import { DEFAULT_OUTPUT_MODE, OUTPUT_MODES } from "@/lib/output-mode";
import { DEFAULT_PRESET_NAME, listPresets } from "@/lib/presets";
import type { JobRuntime } from "@/lib/runtime";
import type { ArtifactKind, JobEvent, JobEventType, JobState, SubmitJobResponse } from "@/types";
import { formFlag, formString, motionFromForm, newSessionId, readSessionId, setSessionCookie } from "./form";
import { errorResponse, notReadyResponse } from "./responses";

export interface JobRouteContext {
  params: { id: string };
}

type JobHandler = (request: NextRequest, context: JobRouteContext) => Promise<Response>;
type CollectionHandler = (request: NextRequest) => Promise<Response>;

const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no", // Disable nginx buffering
};

function eventType(state: JobState): JobEventType {
  if (state === "done" || state === "failed" || state === "cancelled") return state;
  return "progress";
}

async function readForm(request: NextRequest): Promise<FormData> {
  try {
    return await request.formData();
  } catch (error) {
    throw new InvalidInputError("Expected a multipart form body", {
      originalError: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * POST /api/jobs
 */
export function createSubmitJobHandler(runtime: Pick<JobRuntime, "queue">): CollectionHandler {
  return async (request) => {
    try {
      const form = await readForm(request);
      const file = form.get("image");
      const image = file instanceof Blob ? Buffer.from(await file.arrayBuffer()) : null;

      const existingSession = readSessionId(request);
      const sessionId = existingSession ?? newSessionId();

      const jobId = runtime.queue.submit({
        image,
        imageName: file instanceof File ? file.name : undefined,
        preset: formString(form, "preset") || DEFAULT_PRESET_NAME,
        motion: motionFromForm(form),
        forceFallback: formFlag(form, "fallback"),
        output: formString(form, "output_mode"),
        exportPly: formFlag(form, "export_ply"),
        sessionId,
      });

      const body: SubmitJobResponse = { jobId };
      const response = NextResponse.json(body);
      if (!existingSession) {
        setSessionCookie(response, sessionId);
      }
      return response;
    } catch (error) {
      return errorResponse(error);
    }
  };
}

/**
 * GET /api/jobs?ids=a,b
 */
export function createBatchStatusHandler(runtime: Pick<JobRuntime, "statuses">): CollectionHandler {
  return async (request) => {
    try {
      const ids = request.nextUrl.searchParams
        .getAll("ids")
        .flatMap((value) => value.split(","))
        .map((value) => value.trim())
        .filter(Boolean);

      if (ids.length === 0) {
        throw new InvalidInputError("No job ids provided");
      }

      const results = runtime.statuses.checkStatusBatch(ids);
      return NextResponse.json({ jobs: [...results.values()] });
    } catch (error) {
      return errorResponse(error);
    }
  };
}

/**
 * GET /api/jobs/:id
 */
export function createJobStatusHandler(runtime: Pick<JobRuntime, "queue">): JobHandler {
  return async (_request, { params }) => {
    try {
      return NextResponse.json(runtime.queue.status(params.id));
    } catch (error) {
      return errorResponse(error);
    }
  };
}

/**
 * DELETE /api/jobs/:id
 */
export function createCancelJobHandler(runtime: Pick<JobRuntime, "queue">): JobHandler {
  return async (_request, { params }) => {
    try {
      return NextResponse.json(runtime.queue.cancel(params.id));
    } catch (error) {
      return errorResponse(error);
    }
  };
}

/**
 * GET /api/jobs/:id/events - job snapshots as Server-Sent Events
 */
export function createJobEventsHandler(runtime: Pick<JobRuntime, "queue">): JobHandler {
  return async (request, { params }) => {
    const jobId = params.id;
    try {
      runtime.queue.status(jobId);
    } catch (error) {
      return errorResponse(error);
    }

    const abort = new AbortController();
    let cancelled = false;
    const onClientGone = () => abort.abort();
    request.signal.addEventListener("abort", onClientGone, { once: true });

    const stream = new ReadableStream<Uint8Array>({
      async start(controller) {
        const encoder = new TextEncoder();
        controller.enqueue(encoder.encode(": connected\n\n"));

        try {
          for await (const view of runtime.queue.subscribe(jobId, { signal: abort.signal })) {
            // The reader may have gone away while the generator was waiting
            if (cancelled) break;
            const event: JobEvent = { type: eventType(view.state), jobId, data: view };
            controller.enqueue(encoder.encode(`data: ${JSON.stringify(event)}\n\n`));
          }
        } catch (error) {
          console.error(`[api] Event stream for job ${jobId} failed:`, error);
        } finally {
          request.signal.removeEventListener("abort", onClientGone);
          if (!cancelled) {
            controller.close();
          }
        }
      },
      cancel() {
        cancelled = true;
        abort.abort();
      },
    });

    return new Response(stream, { headers: SSE_HEADERS });
  };
}

/**
 * Pull-driven web stream over a Node readable
 */
function toWebStream(source: Readable): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      source.on("data", (chunk: Buffer) => {
        controller.enqueue(new Uint8Array(chunk));
        if ((controller.desiredSize ?? 0) <= 0) {
          source.pause();
        }
      });
      source.once("end", () => controller.close());
      source.once("error", (error) => controller.error(error));
    },
    pull() {
      source.resume();
    },
    cancel() {
      source.destroy();
    },
  });
}

/**
 * Base name for a downloaded scene: the upload's name without its extension
 */
export function sceneFileName(imageName: string): string {
  const stem = imageName.replace(/\.[^.]*$/, "").replace(/["\\\r\n]/g, "").trim();
  return `${stem || "scene"}.ply`;
}

function createArtifactHandler(
  runtime: Pick<JobRuntime, "queue" | "artifacts">,
  kind: ArtifactKind,
  filenameFor: (jobId: string) => string
): JobHandler {
  return async (request, { params }) => {
    try {
      const handle = runtime.queue.artifactOf(params.id, kind);
      if (!handle) {
        return notReadyResponse();
      }

      const reader = runtime.artifacts.open(handle);
      const download = request.nextUrl.searchParams.get("download") === "1";

      return new Response(toWebStream(reader.stream), {
        headers: {
          "Content-Type": handle.contentType,
          "Content-Length": String(handle.size),
          "Content-Disposition": `${download ? "attachment" : "inline"}; filename="${filenameFor(params.id)}"`,
          "Cache-Control": "no-store",
        },
      });
    } catch (error) {
      return errorResponse(error);
    }
  };
}

/**
 * GET /api/jobs/:id/result?download=1
 */
export function createJobResultHandler(runtime: Pick<JobRuntime, "queue" | "artifacts">): JobHandler {
  return createArtifactHandler(runtime, "video", (jobId) => `motion-${jobId}.mp4`);
}

/**
 * GET /api/jobs/:id/ply?download=1, also served as /api/jobs/:id/ply/:name
 */
export function createJobSceneHandler(runtime: Pick<JobRuntime, "queue" | "artifacts">): JobHandler {
  return createArtifactHandler(runtime, "scene", (jobId) => sceneFileName(runtime.queue.status(jobId).imageName));
}

/**
 * GET /api/queue
 */
export function createQueueOverviewHandler(runtime: Pick<JobRuntime, "queue">): CollectionHandler {
  return async (request) => {
    try {
      return NextResponse.json(runtime.queue.overview(readSessionId(request)));
    } catch (error) {
      return errorResponse(error);
    }
  };
}

/**
 * GET /api/presets
 */
export function createPresetsHandler(): CollectionHandler {
  return async () =>
    NextResponse.json({
      presets: listPresets(),
      defaultPreset: DEFAULT_PRESET_NAME,
      motionKinds: MOTION_KINDS,
      outputModes: OUTPUT_MODES,
      defaultOutputMode: DEFAULT_OUTPUT_MODE,
      sliders: SLIDER_RANGES,
    });
}

/**
 * GET /api/metrics/estimate?width=&height=
 */
export function createEstimateHandler(runtime: Pick<JobRuntime, "metrics">): CollectionHandler {
  return async (request) => {
    try {
      const params = request.nextUrl.searchParams;
      const width = Number(params.get("width")) || undefined;
      const height = Number(params.get("height")) || undefined;

      const model = await runtime.metrics.model();
      return NextResponse.json({ model, estimatedSeconds: estimateDuration(model, width, height) });
    } catch (error) {
      return errorResponse(error);
    }
  };
}
