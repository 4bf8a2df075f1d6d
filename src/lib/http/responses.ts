/**
 * HTTP responses - JSON error bodies and status codes for job errors
 */

import { NextResponse } from "next/server";
import { JobError } from "@/lib/errors/job-errors";
import type { ApiErrorBody, ErrorKind } from "@/types";

const STATUS_BY_KIND: Readonly<Record<ErrorKind, number>> = {
  invalid_input: 400,
  invalid_preset: 400,
  not_found: 404,
  device_unavailable: 503,
  pipeline_stage_failed: 500,
  stage_timeout: 500,
};

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function errorBody(kind: ApiErrorBody["error"]["kind"], message: string): ApiErrorBody {
  return { error: { kind, message } };
}

/**
 * Map anything thrown by a handler to an error response
 */
export function errorResponse(error: unknown): NextResponse<ApiErrorBody> {
  if (error instanceof JobError) {
    const info = error.toInfo();
    return NextResponse.json({ error: info }, { status: statusForKind(info.kind) });
  }

  console.error("[api] Unhandled error:", error);
  return NextResponse.json(errorBody("internal", "Internal server error"), { status: 500 });
}

export function notReadyResponse(): NextResponse<ApiErrorBody> {
  return NextResponse.json(errorBody("not_found", "Not ready."), { status: 404 });
}
