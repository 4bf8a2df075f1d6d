import type { NextRequest } from "next/server";
import { createBatchStatusHandler, createSubmitJobHandler } from "@/lib/http/job-handlers";
import { getRuntime } from "@/lib/runtime";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(request: NextRequest) {
  return createSubmitJobHandler(getRuntime())(request);
}

export async function GET(request: NextRequest) {
  return createBatchStatusHandler(getRuntime())(request);
}
