import type { NextRequest } from "next/server";
import { createEstimateHandler } from "@/lib/http/job-handlers";
import { getRuntime } from "@/lib/runtime";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  return createEstimateHandler(getRuntime())(request);
}
