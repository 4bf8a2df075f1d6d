import type { NextRequest } from "next/server";
import { createQueueOverviewHandler } from "@/lib/http/job-handlers";
import { getRuntime } from "@/lib/runtime";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  return createQueueOverviewHandler(getRuntime())(request);
}
