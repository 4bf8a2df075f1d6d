import type { NextRequest } from "next/server";
import { createPresetsHandler } from "@/lib/http/job-handlers";

export async function GET(request: NextRequest) {
  return createPresetsHandler()(request);
}
