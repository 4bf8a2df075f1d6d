/**
 * Form parsing - Multipart submission fields and the session cookie
 */

import { randomUUID } from "crypto";
import type { NextRequest, NextResponse } from "next/server";
import { appConfig } from "@/config/app.config";
import type { MotionRequest } from "@/types";

// Form field -> motion request key
const SLIDER_FIELDS = {
  duration_s: "durationS",
  fps: "fps",
  motion_scale: "motionScale",
  wobble_scale: "wobbleScale",
  max_disparity: "maxDisparity",
  max_zoom: "maxZoom",
  num_repeats: "numRepeats",
} as const satisfies Record<string, keyof MotionRequest>;

export function formString(form: FormData, name: string): string | undefined {
  const value = form.get(name);
  return typeof value === "string" ? value : undefined;
}

export function formFlag(form: FormData, name: string): boolean {
  const value = formString(form, name)?.trim().toLowerCase();
  return value === "1" || value === "true" || value === "on" || value === "yes";
}

/**
 * Motion kind and slider values from a submission form; the queue clamps them
 */
export function motionFromForm(form: FormData): MotionRequest {
  const request: MotionRequest = { kind: formString(form, "trajectory_type") };
  for (const [field, key] of Object.entries(SLIDER_FIELDS)) {
    const value = formString(form, field);
    if (value !== undefined) {
      request[key] = value;
    }
  }
  return request;
}

export function readSessionId(request: NextRequest): string | undefined {
  const value = request.cookies.get(appConfig.session.cookieName)?.value;
  return value && /^[a-f0-9]{32}$/.test(value) ? value : undefined;
}

export function newSessionId(): string {
  return randomUUID().replace(/-/g, "");
}

export function setSessionCookie(response: NextResponse, sessionId: string): void {
  response.cookies.set(appConfig.session.cookieName, sessionId, {
    httpOnly: true,
    sameSite: "lax",
    path: "/",
    maxAge: appConfig.session.maxAgeSeconds,
  });
}
