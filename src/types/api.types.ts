/**
 * API request and response types
 */

import type { ErrorKind, JobView, StageName } from "./job.types";

export interface SubmitJobResponse {
  jobId: string;
}

export interface ApiErrorBody {
  error: {
    kind: ErrorKind | "internal";
    message: string;
    stage?: StageName;
  };
}

export type JobEventType = "progress" | "done" | "failed" | "cancelled";

export interface JobEvent {
  type: JobEventType;
  jobId: string;
  data: JobView;
}

export interface DurationModel {
  slope: number;
  intercept: number;
  sampleCount: number;
}
