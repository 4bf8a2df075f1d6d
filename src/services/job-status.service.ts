/**
 * Job status service - Status lookups for one or many jobs
 */

import { toErrorInfo } from "@/lib/errors/job-errors";
import type { ErrorInfo, JobView } from "@/types";
import type { JobQueue } from "./job-queue.service";

export type BatchStatusEntry = JobView | { id: string; error: ErrorInfo };

export class JobStatusService {
  constructor(private readonly queue: Pick<JobQueue, "status">) {}

  /**
   * Check status for a single job
   */
  checkStatus(jobId: string): JobView {
    return this.queue.status(jobId);
  }

  /**
   * Check status for multiple jobs; a failed lookup becomes an error entry
   */
  checkStatusBatch(jobIds: readonly string[]): Map<string, BatchStatusEntry> {
    const results = new Map<string, BatchStatusEntry>();

    for (const jobId of new Set(jobIds)) {
      try {
        results.set(jobId, this.checkStatus(jobId));
      } catch (error) {
        results.set(jobId, { id: jobId, error: toErrorInfo(error) });
      }
    }

    return results;
  }
}
