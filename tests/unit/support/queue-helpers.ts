import type { JobQueue } from "@/services/job-queue.service";
import type { JobView } from "@/types";

/**
 * Follow a job until its terminal snapshot and return every snapshot seen
 */
export async function followJob(queue: JobQueue, id: string): Promise<JobView[]> {
  const views: JobView[] = [];
  for await (const view of queue.subscribe(id)) {
    views.push(view);
  }
  return views;
}

export async function settle(queue: JobQueue, id: string): Promise<JobView> {
  const views = await followJob(queue, id);
  return views[views.length - 1] ?? queue.status(id);
}

export function sequentialIds(prefix = "job"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}
