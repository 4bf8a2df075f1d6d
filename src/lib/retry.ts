/**
 * Retry with exponential backoff for calls to remote collaborators
 */

export interface RetryPolicy {
  attempts: number;
  initialDelayMs: number;
  maxDelayMs?: number;
  /** False ends the loop at once: the error is not one another attempt can fix */
  retryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Delay before the attempt after `attempt`: doubles each time, capped
 */
export function backoffDelay(attempt: number, initialDelayMs: number, maxDelayMs = 10_000): number {
  return Math.min(initialDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

export async function retry<T>(operation: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= policy.attempts || !policy.retryable(error)) {
        throw error;
      }
      policy.onRetry?.(error, attempt);
      await new Promise((resolve) => setTimeout(resolve, backoffDelay(attempt, policy.initialDelayMs, policy.maxDelayMs)));
    }
  }
}
