export interface RetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Runs `operation` until it resolves, at most `maxRetries + 1` times, with a
 * linear backoff. Errors for which `isPermanent` holds are rethrown at once.
 */
export async function withRetries<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  isPermanent: (error: unknown) => boolean = () => false,
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (isPermanent(error) || attempt > policy.maxRetries) {
        throw error;
      }
    }
    await sleep(policy.retryDelayMs * attempt);
  }
}
