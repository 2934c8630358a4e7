/**
 * Async helpers: timeouts, bounded retries and a worker pool.
 */

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timer. The timer is cleared either way.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  /** Attempts after the first one */
  retries: number;
  /** Base delay; doubles on every attempt, plus up to the same again in jitter */
  backoffMs: number;
  label: string;
  /** Return false to stop retrying on this error */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Retry with exponential backoff and jitter.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { retries, backoffMs, label, shouldRetry } = options;
  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (attempt >= retries || (shouldRetry && !shouldRetry(error))) {
        break;
      }

      const waitMs = Math.pow(2, attempt) * backoffMs + Math.random() * backoffMs;
      console.warn(`${label} Retrying after error (attempt ${attempt + 1}/${retries}), waiting ${Math.round(waitMs)}ms`);
      if (waitMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, waitMs));
      }
    }
  }

  throw lastError;
}

/**
 * Map items through `worker` with at most `limit` in flight.
 * Results keep input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const run = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => run()));
  return results;
}
