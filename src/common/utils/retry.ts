export interface RetryOptions {
  attempts: number;
  delayMs: number;
  /** Called after every failed attempt, including the last one. */
  onAttemptFailed?: (error: unknown, attempt: number) => void;
}

/**
 * Runs `fn` up to `attempts` times with a linearly growing delay between tries.
 * Rethrows the last error once attempts are exhausted.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      options.onAttemptFailed?.(error, attempt);

      if (attempt < attempts && options.delayMs > 0) {
        await delay(options.delayMs * attempt);
      }
    }
  }

  throw lastError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
