type BackoffOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
};

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const backoffDelay = (
  attempt: number,
  { initialDelayMs = 500, maxDelayMs = 30_000, factor = 2, jitter = true }: BackoffOptions = {},
  random: () => number = Math.random,
): number => {
  const capped = Math.min(initialDelayMs * factor ** (attempt - 1), maxDelayMs);
  // Full jitter would allow 0ms; keep at least half the delay.
  return jitter ? Math.round(capped / 2 + random() * (capped / 2)) : Math.round(capped);
};

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const { maxAttempts = 5, onRetry, shouldRetry, sleep = wait } = options;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || (shouldRetry && !shouldRetry(error, attempt))) {
        throw error;
      }

      const delay = backoffDelay(attempt, options);

      if (onRetry) {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          console.warn('[retry] onRetry hook threw.', hookError);
        }
      }

      await sleep(delay);
    }
  }
};

export type { BackoffOptions };
