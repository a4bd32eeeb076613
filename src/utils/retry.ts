import { createChildLogger } from "./logger.js";

const log = createChildLogger({ module: "retry" });

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Exponential backoff with jitter. The last error is rethrown once attempts run out. */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    retryOn = () => true,
    sleep = defaultSleep,
  } = opts;

  let attempt = 1;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !retryOn(error)) throw error;

      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      const jittered = Math.round(delay * (0.5 + Math.random() * 0.5));
      log.warn({ attempt, maxAttempts, delayMs: jittered }, "Retrying after error");
      await sleep(jittered);
      attempt++;
    }
  }
}
