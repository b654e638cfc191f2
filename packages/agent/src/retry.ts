import { log } from "./logger.js";

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  label?: string;
  /** Return false to give up immediately on a given error. */
  shouldRetry?: (err: unknown) => boolean;
}

/**
 * Run `fn`, retrying on failure with exponential backoff.
 * The last error is rethrown once retries are exhausted.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const retries = opts.retries ?? 3;
  const delayMs = opts.delayMs ?? 1000;
  const label = opts.label ?? "operation";

  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || (opts.shouldRetry && !opts.shouldRetry(err))) {
        throw err;
      }
      const wait = delayMs * 2 ** attempt;
      attempt++;
      log.warn(`${label} failed, retrying`, { attempt, retries, waitMs: wait, error: String(err) });
      await new Promise((r) => setTimeout(r, wait));
    }
  }
}
