export type QuoteFetchErrorKind = "timeout" | "rate_limited" | "not_found" | "http";

/** A quote fetch that failed. Pollers absorb these; detection is delayed by one cycle. */
export class QuoteFetchError extends Error {
  readonly kind: QuoteFetchErrorKind;

  constructor(kind: QuoteFetchErrorKind, message: string) {
    super(message);
    this.name = "QuoteFetchError";
    this.kind = kind;
  }
}

export class TimeoutError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

/** Rejected by the venue (or it never acknowledged). */
export class SubmissionFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubmissionFailedError";
  }
}

/**
 * Race `promise` against a timer. The underlying call is not aborted; its
 * eventual result is ignored.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
