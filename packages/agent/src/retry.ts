import { log } from "./logger.js";
import { TimeoutError, isRetryable, errorMessage } from "./errors.js";

export interface RetryOptions {
  label: string;
  /** Additional attempts after the first one. */
  retries?: number;
  /** Delay before the first retry; doubles on each subsequent retry. */
  delayMs?: number;
  maxDelayMs?: number;
  /** Per-attempt timeout. 0 disables it. */
  timeoutMs?: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function backoffDelay(attempt: number, delayMs: number, maxDelayMs: number): number {
  return Math.min(delayMs * 2 ** attempt, maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const retries = opts.retries ?? 3;
  const delayMs = opts.delayMs ?? 500;
  const maxDelayMs = opts.maxDelayMs ?? 10_000;
  const timeoutMs = opts.timeoutMs ?? 0;

  for (let attempt = 0; ; attempt++) {
    try {
      return await withTimeout(fn(), timeoutMs, opts.label);
    } catch (err) {
      if (attempt >= retries || !isRetryable(err)) throw err;
      const wait = backoffDelay(attempt, delayMs, maxDelayMs);
      log.warn("Retrying after failure", {
        label: opts.label,
        attempt: attempt + 1,
        retries,
        waitMs: wait,
        error: errorMessage(err),
      });
      await sleep(wait);
    }
  }
}
