import { setTimeout as sleep } from "node:timers/promises";

export class StageTimeoutError extends Error {
  constructor(stage: string, ms: number) {
    super(`${stage} timed out after ${ms}ms`);
    this.name = "StageTimeoutError";
  }
}

/**
 * Runs one external call under its own deadline. On timeout the call's signal
 * is aborted and its eventual result, if any, is dropped.
 */
export async function withTimeout<T>(
  stage: string,
  ms: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new StageTimeoutError(stage, ms));
    }, ms);
  });

  const call = run(controller.signal);
  // the losing side of the race must not surface as an unhandled rejection
  call.catch(() => undefined);

  try {
    return await Promise.race([call, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryPolicy {
  attempts: number;
  backoffMs: number;
}

/** Quadratic backoff: after failed try n (0-based) waits n² × backoffMs, i.e. 0, 1, 4, 9 ... */
export async function withRetry<T>(
  policy: RetryPolicy,
  run: (attempt: number) => Promise<T>,
  onFailure?: (err: unknown, attempt: number) => void
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt < policy.attempts; attempt++) {
    const wait = (attempt - 1) * (attempt - 1) * policy.backoffMs;
    if (attempt > 0 && wait > 0) await sleep(wait);
    try {
      return await run(attempt);
    } catch (e) {
      lastError = e;
      onFailure?.(e, attempt);
    }
  }
  throw lastError;
}
