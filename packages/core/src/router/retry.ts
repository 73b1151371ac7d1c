/**
 * Retry and deadline policy for agent model calls.
 *
 * The executor owns the deadline: it aborts the call's signal when the task
 * runs out of time, and `withRetry` stops between attempts as soon as that
 * signal fires, rethrowing the last failure.
 */

export interface RetryPolicy {
  /** Total attempts including the first (default: 3). */
  attempts?: number;
  /** Delay before the first retry; doubles each time (default: 1000). */
  baseDelayMs?: number;
  maxDelayMs?: number;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export const DEFAULT_RETRY_POLICY = {
  attempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 15_000,
} as const;

const TRANSIENT_PATTERN =
  /\b(429|500|502|503|504|529)\b|rate limit|too many requests|overloaded|service unavailable|econnreset|socket hang up/i;

/** Rate limits, 5xx responses and dropped connections are worth another attempt. */
export function isTransient(error: unknown): boolean {
  if (error instanceof DeadlineError) return false;
  const message = error instanceof Error ? error.message : String(error);
  return TRANSIENT_PATTERN.test(message);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = {},
  signal?: AbortSignal,
): Promise<{ result: T; attempts: number }> {
  const attempts = policy.attempts ?? DEFAULT_RETRY_POLICY.attempts;
  const baseDelayMs = policy.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs;
  const maxDelayMs = policy.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return { result: await fn(attempt), attempts: attempt };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= attempts || signal?.aborted || !isTransient(error)) {
        throw error;
      }
      const delayMs = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      policy.onRetry?.(attempt, error, delayMs);
      if (!(await pause(delayMs, signal))) {
        throw error;
      }
    }
  }
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ---------------------------------------------------------------------------
// Deadlines
// ---------------------------------------------------------------------------

export class DeadlineError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'DeadlineError';
  }
}

/**
 * Rejects with DeadlineError if `work` has not settled within `timeoutMs`,
 * calling `onExpire` first. A non-positive timeout disables the deadline.
 */
export function withDeadline<T>(work: Promise<T>, timeoutMs: number, onExpire?: () => void): Promise<T> {
  if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) return work;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onExpire?.();
      reject(new DeadlineError(timeoutMs));
    }, timeoutMs);
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
