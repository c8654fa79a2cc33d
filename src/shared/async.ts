/**
 * Async utilities for timeout, sleep and polling operations
 */

import { TimeoutError } from '../errors';

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Race `fn` against a timer. The timer is cleared once `fn` settles; `fn`
 * itself keeps running after a timeout since nothing here can cancel it.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operation = 'operation',
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(`${operation} timed out after ${timeoutMs}ms`, timeoutMs, operation)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([fn(), expiry]);
  } finally {
    clearTimeout(timer);
  }
}

export interface PollOptions {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  /** Used in the TimeoutError raised when attempts run out */
  operation?: string;
}

/**
 * Delay before attempt `attempt + 1`, counting attempts from 1
 */
export function backoffDelay(
  attempt: number,
  { initialDelayMs, backoffFactor, maxDelayMs }: Pick<PollOptions, 'initialDelayMs' | 'backoffFactor' | 'maxDelayMs'>,
): number {
  return Math.min(initialDelayMs * Math.pow(backoffFactor, attempt - 1), maxDelayMs);
}

/**
 * Call `check` until it resolves to a non-undefined value. Attempt 1 runs
 * immediately; later attempts wait with exponential backoff. Errors thrown by
 * `check` propagate unchanged.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<T | undefined>,
  options: PollOptions,
): Promise<T> {
  const { maxAttempts, operation = 'poll' } = options;
  let waited = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const value = await check(attempt);
    if (value !== undefined) {
      return value;
    }
    if (attempt < maxAttempts) {
      const delay = backoffDelay(attempt, options);
      waited += delay;
      await sleep(delay);
    }
  }

  throw new TimeoutError(
    `${operation} did not complete after ${maxAttempts} attempts`,
    waited,
    operation,
    { maxAttempts },
  );
}
