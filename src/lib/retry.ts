/**
 * Bounded retry with exponential backoff
 *
 * Runs an async operation up to maxRetries + 1 times. Before retry i
 * (0-based) it waits baseDelayMs * 2^i. A rejected operation counts as a
 * failed attempt; the loop itself never throws.
 *
 * Waits are abandoned when the optional AbortSignal fires, which ends the loop
 * with a failed outcome.
 */

import { getErrorMessage } from "@/lib/helpers/errors";
import { logger } from "@/lib/logger";

const log = logger.forTag("Retry");

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions extends RetryPolicy {
  /** Used in log lines, e.g. "Upload progress for li-1" */
  label: string;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export class RetryAbortedError extends Error {
  constructor() {
    super("Retry aborted");
    this.name = "RetryAbortedError";
  }
}

export function getBackoffDelay(attemptIndex: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attemptIndex;
}

/**
 * Timer-based wait that rejects with RetryAbortedError when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetryAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(new RetryAbortedError());
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function retryWithBackoff<T>(
  operation: (attemptIndex: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const { maxRetries, baseDelayMs, label, signal } = options;
  const wait = options.sleep ?? sleep;
  const totalAttempts = maxRetries + 1;
  let lastError: unknown = null;

  for (let attemptIndex = 0; attemptIndex < totalAttempts; attemptIndex++) {
    if (signal?.aborted) {
      log.info(`${label}: aborted before attempt ${attemptIndex + 1}`);
      return { ok: false, error: new RetryAbortedError(), attempts: attemptIndex };
    }

    try {
      const value = await operation(attemptIndex);
      if (attemptIndex > 0) {
        log.info(`${label}: succeeded on attempt ${attemptIndex + 1}`);
      }
      return { ok: true, value, attempts: attemptIndex + 1 };
    } catch (error) {
      lastError = error;
      log.warn(
        `${label}: attempt ${attemptIndex + 1}/${totalAttempts} failed: ${getErrorMessage(error)}`
      );
    }

    if (attemptIndex < maxRetries) {
      const delay = getBackoffDelay(attemptIndex, baseDelayMs);
      log.debug(`${label}: retrying in ${delay}ms`);
      try {
        await wait(delay, signal);
      } catch (error) {
        log.info(`${label}: backoff wait abandoned`);
        return { ok: false, error, attempts: attemptIndex + 1 };
      }
    }
  }

  return { ok: false, error: lastError, attempts: totalAttempts };
}
