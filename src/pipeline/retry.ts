import type { Logger } from "pino";
import type { RetryConfig } from "../config";
import { ExternalCallError, errorMessage } from "../errors";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export type RetryPolicyOptions = RetryConfig & {
  /** Decides whether a failed attempt may be retried. */
  readonly isTransient: (err: unknown) => boolean;
  /** Server-requested wait, e.g. a rate limit's retry-after. */
  readonly retryAfterMs?: (err: unknown) => number | null;
  readonly sleep?: Sleep;
};

export type RetryOutcome<T> =
  | { readonly success: true; readonly value: T; readonly attempts: number }
  | {
      readonly success: false;
      readonly error: unknown;
      readonly attempts: number;
      readonly transient: boolean;
    };

export type RetryPolicy = {
  readonly maxAttempts: number;
  readonly run: <T>(
    label: string,
    call: (attempt: number) => Promise<T>,
    logger: Logger,
  ) => Promise<RetryOutcome<T>>;
};

/** Exponential delay before retrying after the given (1-based) attempt. */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Builds a retry policy: transient failures are retried with exponential
 * backoff until `maxAttempts` calls have been made, permanent failures
 * return at once. A server-requested wait above `maxDelayMs` ends the run
 * with a transient failure instead of sleeping. Never throws; the outcome
 * carries the last error.
 */
export function createRetryPolicy(options: RetryPolicyOptions): RetryPolicy {
  const sleep = options.sleep ?? defaultSleep;

  return {
    maxAttempts: options.maxAttempts,
    async run<T>(
      label: string,
      call: (attempt: number) => Promise<T>,
      logger: Logger,
    ): Promise<RetryOutcome<T>> {
      for (let attempt = 1; ; attempt++) {
        try {
          const value = await call(attempt);
          return { success: true, value, attempts: attempt };
        } catch (err) {
          const transient = options.isTransient(err);

          if (!transient || attempt >= options.maxAttempts) {
            logger.warn(
              { call: label, attempt, transient, error: errorMessage(err) },
              transient ? "retries exhausted" : "permanent failure, not retrying",
            );
            return { success: false, error: err, attempts: attempt, transient };
          }

          const requestedMs = options.retryAfterMs?.(err) ?? 0;
          if (requestedMs > options.maxDelayMs) {
            logger.warn(
              { call: label, attempt, retryAfterMs: requestedMs, error: errorMessage(err) },
              "server asked to wait longer than maxDelayMs, deferring to the next cycle",
            );
            return { success: false, error: err, attempts: attempt, transient: true };
          }

          const delayMs = Math.max(
            backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs),
            requestedMs,
          );
          logger.info(
            { call: label, attempt, delayMs, error: errorMessage(err) },
            "transient failure, retrying",
          );
          await sleep(delayMs);
        }
      }
    },
  };
}

/** Policy for calls that fail with `ExternalCallError`. */
export function createExternalCallPolicy(
  config: RetryConfig,
  sleep?: Sleep,
): RetryPolicy {
  return createRetryPolicy({
    ...config,
    isTransient: (err) => err instanceof ExternalCallError && err.transient,
    retryAfterMs: (err) =>
      err instanceof ExternalCallError ? err.retryAfterMs : null,
    sleep,
  });
}
