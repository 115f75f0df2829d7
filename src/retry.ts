import { ProviderError, errorMessage } from "./errors.js";
import * as log from "./log.js";

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

const DEFAULTS: Required<RetryOptions> = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 15_000,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Errors that cannot change on a second attempt (404, auth, unmappable payloads). */
export function isRetryable(err: unknown): boolean {
  if (err instanceof ProviderError) return err.retryable;
  return true;
}

export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs } = { ...DEFAULTS, ...opts };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!isRetryable(err)) {
        throw err;
      }

      const msg = errorMessage(err);
      if (attempt === maxAttempts) {
        log.debug(`${label} failed after ${maxAttempts} attempts: ${msg}`);
        throw err;
      }

      const delayMs = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      log.warn(
        `${label} failed (attempt ${attempt}/${maxAttempts}), retrying in ${(delayMs / 1000).toFixed(1)}s… — ${msg}`,
      );
      await sleep(delayMs);
    }
  }

  throw new Error("unreachable");
}
