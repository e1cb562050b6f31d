/**
 * Backoff for flaky outbound calls (page fetches, web searches).
 */

import pRetry, { type RetryContext } from "p-retry";
import { createLoggerWithCorrelationId } from "./logger.js";
import { getErrorCode, getErrorStatus } from "../data/errors.js";
import { RETRY_MAX_DELAY_MS, RETRY_MIN_DELAY_MS } from "./constants.js";

export interface RetryOptions {
  /** Attempts after the first one (default: 3) */
  retries?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  correlationId?: string | null;
  /** Used as the logger context */
  operation?: string;
}

const TRANSIENT_STATUSES = new Set([429, 502, 503, 504]);

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "ECONNREFUSED",
  "EAI_AGAIN"
]);

/** Lowercase message fragments that mark an error without status or code as transient */
const TRANSIENT_MESSAGE_FRAGMENTS = [
  "timeout",
  "timed out",
  "rate limit",
  "too many requests",
  "network",
  "econnreset",
  "etimedout",
  ...[...TRANSIENT_STATUSES].map(String)
];

/**
 * Whether a failed call is worth another attempt.
 *
 * An HTTP status decides first: 429 and gateway errors retry, any other
 * 4xx never does. Then the Node.js error code, then the message.
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const status = getErrorStatus(error);
  if (status !== undefined) {
    if (TRANSIENT_STATUSES.has(status)) return true;
    if (status >= 400 && status < 500) return false;
  }

  const code = getErrorCode(error);
  if (code !== undefined && TRANSIENT_CODES.has(code)) return true;

  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGE_FRAGMENTS.some((fragment) => message.includes(fragment));
}

/**
 * Run `fn` with exponential backoff. The first non-retryable failure is
 * rethrown at once, unwrapped, so callers still see its type and status.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { retries = 3, operation = "retry", correlationId } = options;
  const logger = createLoggerWithCorrelationId(operation, correlationId);

  const onFailedAttempt = ({ error, attemptNumber, retriesLeft }: RetryContext): void => {
    if (!isRetryableError(error)) {
      logger.debug("Giving up on non-retryable error", { error: error.message, attemptNumber });
      throw error;
    }
    logger.warn("Retry attempt failed", { attemptNumber, retriesLeft, error: error.message });
  };

  return pRetry(fn, {
    retries,
    minTimeout: options.minDelayMs ?? RETRY_MIN_DELAY_MS,
    maxTimeout: options.maxDelayMs ?? RETRY_MAX_DELAY_MS,
    onFailedAttempt
  });
}
