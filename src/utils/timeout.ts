import { Logger } from "./logger.js";

const logger = new Logger("timeout");

/**
 * Error thrown when an outbound call does not settle in time.
 */
export class OperationTimeoutError extends Error {
  constructor(
    public readonly timeoutMs: number,
    public readonly operation: string
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
  }
}

/**
 * Reject with OperationTimeoutError if the promise has not settled
 * within `timeoutMs`. The timer is always cleared.
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds
 * @param operation - Name used in the error and the log line
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation = "operation"
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      logger.warn("Operation timed out", { operation, timeoutMs });
      reject(new OperationTimeoutError(timeoutMs, operation));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}
