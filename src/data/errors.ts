/**
 * Options for creating a DataSourceError.
 */
export interface DataSourceErrorOptions {
  /** The original error that caused this failure */
  originalError?: Error;
  /** HTTP status code if applicable */
  statusCode?: number;
  /** Node.js or system error code (e.g., ENOENT, ECONNRESET) */
  errorCode?: string;
}

/**
 * Error thrown when a data source cannot be read.
 *
 * Raised for a missing or unreadable sponsor register (fatal at startup)
 * and for failing profile sources.
 */
export class DataSourceError extends Error {
  readonly source: string;
  readonly isRetryable: boolean;
  readonly originalError?: Error;
  /** HTTP status code if applicable (e.g., 429, 503) */
  readonly statusCode?: number;
  /** Node.js or system error code (e.g., ENOENT) */
  readonly errorCode?: string;

  constructor(
    message: string,
    source: string,
    isRetryable: boolean,
    options: DataSourceErrorOptions = {}
  ) {
    super(message);
    this.name = "DataSourceError";
    this.source = source;
    this.isRetryable = isRetryable;
    this.originalError = options.originalError;
    this.statusCode = options.statusCode;
    this.errorCode = options.errorCode;
  }
}

/**
 * Read the `code` property Node attaches to system errors.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Read the `status` property HTTP clients attach to response errors.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (error instanceof Error && "status" in error) {
    const { status } = error;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}
