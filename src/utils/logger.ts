export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Interface for log transports.
 * Implement this to send logs somewhere other than stderr.
 */
export interface LogTransport {
  /**
   * Write a log entry.
   *
   * @param level - Log severity level
   * @param context - Logger context (e.g., "registry-loader")
   * @param message - Log message
   * @param data - Optional structured data
   * @param correlationId - Optional correlation ID for request tracing
   */
  log(
    level: LogLevel,
    context: string,
    message: string,
    data?: Record<string, unknown>,
    correlationId?: string
  ): void;
}

/**
 * Default transport.
 * Writes to stderr so that stdout carries only lookup results.
 */
class ConsoleTransport implements LogTransport {
  log(
    level: LogLevel,
    context: string,
    message: string,
    data?: Record<string, unknown>,
    correlationId?: string
  ): void {
    const timestamp = new Date().toISOString();
    const correlationPart = correlationId
      ? ` [correlation_id:${correlationId}]`
      : "";
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${context}]${correlationPart}`;

    if (data && Object.keys(data).length > 0) {
      console.error(prefix, message, JSON.stringify(data));
    } else {
      console.error(prefix, message);
    }
  }
}

const defaultTransport = new ConsoleTransport();

/**
 * Generate a unique correlation ID for tracing one lookup or batch run.
 */
export function generateCorrelationId(): string {
  return crypto.randomUUID();
}

/**
 * Resolve the minimum level from LOG_LEVEL, falling back to info.
 */
function resolveLogLevel(value: string | undefined): LogLevel {
  const candidate = (value ?? "info").toLowerCase();
  return isLogLevel(candidate) ? candidate : "info";
}

let configuredLevel: LogLevel | undefined;

/**
 * Set the minimum level for every logger, including ones already created.
 * Pass undefined to go back to reading LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel | undefined): void {
  configuredLevel = level;
}

function currentMinLevel(): number {
  return LOG_LEVELS[configuredLevel ?? resolveLogLevel(process.env.LOG_LEVEL)];
}

export class Logger {
  private context: string;
  private correlationId?: string;
  private transport: LogTransport;

  constructor(context: string, correlationId?: string, transport?: LogTransport) {
    this.context = context;
    this.correlationId = correlationId;
    this.transport = transport ?? defaultTransport;
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>
  ) {
    if (LOG_LEVELS[level] < currentMinLevel()) return;

    const logData = this.correlationId
      ? { ...data, correlation_id: this.correlationId }
      : data;

    this.transport.log(level, this.context, message, logData, this.correlationId);
  }

  debug(message: string, data?: Record<string, unknown>) {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>) {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>) {
    this.log("error", message, data);
  }
}

/**
 * Create a logger bound to a correlation ID, if one is known.
 *
 * @param context - Logger context (e.g., "profile-enricher")
 * @param correlationId - Optional correlation ID
 */
export function createLoggerWithCorrelationId(
  context: string,
  correlationId?: string | null
): Logger {
  return new Logger(context, correlationId ?? undefined);
}
