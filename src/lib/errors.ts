/**
 * Base error class for all apexcov errors
 */
export class ApexCovError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ApexCovError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Scan root is missing or is not a directory
 */
export class NotFoundError extends ApexCovError {
  constructor(public readonly path: string, context?: Record<string, unknown>) {
    super(`Directory not found: ${path}`, "NOT_FOUND", { ...context, path });
    this.name = "NotFoundError";
  }
}

/**
 * A directory inside the scanned tree could not be listed
 */
export class AccessDeniedError extends ApexCovError {
  constructor(
    public readonly path: string,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(`Cannot read ${path}: ${reason}`, "ACCESS_DENIED", { ...context, path });
    this.name = "AccessDeniedError";
  }
}

/**
 * AI generation for a single class failed, timed out or came back empty
 */
export class GenerationError extends ApexCovError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "GENERATION_FAILED", context);
    this.name = "GenerationError";
  }
}

/**
 * Writing a generated test class or its sidecar failed
 */
export class WriteError extends ApexCovError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "WRITE_FAILED", context);
    this.name = "WriteError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends ApexCovError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Posting the PR comment or commit status failed
 */
export class ReportingError extends ApexCovError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "REPORTING_ERROR", context);
    this.name = "ReportingError";
  }
}

/**
 * Errors that make a scan fail as a whole
 */
export type ScanError = NotFoundError | AccessDeniedError;

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The `code` of a Node system error (ENOENT, EACCES, ...), if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
