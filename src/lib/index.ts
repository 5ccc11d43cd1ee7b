// Error classes
export {
  ApexCovError,
  NotFoundError,
  AccessDeniedError,
  GenerationError,
  WriteError,
  ConfigError,
  ReportingError,
  errorMessage,
  errorCode,
} from "./errors.js";
export type { ScanError } from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

// Timers
export { MAX_TIMEOUT_MS, boundedTimeout } from "./timeout.js";

// Logger
export { logger } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";
