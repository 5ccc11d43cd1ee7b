/**
 * apexcov - Apex test coverage scanning, test generation and PR reporting
 *
 * @packageDocumentation
 */

// Core: scanner and gate
export {
  VERSION,
  CoverageScanner,
  createScanner,
  scanCoverage,
  buildCoverageReport,
  coveragePercentage,
  evaluateGate,
  summarizeCoverage,
  DEFAULT_TEST_SUFFIX,
  DEFAULT_EXTENSION,
  DEFAULT_GATE_OPTIONS,
} from "./core/index.js";

export type {
  ScannerOptions,
  SourceUnit,
  UnitCoverage,
  CoverageReport,
  GateOptions,
  GateResult,
  GateState,
} from "./core/index.js";

// Library utilities
export {
  // Errors
  ApexCovError,
  NotFoundError,
  AccessDeniedError,
  GenerationError,
  WriteError,
  ConfigError,
  ReportingError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  tryCatchAsync,
  // Logger
  logger,
} from "./lib/index.js";

export type { Result, LogLevel, ScanError } from "./lib/index.js";

// Test generation
export {
  createAITestGenerator,
  dispatchTestGeneration,
  renderClassMetadata,
  DEFAULT_API_VERSION,
} from "./testgen/index.js";

export type {
  GenerationRequest,
  GenerationOutcome,
  TestGenerator,
  DispatchOptions,
  DispatchSummary,
  UnitOutcome,
} from "./testgen/index.js";

// AI
export { AIService, createAIService } from "./ai/index.js";

export type { AIConfig, AIProvider, AIResponse } from "./ai/index.js";

// GitHub reporting
export {
  createReportingApi,
  publishReport,
  upsertCoverageComment,
  setCoverageStatus,
  DEFAULT_COMMENT_MARKER,
  DEFAULT_STATUS_CONTEXT,
} from "./github/index.js";

export type { ReportingApi, ReportTarget, ReportPayload } from "./github/index.js";

// Formatters
export {
  formatCoverage,
  formatCoverageMarkdown,
  formatScanFailure,
  type OutputFormat,
} from "./cli/formatters.js";
