/**
 * Core analysis engine
 *
 * This module contains:
 * - scanner/ - Source tree walk and coverage report
 * - gate/    - Pass/fail evaluation of a report
 */

export const VERSION = "0.1.0";

// Scanner module
export {
  CoverageScanner,
  createScanner,
  scanCoverage,
  buildCoverageReport,
  coveragePercentage,
  comparePaths,
  DEFAULT_TEST_SUFFIX,
  DEFAULT_EXTENSION,
  type ScannerOptions,
  type SourceUnit,
  type UnitCoverage,
  type CoverageReport,
} from "./scanner/index.js";

// Gate module
export {
  evaluateGate,
  summarizeCoverage,
  DEFAULT_GATE_OPTIONS,
  type GateOptions,
  type GateResult,
  type GateState,
} from "./gate/index.js";
