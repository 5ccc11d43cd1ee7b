/**
 * Coverage scanner module
 */

export {
  CoverageScanner,
  createScanner,
  scanCoverage,
  buildCoverageReport,
  coveragePercentage,
  comparePaths,
} from "./scanner.js";

export {
  DEFAULT_TEST_SUFFIX,
  DEFAULT_EXTENSION,
  type ScannerOptions,
  type SourceUnit,
  type UnitCoverage,
  type CoverageReport,
} from "./types.js";
