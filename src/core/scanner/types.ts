/**
 * Coverage scanner types
 */

/**
 * Reserved suffix that marks a class as a test class
 */
export const DEFAULT_TEST_SUFFIX = "Test";

/**
 * Extension of Apex implementation classes
 */
export const DEFAULT_EXTENSION = ".cls";

export interface ScannerOptions {
  /** Suffix appended to a class name to form its test class name (case-sensitive) */
  testSuffix: string;
  /** Extension of implementation artifacts, including the dot */
  extension: string;
  /** Directory names skipped during traversal */
  excludeDirs: string[];
}

/**
 * One implementation class eligible for test coverage
 */
export interface SourceUnit {
  /** Base name without extension, e.g. `AccountManager` */
  readonly name: string;
  /** Absolute path of the class file */
  readonly path: string;
  /** Path relative to the scan root, `/`-separated */
  readonly relativePath: string;
  /** Absolute directory containing the class */
  readonly directory: string;
  /** Absolute path where the co-located test class is expected */
  readonly testPath: string;
}

export interface UnitCoverage {
  readonly unit: SourceUnit;
  readonly covered: boolean;
}

/**
 * Aggregate over one scan. Build with `buildCoverageReport` so the counts
 * and percentage are always derived from `units`.
 */
export interface CoverageReport {
  readonly rootDirectory: string;
  readonly testSuffix: string;
  readonly extension: string;
  /** Every unit found, ordered by path */
  readonly units: readonly UnitCoverage[];
  readonly total: number;
  readonly covered: number;
  /** Units without a co-located test, in `units` order */
  readonly uncovered: readonly SourceUnit[];
  /** floor(covered * 100 / total), or null when no units were found */
  readonly percentage: number | null;
}
