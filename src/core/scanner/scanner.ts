/**
 * Coverage Scanner - pairs Apex classes with their co-located test classes
 *
 * A class `Foo.cls` counts as covered when `FooTest.cls` sits in the same
 * directory. Matching is exact and case-sensitive; a test anywhere else in
 * the tree does not count.
 *
 * @example
 * ```typescript
 * const result = await scanCoverage("force-app/main/default");
 * if (result.success) {
 *   console.log(`${result.data.covered}/${result.data.total} classes covered`);
 * }
 * ```
 */

import { readdir, stat } from "fs/promises";
import type { Dirent } from "fs";
import { join, relative, resolve, sep } from "path";

import { AccessDeniedError, ConfigError, NotFoundError, errorCode, errorMessage } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ok, err } from "../../lib/result.js";

import { DEFAULT_EXTENSION, DEFAULT_TEST_SUFFIX } from "./types.js";

import type {
  CoverageReport,
  ScannerOptions,
  SourceUnit,
  UnitCoverage,
} from "./types.js";
import type { ScanError } from "../../lib/errors.js";
import type { Result } from "../../lib/result.js";

const DEFAULT_OPTIONS: ScannerOptions = {
  testSuffix: DEFAULT_TEST_SUFFIX,
  extension: DEFAULT_EXTENSION,
  excludeDirs: [],
};

/**
 * Regular files of one directory, keyed by name
 */
interface DirectoryListing {
  directory: string;
  files: Set<string>;
}

/**
 * Code-unit order, independent of locale
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Integer percentage with truncating division; null when there is nothing to divide by
 */
export function coveragePercentage(covered: number, total: number): number | null {
  if (total === 0) {
    return null;
  }
  return Math.floor((covered * 100) / total);
}

/**
 * Build a report whose counts are all derived from the unit list
 */
export function buildCoverageReport(
  rootDirectory: string,
  units: UnitCoverage[],
  options: Pick<ScannerOptions, "testSuffix" | "extension"> = DEFAULT_OPTIONS
): CoverageReport {
  const ordered = [...units].sort((a, b) => comparePaths(a.unit.path, b.unit.path));
  const uncovered = ordered.filter((u) => !u.covered).map((u) => u.unit);
  const total = ordered.length;
  const covered = total - uncovered.length;

  return {
    rootDirectory,
    testSuffix: options.testSuffix,
    extension: options.extension,
    units: ordered,
    total,
    covered,
    uncovered,
    percentage: coveragePercentage(covered, total),
  };
}

/**
 * Scanner class - read-only walk over a source tree
 */
export class CoverageScanner {
  private readonly options: ScannerOptions;
  private readonly log = logger.child("Scanner");

  constructor(options: Partial<ScannerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };

    if (this.options.testSuffix.length === 0) {
      throw new ConfigError("Test suffix must not be empty");
    }
    if (!this.options.extension.startsWith(".") || this.options.extension.length < 2) {
      throw new ConfigError(`Invalid extension: "${this.options.extension}" (expected e.g. ".cls")`);
    }
  }

  getOptions(): Readonly<ScannerOptions> {
    return this.options;
  }

  /**
   * Scan a directory tree and produce a coverage report.
   *
   * Fails as a whole when the root is missing or any directory in the tree
   * cannot be listed; no partial report is returned.
   */
  async scan(rootDirectory: string): Promise<Result<CoverageReport, ScanError>> {
    const root = resolve(rootDirectory);
    this.log.debug(`Scanning ${root}`);

    try {
      const rootStat = await stat(root);
      if (!rootStat.isDirectory()) {
        return err(new NotFoundError(root, { reason: "not a directory" }));
      }
    } catch (error) {
      const code = errorCode(error);
      if (code === "EACCES" || code === "EPERM") {
        return err(new AccessDeniedError(root, errorMessage(error), { code }));
      }
      return err(new NotFoundError(root, { code }));
    }

    const listings: DirectoryListing[] = [];
    const walkResult = await this.walk(root, listings);
    if (!walkResult.success) {
      return walkResult;
    }

    const units: UnitCoverage[] = [];
    for (const listing of listings) {
      units.push(...this.classify(root, listing));
    }

    const report = buildCoverageReport(root, units, this.options);
    this.log.debug(`Found ${report.total} classes, ${report.covered} covered`);
    return ok(report);
  }

  /**
   * Depth-first walk. Symbolic links are neither followed nor counted:
   * a Dirent for a link reports neither isFile() nor isDirectory().
   */
  private async walk(
    directory: string,
    listings: DirectoryListing[]
  ): Promise<Result<void, AccessDeniedError>> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      return err(new AccessDeniedError(directory, errorMessage(error), { code: errorCode(error) }));
    }

    const files = new Set<string>();
    const subdirectories: string[] = [];

    for (const entry of entries) {
      if (entry.isFile()) {
        files.add(entry.name);
      } else if (entry.isDirectory() && !this.options.excludeDirs.includes(entry.name)) {
        subdirectories.push(join(directory, entry.name));
      }
    }

    listings.push({ directory, files });

    subdirectories.sort(comparePaths);
    for (const subdirectory of subdirectories) {
      const result = await this.walk(subdirectory, listings);
      if (!result.success) {
        return result;
      }
    }

    return ok(undefined);
  }

  private classify(root: string, listing: DirectoryListing): UnitCoverage[] {
    const { testSuffix, extension } = this.options;
    const units: UnitCoverage[] = [];

    for (const fileName of listing.files) {
      if (!fileName.endsWith(extension)) {
        continue;
      }
      const name = fileName.slice(0, -extension.length);
      if (name.length === 0 || name.endsWith(testSuffix)) {
        continue;
      }

      const testFileName = `${name}${testSuffix}${extension}`;
      const path = join(listing.directory, fileName);
      const unit: SourceUnit = {
        name,
        path,
        relativePath: relative(root, path).split(sep).join("/"),
        directory: listing.directory,
        testPath: join(listing.directory, testFileName),
      };

      units.push({ unit, covered: listing.files.has(testFileName) });
    }

    return units;
  }
}

/**
 * Create a scanner instance
 */
export function createScanner(options?: Partial<ScannerOptions>): CoverageScanner {
  return new CoverageScanner(options);
}

/**
 * Scan a tree with a one-off scanner
 */
export async function scanCoverage(
  rootDirectory: string,
  options?: Partial<ScannerOptions>
): Promise<Result<CoverageReport, ScanError>> {
  return createScanner(options).scan(rootDirectory);
}
