/**
 * Test-generation dispatch
 *
 * For each uncovered class in a coverage report, asks a TestGenerator for a
 * test class and writes it beside the class with its `-meta.xml` sidecar.
 *
 * - Units are independent: each one reads its own class and writes its own
 *   co-located test path, so batches run in parallel.
 * - A failed unit leaves nothing behind, so a later scan still reports it
 *   uncovered.
 * - An abort signal stops dispatch between units; in-flight units finish.
 */

import { link, readFile, rm, unlink, writeFile } from "fs/promises";
import { basename, join } from "path";

import { GenerationError, WriteError, errorCode, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { boundedTimeout } from "../lib/timeout.js";

import { DEFAULT_API_VERSION, renderClassMetadata, sidecarPath } from "./metadata.js";

import type { CoverageReport, SourceUnit } from "../core/scanner/types.js";
import type { GenerationOutcome, GenerationRequest, TestGenerator } from "./generator.js";

// =============================================================================
// TYPES
// =============================================================================

export interface DispatchOptions {
  /** API version written to each sidecar */
  apiVersion: string;
  /** Units generated in parallel per batch */
  concurrency: number;
  /** Per-unit bound on the generator call */
  timeoutMs: number;
  /** Stops dispatch before the next batch starts */
  signal?: AbortSignal;
  /** List the targets without calling the generator or writing files */
  dryRun: boolean;
  onUnitStart?: (unit: SourceUnit, index: number, total: number) => void;
  onUnitComplete?: (outcome: UnitOutcome) => void;
}

export type UnitOutcome =
  | { status: "generated"; unit: SourceUnit; testPath: string; metadataPath: string }
  | { status: "failed"; unit: SourceUnit; error: GenerationError | WriteError }
  | { status: "skipped"; unit: SourceUnit; reason: "aborted" | "dry-run" };

export interface DispatchSummary {
  /** One outcome per uncovered unit, in report order */
  outcomes: UnitOutcome[];
  generated: number;
  failed: number;
  skipped: number;
  /** Whether the abort signal cut the batch short */
  aborted: boolean;
}

const DEFAULT_OPTIONS: DispatchOptions = {
  apiVersion: DEFAULT_API_VERSION,
  concurrency: 1,
  timeoutMs: 60000,
  dryRun: false,
};

const log = logger.child("Dispatch");

// =============================================================================
// DISPATCH
// =============================================================================

export function testClassName(unit: SourceUnit, report: Pick<CoverageReport, "testSuffix">): string {
  return `${unit.name}${report.testSuffix}`;
}

export async function dispatchTestGeneration(
  report: CoverageReport,
  generator: TestGenerator,
  options: Partial<DispatchOptions> = {}
): Promise<DispatchSummary> {
  const opts: DispatchOptions = { ...DEFAULT_OPTIONS, ...options };
  const units = report.uncovered;
  const batchSize = Math.max(1, Math.floor(opts.concurrency));
  const outcomes: UnitOutcome[] = [];
  let aborted = false;

  for (let i = 0; i < units.length; i += batchSize) {
    const batch = units.slice(i, i + batchSize);

    if (opts.dryRun) {
      outcomes.push(...batch.map((unit): UnitOutcome => ({ status: "skipped", unit, reason: "dry-run" })));
      continue;
    }

    if (opts.signal?.aborted) {
      aborted = true;
      outcomes.push(
        ...units.slice(i).map((unit): UnitOutcome => ({ status: "skipped", unit, reason: "aborted" }))
      );
      log.warn(`Aborted with ${units.length - i} classes remaining`);
      break;
    }

    const batchOutcomes = await Promise.all(
      batch.map(async (unit, offset) => {
        opts.onUnitStart?.(unit, i + offset, units.length);
        const outcome = await generateUnit(unit, report, generator, opts);
        opts.onUnitComplete?.(outcome);
        return outcome;
      })
    );
    outcomes.push(...batchOutcomes);
  }

  return summarize(outcomes, aborted);
}

function summarize(outcomes: UnitOutcome[], aborted: boolean): DispatchSummary {
  return {
    outcomes,
    generated: outcomes.filter((o) => o.status === "generated").length,
    failed: outcomes.filter((o) => o.status === "failed").length,
    skipped: outcomes.filter((o) => o.status === "skipped").length,
    aborted,
  };
}

// =============================================================================
// PER UNIT
// =============================================================================

async function generateUnit(
  unit: SourceUnit,
  report: CoverageReport,
  generator: TestGenerator,
  opts: DispatchOptions
): Promise<UnitOutcome> {
  let source: string;
  try {
    source = await readFile(unit.path, "utf-8");
  } catch (error) {
    return fail(unit, new GenerationError(`Could not read ${unit.relativePath}: ${errorMessage(error)}`, {
      unit: unit.relativePath,
    }));
  }

  const request: GenerationRequest = {
    unit,
    source,
    testClassName: testClassName(unit, report),
    apiVersion: opts.apiVersion,
  };

  let outcome: GenerationOutcome;
  try {
    outcome = await callWithTimeout(generator, request, opts.timeoutMs);
  } catch (error) {
    outcome = { kind: "failure", reason: errorMessage(error) };
  }

  if (outcome.kind === "success" && outcome.content.trim().length === 0) {
    outcome = { kind: "failure", reason: "AI returned an empty response" };
  }

  if (outcome.kind === "failure") {
    return fail(unit, new GenerationError(`Generation failed for ${unit.name}: ${outcome.reason}`, {
      unit: unit.relativePath,
    }));
  }

  const writeError = await writeTestClass(unit, outcome.content, opts.apiVersion);
  if (writeError) {
    return fail(unit, writeError);
  }

  log.debug(`Generated ${basename(unit.testPath)}`);
  return {
    status: "generated",
    unit,
    testPath: unit.testPath,
    metadataPath: sidecarPath(unit.testPath),
  };
}

function fail(unit: SourceUnit, error: GenerationError | WriteError): UnitOutcome {
  log.warn(error.message);
  return { status: "failed", unit, error };
}

/**
 * Resolve with a failure once `timeoutMs` elapses, aborting the generator's signal
 */
async function callWithTimeout(
  generator: TestGenerator,
  request: GenerationRequest,
  timeoutMs: number
): Promise<GenerationOutcome> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<GenerationOutcome>((resolve) => {
    timer = setTimeout(() => {
      // The timeout must settle before the generator sees the abort
      resolve({ kind: "failure", reason: `timed out after ${timeoutMs}ms` });
      controller.abort();
    }, boundedTimeout(timeoutMs));
  });

  try {
    return await Promise.race([generator(request, controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Write the test class through a temporary sibling, then its sidecar.
 * Neither file replaces one already on disk. On failure only the files
 * this unit created are removed.
 */
async function writeTestClass(
  unit: SourceUnit,
  content: string,
  apiVersion: string
): Promise<WriteError | undefined> {
  const testName = basename(unit.testPath);
  const metadataPath = sidecarPath(unit.testPath);
  const tempPath = join(unit.directory, `.${testName}.${process.pid}.tmp`);
  const body = content.endsWith("\n") ? content : `${content}\n`;

  const created: string[] = [];
  try {
    await writeFile(tempPath, body, "utf-8");
    // link fails with EEXIST instead of replacing a test class written since the scan
    await link(tempPath, unit.testPath);
    created.push(unit.testPath);
    await unlink(tempPath);
    await writeFile(metadataPath, renderClassMetadata(apiVersion), { encoding: "utf-8", flag: "wx" });
    return undefined;
  } catch (error) {
    await Promise.allSettled([rm(tempPath, { force: true }), ...created.map((path) => rm(path, { force: true }))]);
    if (errorCode(error) === "EEXIST") {
      const existing = created.length === 0 ? unit.testPath : metadataPath;
      return new WriteError(`${basename(existing)} already exists`, { path: existing });
    }
    return new WriteError(`Could not write ${testName}: ${errorMessage(error)}`, {
      path: unit.testPath,
    });
  }
}
