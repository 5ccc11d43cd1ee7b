/**
 * Shared CLI utilities
 */

import { resolve } from "path";

import ora from "ora";

import { evaluateGate } from "../core/gate/gate.js";
import { createScanner } from "../core/scanner/scanner.js";
import { ConfigError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";

import { DEFAULT_SETTINGS, loadProjectConfig, resolveSettings } from "./project-config.js";

import type { Settings } from "./project-config.js";
import type { GateResult } from "../core/gate/gate.js";
import type { CoverageScanner } from "../core/scanner/scanner.js";
import type { CoverageReport } from "../core/scanner/types.js";
import type { ScanError } from "../lib/errors.js";
import type { Result } from "../lib/result.js";
import type { Ora } from "ora";

/**
 * Process exit codes
 */
export const EXIT = {
  OK: 0,
  /** Gate failed, or nothing could be generated */
  FAILED: 1,
  /** Scan, configuration or reporting error: no report was produced */
  ERROR: 2,
} as const;

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export function configureLogging(options: CommonOptions): void {
  if (options.quiet) {
    logger.configure({ level: "error" });
  } else if (options.verbose) {
    logger.configure({ level: "debug" });
  }
}

/**
 * Spinner on stderr, only for interactive terminal output
 */
export function startSpinner(text: string, enabled: boolean): Ora | null {
  if (!enabled || !process.stderr.isTTY || logger.getLevel() === "error") {
    return null;
  }
  return ora({ text, stream: process.stderr }).start();
}

export function parseNumber(
  value: string | undefined,
  name: string,
  constraint: { min?: number; max?: number; integer?: boolean } = {}
): Result<number | undefined, ConfigError> {
  if (value === undefined) {
    return ok(undefined);
  }
  const n = Number(value);
  const { min, max, integer } = constraint;
  if (
    value.trim() === "" ||
    !Number.isFinite(n) ||
    (integer === true && !Number.isInteger(n)) ||
    (min !== undefined && n < min) ||
    (max !== undefined && n > max)
  ) {
    const range = [min !== undefined ? `>= ${min}` : "", max !== undefined ? `<= ${max}` : ""].filter(Boolean).join(" and ");
    return err(new ConfigError(`Invalid ${name}: "${value}"${range ? ` (expected a ${integer ? "whole " : ""}number ${range})` : ""}`));
  }
  return ok(n);
}

export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.split(",").map((s) => s.trim()).filter(Boolean);
}

/**
 * Load the project config and merge flag overrides over it.
 * A positional path overrides `sourceDir`.
 */
export async function loadSettings(
  targetPath: string | undefined,
  options: CommonOptions,
  overrides: Partial<Settings>,
  defaults: Settings = DEFAULT_SETTINGS
): Promise<Result<Settings, ConfigError>> {
  const loaded = await loadProjectConfig(options.config);
  if (!loaded.success) {
    return loaded;
  }
  if (loaded.data.path) {
    logger.debug(`Using config ${loaded.data.path}`);
  }

  const settings = resolveSettings(loaded.data.config, {
    ...overrides,
    ...(targetPath !== undefined && { sourceDir: targetPath }),
  }, defaults);
  return ok({ ...settings, sourceDir: resolve(settings.sourceDir) });
}

/**
 * Scan the configured source tree and evaluate the gate
 */
export async function scanAndGate(
  settings: Settings
): Promise<Result<{ report: CoverageReport; gate: GateResult }, ScanError | ConfigError>> {
  let scanner: CoverageScanner;
  try {
    scanner = createScanner({
      testSuffix: settings.testSuffix,
      extension: settings.extension,
      excludeDirs: settings.excludeDirs,
    });
  } catch (error) {
    return err(error instanceof ConfigError ? error : new ConfigError(errorMessage(error)));
  }

  const scanned = await scanner.scan(settings.sourceDir);
  if (!scanned.success) {
    return scanned;
  }
  const gate = evaluateGate(scanned.data, {
    threshold: settings.threshold,
    requireAllCovered: settings.requireAllCovered,
  });
  return ok({ report: scanned.data, gate });
}
