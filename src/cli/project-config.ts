/**
 * Project configuration (.apexcov.yml)
 *
 * Precedence: command-line flag > project file > built-in default.
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { dirname, resolve } from "path";

import { load as loadYaml } from "js-yaml";
import { z } from "zod";

import { AI_PROVIDERS } from "../ai/types.js";
import { DEFAULT_GATE_OPTIONS } from "../core/gate/gate.js";
import { DEFAULT_EXTENSION, DEFAULT_TEST_SUFFIX } from "../core/scanner/types.js";
import { DEFAULT_COMMENT_MARKER } from "../github/comment.js";
import { DEFAULT_STATUS_CONTEXT } from "../github/status.js";
import { ConfigError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";
import { MAX_TIMEOUT_MS } from "../lib/timeout.js";
import { DEFAULT_API_VERSION } from "../testgen/metadata.js";

import type { AIProvider } from "../ai/types.js";
import type { Result } from "../lib/result.js";

export const PROJECT_CONFIG_FILE = ".apexcov.yml";

export const ProjectConfigSchema = z
  .object({
    sourceDir: z.string().min(1),
    testSuffix: z.string().min(1),
    extension: z.string().regex(/^\.[^./\\]+$/, "must look like .cls"),
    excludeDirs: z.array(z.string().min(1)),
    threshold: z.number().min(0).max(100),
    requireAllCovered: z.boolean(),
    apiVersion: z.string().regex(/^\d+\.0$/, "must look like 59.0"),
    concurrency: z.number().int().min(1).max(16),
    timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
    provider: z.enum(["anthropic", "openai", "mock"]),
    model: z.string().min(1),
    commentMarker: z.string().min(1),
    statusContext: z.string().min(1),
  })
  .strict()
  .partial();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Fully resolved settings used by every command
 */
export interface Settings {
  sourceDir: string;
  testSuffix: string;
  extension: string;
  excludeDirs: string[];
  threshold: number;
  requireAllCovered: boolean;
  apiVersion: string;
  concurrency: number;
  timeoutMs: number;
  provider: AIProvider;
  model: string | undefined;
  commentMarker: string;
  statusContext: string;
}

export const DEFAULT_SETTINGS: Settings = {
  sourceDir: ".",
  testSuffix: DEFAULT_TEST_SUFFIX,
  extension: DEFAULT_EXTENSION,
  excludeDirs: [],
  threshold: DEFAULT_GATE_OPTIONS.threshold,
  requireAllCovered: DEFAULT_GATE_OPTIONS.requireAllCovered,
  apiVersion: DEFAULT_API_VERSION,
  concurrency: 1,
  timeoutMs: 60000,
  provider: "anthropic",
  model: undefined,
  commentMarker: DEFAULT_COMMENT_MARKER,
  statusContext: DEFAULT_STATUS_CONTEXT,
};

export interface LoadedProjectConfig {
  config: ProjectConfig;
  /** File the config came from, if any */
  path: string | undefined;
}

/**
 * Parse and validate YAML text
 */
export function parseProjectConfig(content: string, source: string): Result<ProjectConfig, ConfigError> {
  let raw: unknown;
  try {
    raw = loadYaml(content);
  } catch (error) {
    return err(new ConfigError(`Invalid YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`));
  }

  if (raw === undefined || raw === null) {
    return ok({});
  }

  const parsed = ProjectConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    return err(new ConfigError(`Invalid config in ${source}: ${issues.join("; ")}`, { issues }));
  }
  return ok(parsed.data);
}

/**
 * Load `.apexcov.yml` from `explicitPath`, or from the working directory when
 * present. `sourceDir` is resolved against the file's directory.
 */
export async function loadProjectConfig(
  explicitPath: string | undefined,
  cwd: string = process.cwd()
): Promise<Result<LoadedProjectConfig, ConfigError>> {
  const path = resolve(cwd, explicitPath ?? PROJECT_CONFIG_FILE);

  if (!existsSync(path)) {
    if (explicitPath !== undefined) {
      return err(new ConfigError(`Config file not found: ${path}`));
    }
    return ok({ config: {}, path: undefined });
  }

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    return err(new ConfigError(`Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`));
  }

  const parsed = parseProjectConfig(content, path);
  if (!parsed.success) {
    return parsed;
  }

  const config = parsed.data;
  if (config.sourceDir !== undefined) {
    config.sourceDir = resolve(dirname(path), config.sourceDir);
  }
  return ok({ config, path });
}

/**
 * Merge flag overrides over the project file over defaults.
 * Undefined overrides fall through.
 */
export function resolveSettings(
  project: ProjectConfig,
  overrides: Partial<Settings> = {},
  d: Settings = DEFAULT_SETTINGS
): Settings {
  return {
    sourceDir: overrides.sourceDir ?? project.sourceDir ?? d.sourceDir,
    testSuffix: overrides.testSuffix ?? project.testSuffix ?? d.testSuffix,
    extension: overrides.extension ?? project.extension ?? d.extension,
    excludeDirs: overrides.excludeDirs ?? project.excludeDirs ?? d.excludeDirs,
    threshold: overrides.threshold ?? project.threshold ?? d.threshold,
    requireAllCovered: overrides.requireAllCovered ?? project.requireAllCovered ?? d.requireAllCovered,
    apiVersion: overrides.apiVersion ?? project.apiVersion ?? d.apiVersion,
    concurrency: overrides.concurrency ?? project.concurrency ?? d.concurrency,
    timeoutMs: overrides.timeoutMs ?? project.timeoutMs ?? d.timeoutMs,
    provider: overrides.provider ?? project.provider ?? d.provider,
    model: overrides.model ?? project.model ?? d.model,
    commentMarker: overrides.commentMarker ?? project.commentMarker ?? d.commentMarker,
    statusContext: overrides.statusContext ?? project.statusContext ?? d.statusContext,
  };
}

export function isProvider(value: string): value is AIProvider {
  return AI_PROVIDERS.some((p) => p === value);
}

