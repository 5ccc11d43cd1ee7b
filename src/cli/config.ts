/**
 * User configuration
 *
 * Persists AI provider API keys in the user's home directory with
 * owner-only file permissions. Environment variables take precedence.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync, chmodSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import { z } from "zod";

import { logger } from "../lib/logger.js";

export type KeyedProvider = "anthropic" | "openai";

const UserConfigSchema = z.object({
  anthropicApiKey: z.string().optional(),
  openaiApiKey: z.string().optional(),
  defaultProvider: z.enum(["anthropic", "openai", "mock"]).optional(),
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

/**
 * Overridable so tests never touch the real home directory
 */
export function getConfigDir(): string {
  return process.env["APEXCOV_CONFIG_DIR"] ?? join(homedir(), ".apexcov");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

/**
 * Load configuration from disk. A missing or unreadable file yields `{}`.
 */
export function loadUserConfig(): UserConfig {
  const path = getConfigPath();
  if (!existsSync(path)) {
    return {};
  }
  try {
    const parsed = JSON.parse(readFileSync(path, "utf-8")) as unknown;
    const result = UserConfigSchema.safeParse(parsed);
    if (result.success) {
      return result.data;
    }
    logger.warn(`Ignoring invalid user config at ${path}`);
    return {};
  } catch (error) {
    logger.warn(`Could not read user config at ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}

export function saveUserConfig(config: UserConfig): void {
  ensureConfigDir();
  const path = getConfigPath();
  writeFileSync(path, JSON.stringify(config, null, 2), { mode: 0o600 });
  chmodSync(path, 0o600);
}

export function setConfigValue<K extends keyof UserConfig>(key: K, value: UserConfig[K]): void {
  const config = loadUserConfig();
  config[key] = value;
  saveUserConfig(config);
}

export function deleteConfigValue(key: keyof UserConfig): void {
  const config = loadUserConfig();
  delete config[key];
  saveUserConfig(config);
}

/**
 * Get API key (from environment or config file)
 */
export function getApiKey(provider: KeyedProvider): string | undefined {
  const envVar = provider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY";
  const envValue = process.env[envVar];
  if (envValue !== undefined && envValue.length > 0) {
    return envValue;
  }

  const config = loadUserConfig();
  return provider === "anthropic" ? config.anthropicApiKey : config.openaiApiKey;
}

export function hasApiKey(provider: KeyedProvider): boolean {
  const key = getApiKey(provider);
  return key !== undefined && key.length > 0;
}

/**
 * Mask API key for display (show first/last 4 chars)
 */
export function maskApiKey(key: string): string {
  if (key.length <= 12) {
    return "****";
  }
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}
