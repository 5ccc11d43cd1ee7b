/**
 * Config command - manage AI provider keys in the user config file
 */

import chalk from "chalk";

import {
  deleteConfigValue,
  getConfigPath,
  hasApiKey,
  loadUserConfig,
  maskApiKey,
  setConfigValue,
} from "../config.js";
import { isProvider } from "../project-config.js";
import { EXIT } from "../shared.js";

import type { UserConfig } from "../config.js";
import type { Command } from "commander";

const KEYS: Record<string, keyof UserConfig> = {
  "anthropic-api-key": "anthropicApiKey",
  "openai-api-key": "openaiApiKey",
  "default-provider": "defaultProvider",
};

function resolveKey(key: string): keyof UserConfig {
  const field = KEYS[key];
  if (field === undefined) {
    console.error(chalk.red(`Unknown config key: ${key}`));
    console.error(chalk.gray(`Available keys: ${Object.keys(KEYS).join(", ")}`));
    process.exit(EXIT.FAILED);
  }
  return field;
}

function display(field: keyof UserConfig, value: string | undefined): string {
  if (value === undefined) {
    return chalk.gray(field === "defaultProvider" ? "anthropic (default)" : "(not set)");
  }
  return field === "defaultProvider" ? value : maskApiKey(value);
}

export function registerConfigCommand(program: Command): void {
  const config = program.command("config").description("Manage AI provider configuration");

  config
    .command("set <key> <value>")
    .description("Set a configuration value")
    .addHelpText("after", `
Available keys:
  anthropic-api-key   Anthropic API key
  openai-api-key      OpenAI API key
  default-provider    Default AI provider (anthropic, openai or mock)

Examples:
  apexcov config set anthropic-api-key <key>
  apexcov config set default-provider openai
`)
    .action((key: string, value: string) => {
      const field = resolveKey(key);

      if (field === "defaultProvider") {
        if (!isProvider(value)) {
          console.error(chalk.red("Provider must be 'anthropic', 'openai' or 'mock'"));
          process.exit(EXIT.FAILED);
        }
        setConfigValue("defaultProvider", value);
        console.log(chalk.green(`Default provider set to: ${value}`));
      } else {
        if (value.trim().length === 0) {
          console.error(chalk.red("API key must not be empty"));
          process.exit(EXIT.FAILED);
        }
        setConfigValue(field, value);
        console.log(chalk.green(`${key} set: ${maskApiKey(value)}`));
      }
      console.log(chalk.gray(`Config stored at: ${getConfigPath()}`));
    });

  config
    .command("get [key]")
    .description("Show a configuration value, or all of them")
    .action((key: string | undefined) => {
      const cfg = loadUserConfig();

      if (key !== undefined) {
        const field = resolveKey(key);
        console.log(display(field, cfg[field]));
        return;
      }

      console.log(chalk.gray(`Config file: ${getConfigPath()}`));
      for (const [name, field] of Object.entries(KEYS)) {
        console.log(`  ${name.padEnd(18)} ${display(field, cfg[field])}`);
      }
      if (!hasApiKey("anthropic") && !hasApiKey("openai")) {
        console.log();
        console.log(chalk.yellow("No AI provider key configured (environment or config file)."));
      }
    });

  config
    .command("unset <key>")
    .description("Remove a configuration value")
    .action((key: string) => {
      deleteConfigValue(resolveKey(key));
      console.log(chalk.green(`${key} removed`));
    });

  config
    .command("path")
    .description("Print the config file location")
    .action(() => {
      console.log(getConfigPath());
    });
}
