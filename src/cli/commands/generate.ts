/**
 * Generate command - write Apex test classes for uncovered classes
 *
 * Without --write this is a dry run: the targets are listed and neither the
 * AI provider nor the filesystem is touched.
 */

import { relative } from "path";

import chalk from "chalk";

import { createAIService } from "../../ai/index.js";
import { MAX_TIMEOUT_MS, logger } from "../../lib/index.js";
import { createAITestGenerator, dispatchTestGeneration, testClassName } from "../../testgen/index.js";
import { getApiKey, loadUserConfig } from "../config.js";
import { formatDispatchSummary, formatError } from "../formatters.js";
import { DEFAULT_SETTINGS, isProvider } from "../project-config.js";
import {
  EXIT,
  configureLogging,
  loadSettings,
  parseNumber,
  scanAndGate,
  startSpinner,
} from "../shared.js";

import type { CommonOptions } from "../shared.js";
import type { AIProvider } from "../../ai/index.js";
import type { DispatchSummary } from "../../testgen/index.js";
import type { Command } from "commander";

interface GenerateCommandOptions extends CommonOptions {
  write?: boolean;
  provider?: string;
  model?: string;
  concurrency?: string;
  timeout?: string;
  apiVersion?: string;
  suffix?: string;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate [path]")
    .description("Generate test classes for Apex classes without one")
    .option("--write", "Call the AI provider and write test classes (otherwise a dry run)")
    .option("--provider <provider>", "AI provider: anthropic, openai, mock")
    .option("--model <model>", "Model name (provider default otherwise)")
    .option("--concurrency <n>", "Classes generated in parallel")
    .option("--timeout <ms>", "Per-class generation timeout in milliseconds")
    .option("--api-version <version>", "API version written to -meta.xml sidecars")
    .option("--suffix <suffix>", "Test class name suffix (default: Test)")
    .option("--config <path>", "Path to .apexcov.yml")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (path: string | undefined, options: GenerateCommandOptions) => {
      configureLogging(options);

      let provider: AIProvider | undefined;
      if (options.provider !== undefined) {
        if (!isProvider(options.provider)) {
          console.error(formatError(new Error(`Invalid provider: ${options.provider}`)));
          process.exit(EXIT.ERROR);
        }
        provider = options.provider;
      }

      const concurrency = parseNumber(options.concurrency, "concurrency", { min: 1, max: 16, integer: true });
      if (!concurrency.success) {
        console.error(formatError(concurrency.error));
        process.exit(EXIT.ERROR);
      }
      const timeout = parseNumber(options.timeout, "timeout", { min: 1, max: MAX_TIMEOUT_MS, integer: true });
      if (!timeout.success) {
        console.error(formatError(timeout.error));
        process.exit(EXIT.ERROR);
      }

      const userDefault = loadUserConfig().defaultProvider;
      const settings = await loadSettings(
        path,
        options,
        {
          testSuffix: options.suffix,
          provider,
          model: options.model,
          concurrency: concurrency.data,
          timeoutMs: timeout.data,
          apiVersion: options.apiVersion,
        },
        { ...DEFAULT_SETTINGS, provider: userDefault ?? DEFAULT_SETTINGS.provider }
      );
      if (!settings.success) {
        console.error(formatError(settings.error));
        process.exit(EXIT.ERROR);
      }
      const s = settings.data;

      const spinner = startSpinner(`Scanning ${s.sourceDir}...`, true);
      const scanned = await scanAndGate(s);
      if (!scanned.success) {
        spinner?.fail("Scan failed");
        console.error(formatError(scanned.error));
        process.exit(EXIT.ERROR);
      }
      const { report } = scanned.data;

      if (report.uncovered.length === 0) {
        const message = report.total === 0 ? "No Apex classes found" : "Every class has a test class";
        if (spinner) {
          spinner.succeed(message);
        } else {
          logger.success(message);
        }
        return;
      }

      if (!options.write) {
        spinner?.stop();
        console.log(chalk.bold(`${report.uncovered.length} test class(es) would be generated:`));
        for (const unit of report.uncovered) {
          console.log(`  ${chalk.cyan(testClassName(unit, report))}  ${chalk.gray(relative(s.sourceDir, unit.testPath))}`);
        }
        console.log(chalk.gray("\nRe-run with --write to generate them."));
        return;
      }

      const service = createAIService({
        provider: s.provider,
        model: s.model,
        timeoutMs: s.timeoutMs,
        apiKey: s.provider === "mock" ? undefined : getApiKey(s.provider),
      });
      if (!service.isConfigured()) {
        spinner?.fail("No API key configured");
        console.error(formatError(new Error(
          `No API key for ${s.provider}. Set the environment variable or run \`apexcov config set ${s.provider}-api-key <key>\`.`
        )));
        process.exit(EXIT.ERROR);
      }
      logger.debug(`Using ${service.getProvider()} (${service.getModel()})`);

      const controller = new AbortController();
      const onSigint = (): void => {
        logger.warn("Interrupted: finishing in-flight classes, skipping the rest");
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      let summary: DispatchSummary;
      try {
        summary = await dispatchTestGeneration(report, createAITestGenerator(service), {
          apiVersion: s.apiVersion,
          concurrency: s.concurrency,
          timeoutMs: s.timeoutMs,
          signal: controller.signal,
          dryRun: false,
          onUnitStart: (unit, index, total) => {
            if (spinner) {
              spinner.text = `Generating ${index + 1}/${total}: ${testClassName(unit, report)}`;
            }
          },
        });
      } finally {
        process.removeListener("SIGINT", onSigint);
      }
      spinner?.stop();

      console.log(formatDispatchSummary(summary, s.sourceDir));

      const attempted = summary.generated + summary.failed;
      if (attempted > 0 && summary.generated === 0) {
        process.exit(EXIT.FAILED);
      }
    });
}
