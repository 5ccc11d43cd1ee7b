/**
 * Scan command - report which Apex classes have a co-located test class
 */

import { logger } from "../../lib/index.js";
import {
  formatCoverage,
  formatError,
  isValidOutputFormat,
  OUTPUT_FORMATS,
} from "../formatters.js";
import {
  EXIT,
  configureLogging,
  loadSettings,
  parseList,
  parseNumber,
  scanAndGate,
  startSpinner,
} from "../shared.js";

import type { CommonOptions } from "../shared.js";
import type { Command } from "commander";

interface ScanCommandOptions extends CommonOptions {
  output: string;
  suffix?: string;
  extension?: string;
  exclude?: string;
  threshold?: string;
  allowUncovered?: boolean;
  fail?: boolean;
}

export function registerScanCommand(program: Command): void {
  program
    .command("scan [path]")
    .description("Report Apex classes without a co-located test class")
    .option("-o, --output <format>", `Output format: ${OUTPUT_FORMATS.join(", ")}`, "terminal")
    .option("--suffix <suffix>", "Test class name suffix (default: Test)")
    .option("--extension <ext>", "Source file extension (default: .cls)")
    .option("--exclude <dirs>", "Comma-separated directory names to skip")
    .option("--threshold <percent>", "Minimum coverage percentage for the gate")
    .option("--allow-uncovered", "Do not fail the gate for individual uncovered classes")
    .option("--fail", "Exit 1 when the coverage gate fails")
    .option("--config <path>", "Path to .apexcov.yml")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (path: string | undefined, options: ScanCommandOptions) => {
      configureLogging(options);

      const format = options.output;
      if (!isValidOutputFormat(format)) {
        console.error(formatError(new Error(`Invalid output format: ${format}`)));
        console.error(`Valid formats: ${OUTPUT_FORMATS.join(", ")}`);
        process.exit(EXIT.ERROR);
      }

      const threshold = parseNumber(options.threshold, "threshold", { min: 0, max: 100 });
      if (!threshold.success) {
        console.error(formatError(threshold.error));
        process.exit(EXIT.ERROR);
      }

      const settings = await loadSettings(path, options, {
        testSuffix: options.suffix,
        extension: options.extension,
        excludeDirs: parseList(options.exclude),
        threshold: threshold.data,
        ...(options.allowUncovered === true && { requireAllCovered: false }),
      });
      if (!settings.success) {
        console.error(formatError(settings.error));
        process.exit(EXIT.ERROR);
      }

      const spinner = startSpinner(`Scanning ${settings.data.sourceDir}...`, format === "terminal");
      const result = await scanAndGate(settings.data);
      if (!result.success) {
        spinner?.fail("Scan failed");
        console.error(formatError(result.error));
        process.exit(EXIT.ERROR);
      }
      spinner?.stop();

      const { report, gate } = result.data;
      logger.debug(`Scanned ${report.total} classes, ${report.covered} covered`);
      console.log(formatCoverage(report, format, { gate, marker: settings.data.commentMarker }));

      if (options.fail && gate.state === "fail") {
        process.exit(EXIT.FAILED);
      }
    });
}
