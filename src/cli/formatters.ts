/**
 * Formatters for coverage reports
 *
 * Terminal, JSON and Markdown renderings of a CoverageReport, plus the
 * failure body used when a scan produced no report.
 */

import { relative } from "path";

import chalk from "chalk";

import type { GateResult } from "../core/gate/gate.js";
import type { CoverageReport } from "../core/scanner/types.js";
import type { ApexCovError } from "../lib/errors.js";
import type { DispatchSummary } from "../testgen/dispatch.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json" | "markdown";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "json", "markdown"];

// =============================================================================
// Terminal
// =============================================================================

export function formatCoverageTerminal(report: CoverageReport, gate?: GateResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`Apex test coverage: ${report.rootDirectory}`));
  lines.push("");

  if (report.percentage === null) {
    lines.push(chalk.yellow(`No units found (no *${report.extension} classes outside *${report.testSuffix}${report.extension})`));
    return lines.join("\n");
  }

  const nameWidth = Math.max(...report.units.map((u) => u.unit.name.length));

  for (const { unit, covered } of report.units) {
    const mark = covered ? chalk.green("✓") : chalk.red("✗");
    lines.push(`  ${mark} ${unit.name.padEnd(nameWidth)}  ${chalk.gray(unit.relativePath)}`);
  }

  lines.push("");
  lines.push(`Total: ${report.total}  Covered: ${report.covered}  Coverage: ${report.percentage}%`);

  if (gate) {
    lines.push(formatGateLine(gate));
    for (const reason of gate.reasons) {
      lines.push(chalk.gray(`  - ${reason}`));
    }
  }

  return lines.join("\n");
}

function formatGateLine(gate: GateResult): string {
  switch (gate.state) {
    case "pass":
      return chalk.green(`Gate: PASS (threshold ${gate.threshold}%)`);
    case "fail":
      return chalk.red(`Gate: FAIL (threshold ${gate.threshold}%)`);
    case "empty":
      return chalk.yellow("Gate: no classes to evaluate");
  }
}

// =============================================================================
// JSON
// =============================================================================

export function formatCoverageJson(report: CoverageReport, gate?: GateResult): string {
  return JSON.stringify(
    {
      root: report.rootDirectory,
      testSuffix: report.testSuffix,
      extension: report.extension,
      total: report.total,
      covered: report.covered,
      percentage: report.percentage,
      units: report.units.map(({ unit, covered }) => ({
        name: unit.name,
        path: unit.relativePath,
        covered,
      })),
      uncovered: report.uncovered.map((unit) => unit.name),
      ...(gate && { gate: { state: gate.state, threshold: gate.threshold, reasons: gate.reasons } }),
    },
    null,
    2
  );
}

// =============================================================================
// Markdown
// =============================================================================

export interface MarkdownOptions {
  /** Hidden marker that identifies the sticky PR comment */
  marker?: string;
  gate?: GateResult;
}

const MARKDOWN_TITLE = "## Apex Test Coverage";

export function formatCoverageMarkdown(report: CoverageReport, options: MarkdownOptions = {}): string {
  const lines: string[] = [];

  if (options.marker) {
    lines.push(options.marker);
  }
  lines.push(MARKDOWN_TITLE);
  lines.push("");

  if (report.percentage === null) {
    lines.push("No units found.");
    lines.push("");
    lines.push(`_No \`*${report.extension}\` classes were found, so no coverage was computed._`);
    return lines.join("\n");
  }

  lines.push("| Class | Covered |");
  lines.push("|-------|---------|");
  for (const { unit, covered } of report.units) {
    lines.push(`| \`${unit.name}\` | ${covered ? "✅" : "❌"} |`);
  }
  lines.push("");
  lines.push(`**Total:** ${report.total} · **Covered:** ${report.covered} · **Coverage:** ${report.percentage}%`);

  const gate = options.gate;
  if (gate && gate.state === "fail") {
    lines.push("");
    lines.push(`❌ **Coverage gate failed** (threshold ${gate.threshold}%)`);
    for (const reason of gate.reasons) {
      lines.push(`- ${reason}`);
    }
  } else if (gate && gate.state === "pass") {
    lines.push("");
    lines.push(`✅ **Coverage gate passed** (threshold ${gate.threshold}%)`);
  }

  if (report.uncovered.length > 0) {
    lines.push("");
    lines.push("<details>");
    lines.push(`<summary>Classes without a test (${report.uncovered.length})</summary>`);
    lines.push("");
    for (const unit of report.uncovered) {
      lines.push(`- \`${unit.relativePath}\` → expected \`${unit.name}${report.testSuffix}${report.extension}\``);
    }
    lines.push("");
    lines.push("</details>");
  }

  return lines.join("\n");
}

/**
 * Body posted when the scan itself failed. Carries no percentage.
 */
export function formatScanFailure(error: ApexCovError, marker?: string): string {
  const lines: string[] = [];
  if (marker) {
    lines.push(marker);
  }
  lines.push(MARKDOWN_TITLE);
  lines.push("");
  lines.push(`⚠️ **Coverage scan failed** (\`${error.code}\`): ${error.message}`);
  lines.push("");
  lines.push("No report was produced.");
  return lines.join("\n");
}

// =============================================================================
// Generation
// =============================================================================

export function formatDispatchSummary(summary: DispatchSummary, basePath: string): string {
  const lines: string[] = [];
  const plural = (n: number): string => (n === 1 ? "" : "es");

  lines.push(chalk.bold(`Generated ${summary.generated} test class${plural(summary.generated)}`));

  for (const outcome of summary.outcomes) {
    switch (outcome.status) {
      case "generated":
        lines.push(`  ${chalk.green("+")} ${relative(basePath, outcome.testPath)}`);
        break;
      case "failed":
        lines.push(`  ${chalk.red("✗")} ${outcome.unit.name} ${chalk.gray(`[${outcome.error.code}] ${outcome.error.message}`)}`);
        break;
      case "skipped":
        lines.push(`  ${chalk.yellow("-")} ${outcome.unit.name} ${chalk.gray(`(${outcome.reason})`)}`);
        break;
    }
  }

  if (summary.failed > 0) {
    lines.push(chalk.red(`${summary.failed} failed`));
  }
  if (summary.aborted) {
    lines.push(chalk.yellow(`Aborted: ${summary.skipped} class${plural(summary.skipped)} not attempted`));
  }

  return lines.join("\n");
}

// =============================================================================
// Dispatch by format
// =============================================================================

export function formatCoverage(
  report: CoverageReport,
  format: OutputFormat,
  options: MarkdownOptions = {}
): string {
  switch (format) {
    case "json":
      return formatCoverageJson(report, options.gate);
    case "markdown":
      return formatCoverageMarkdown(report, options);
    case "terminal":
    default:
      return formatCoverageTerminal(report, options.gate);
  }
}

/**
 * Validate output format string
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === format);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}
