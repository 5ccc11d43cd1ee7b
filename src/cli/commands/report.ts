/**
 * Report command - sticky PR comment plus commit status
 *
 * Target resolution falls back to the GitHub Actions environment:
 * GITHUB_REPOSITORY, GITHUB_SHA and GITHUB_TOKEN.
 */

import {
  commitStateFor,
  createReportingApi,
  parseRepoRef,
  publishReport,
  statusDescription,
} from "../../github/index.js";
import { ConfigError, err, errorMessage, logger, ok } from "../../lib/index.js";
import { formatCoverageMarkdown, formatError, formatScanFailure } from "../formatters.js";
import {
  EXIT,
  configureLogging,
  loadSettings,
  parseNumber,
  scanAndGate,
} from "../shared.js";

import type { CommitState, RepoRef, ReportingApi, ReportTarget } from "../../github/index.js";
import type { Result } from "../../lib/index.js";
import type { CommonOptions } from "../shared.js";
import type { Command } from "commander";

interface ReportCommandOptions extends CommonOptions {
  pr?: string;
  sha?: string;
  repo?: string;
  marker?: string;
  context?: string;
  threshold?: string;
  dryRun?: boolean;
}

export function registerReportCommand(program: Command): void {
  program
    .command("report [path]")
    .description("Post the coverage report as a PR comment and set a commit status")
    .option("--pr <number>", "Pull request number")
    .option("--sha <sha>", "Commit that receives the status (default: $GITHUB_SHA)")
    .option("--repo <owner/name>", "Repository (default: $GITHUB_REPOSITORY)")
    .option("--marker <marker>", "Hidden marker identifying the sticky comment")
    .option("--context <context>", "Commit status context")
    .option("--threshold <percent>", "Minimum coverage percentage for the gate")
    .option("--dry-run", "Print the comment body instead of posting it")
    .option("--config <path>", "Path to .apexcov.yml")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (path: string | undefined, options: ReportCommandOptions) => {
      configureLogging(options);

      const threshold = parseNumber(options.threshold, "threshold", { min: 0, max: 100 });
      if (!threshold.success) {
        console.error(formatError(threshold.error));
        process.exit(EXIT.ERROR);
      }

      const settings = await loadSettings(path, options, {
        threshold: threshold.data,
        commentMarker: options.marker,
        statusContext: options.context,
      });
      if (!settings.success) {
        console.error(formatError(settings.error));
        process.exit(EXIT.ERROR);
      }
      const s = settings.data;

      const scanned = await scanAndGate(s);

      let body: string;
      let state: CommitState;
      let description: string;
      if (scanned.success) {
        const { report, gate } = scanned.data;
        body = formatCoverageMarkdown(report, { marker: s.commentMarker, gate });
        state = commitStateFor(gate);
        description = statusDescription(gate);
      } else {
        logger.error(scanned.error.message);
        body = formatScanFailure(scanned.error, s.commentMarker);
        state = "failure";
        description = `Coverage scan failed: ${scanned.error.code}`;
      }

      if (options.dryRun) {
        console.log(body);
        process.exit(scanned.success ? EXIT.OK : EXIT.ERROR);
      }

      const target = resolveTarget(options);
      if (!target.success) {
        console.error(formatError(target.error));
        process.exit(EXIT.ERROR);
      }

      let api: ReportingApi;
      try {
        api = createReportingApi(process.env["GITHUB_TOKEN"] ?? "");
      } catch (error) {
        console.error(formatError(error instanceof Error ? error : new Error(errorMessage(error))));
        process.exit(EXIT.ERROR);
      }

      const published = await publishReport(api, target.data, {
        body,
        state,
        description,
        marker: s.commentMarker,
        statusContext: s.statusContext,
      });
      if (!published.success) {
        console.error(formatError(published.error));
        process.exit(EXIT.ERROR);
      }

      if (!scanned.success) {
        process.exit(EXIT.ERROR);
      }
      logger.success(`Reported ${scanned.data.gate.summary}`);
    });
}

function resolveTarget(options: ReportCommandOptions): Result<ReportTarget, ConfigError> {
  const repoValue = options.repo ?? process.env["GITHUB_REPOSITORY"];
  if (!repoValue) {
    return err(new ConfigError("Repository unknown. Pass --repo owner/name or set GITHUB_REPOSITORY."));
  }

  let repo: RepoRef;
  try {
    repo = parseRepoRef(repoValue);
  } catch (error) {
    return err(error instanceof ConfigError ? error : new ConfigError(errorMessage(error)));
  }

  const prNumber = parseNumber(options.pr, "pull request number", { min: 1, integer: true });
  if (!prNumber.success) {
    return prNumber;
  }
  if (prNumber.data === undefined) {
    return err(new ConfigError("Pull request unknown. Pass --pr <number>."));
  }

  const sha = options.sha ?? process.env["GITHUB_SHA"];
  if (!sha) {
    return err(new ConfigError("Commit unknown. Pass --sha or set GITHUB_SHA."));
  }

  return ok({ repo, prNumber: prNumber.data, sha });
}
