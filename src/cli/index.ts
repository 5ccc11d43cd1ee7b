#!/usr/bin/env node
/**
 * apexcov CLI entry point
 *
 * Commands:
 * - scan     - Report Apex classes without a co-located test class
 * - generate - Generate test classes for uncovered classes
 * - report   - Post the report to a pull request and set a commit status
 * - config   - Manage AI provider keys
 */

import { Command } from "commander";

import { VERSION } from "../core/index.js";

import { registerConfigCommand } from "./commands/config.js";
import { registerGenerateCommand } from "./commands/generate.js";
import { registerReportCommand } from "./commands/report.js";
import { registerScanCommand } from "./commands/scan.js";

function createProgram(): Command {
  const program = new Command();

  program
    .name("apexcov")
    .description("Apex test coverage: find classes without tests, generate them, report on pull requests")
    .version(VERSION);

  registerScanCommand(program);
  registerGenerateCommand(program);
  registerReportCommand(program);
  registerConfigCommand(program);

  return program;
}

await createProgram().parseAsync();
