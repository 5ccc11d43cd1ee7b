/**
 * Coverage gate - pass/fail policy applied to a coverage report
 */

import type { CoverageReport } from "../scanner/types.js";

export type GateState = "pass" | "fail" | "empty";

export interface GateOptions {
  /** Minimum percentage required to pass (0-100) */
  threshold: number;
  /** Fail when any class lacks a test, regardless of percentage */
  requireAllCovered: boolean;
}

export interface GateResult {
  state: GateState;
  /** One entry per failing condition; empty unless state is "fail" */
  reasons: string[];
  /** Human summary that always names the total, e.g. "50% (1/2 classes covered)" */
  summary: string;
  threshold: number;
}

/**
 * Policy defaults. Teams tune these through configuration.
 */
export const DEFAULT_GATE_OPTIONS: GateOptions = {
  threshold: 75,
  requireAllCovered: true,
};

export function summarizeCoverage(report: CoverageReport): string {
  if (report.percentage === null) {
    return "No units found";
  }
  const noun = report.total === 1 ? "class" : "classes";
  return `${report.percentage}% (${report.covered}/${report.total} ${noun} covered)`;
}

export function evaluateGate(
  report: CoverageReport,
  options: Partial<GateOptions> = {}
): GateResult {
  const { threshold, requireAllCovered } = { ...DEFAULT_GATE_OPTIONS, ...options };
  const summary = summarizeCoverage(report);

  if (report.percentage === null) {
    return { state: "empty", reasons: [], summary, threshold };
  }

  const reasons: string[] = [];
  if (report.percentage < threshold) {
    reasons.push(`Coverage ${report.percentage}% is below threshold ${threshold}%`);
  }
  if (requireAllCovered && report.uncovered.length > 0) {
    const count = report.uncovered.length;
    reasons.push(`${count} ${count === 1 ? "class has" : "classes have"} no test class`);
  }

  return {
    state: reasons.length > 0 ? "fail" : "pass",
    reasons,
    summary,
    threshold,
  };
}
