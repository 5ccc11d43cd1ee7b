import type { RepoRef, ReportingApi } from "./client.js";
import type { GateResult } from "../core/gate/gate.js";

export const DEFAULT_STATUS_CONTEXT = "apexcov/coverage";

/** GitHub rejects longer status descriptions */
const MAX_DESCRIPTION_LENGTH = 140;

export type CommitState = "success" | "failure" | "error";

export function commitStateFor(gate: GateResult): CommitState {
  return gate.state === "fail" ? "failure" : "success";
}

export function statusDescription(gate: GateResult): string {
  const text = gate.state === "empty" ? "No Apex classes found" : gate.summary;
  return truncate(text, MAX_DESCRIPTION_LENGTH);
}

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`;
}

export async function setCoverageStatus(
  api: ReportingApi,
  repo: RepoRef,
  sha: string,
  state: CommitState,
  description: string,
  context: string = DEFAULT_STATUS_CONTEXT
): Promise<void> {
  await api.repos.createCommitStatus({
    ...repo,
    sha,
    state,
    description: truncate(description, MAX_DESCRIPTION_LENGTH),
    context,
  });
}
