import type { IssueComment, RepoRef, ReportingApi } from "./client.js";

export const DEFAULT_COMMENT_MARKER = "<!-- apexcov:coverage-report -->";

const PAGE_SIZE = 100;

export interface CommentResult {
  action: "created" | "updated";
  commentId: number;
}

/**
 * Find the PR comment carrying `marker`, paging through all comments
 */
export async function findMarkedComment(
  api: ReportingApi,
  repo: RepoRef,
  prNumber: number,
  marker: string
): Promise<IssueComment | undefined> {
  for (let page = 1; ; page++) {
    const { data } = await api.issues.listComments({
      ...repo,
      issue_number: prNumber,
      per_page: PAGE_SIZE,
      page,
    });

    const match = data.find((c) => c.body?.includes(marker));
    if (match) return match;
    if (data.length < PAGE_SIZE) return undefined;
  }
}

/**
 * Update the marked comment in place, or create it.
 * The body gets the marker prepended when it does not already carry it.
 */
export async function upsertCoverageComment(
  api: ReportingApi,
  repo: RepoRef,
  prNumber: number,
  body: string,
  marker: string = DEFAULT_COMMENT_MARKER
): Promise<CommentResult> {
  const commentBody = body.includes(marker) ? body : `${marker}\n${body}`;
  const existing = await findMarkedComment(api, repo, prNumber, marker);

  if (existing) {
    await api.issues.updateComment({ ...repo, comment_id: existing.id, body: commentBody });
    return { action: "updated", commentId: existing.id };
  }

  const { data } = await api.issues.createComment({
    ...repo,
    issue_number: prNumber,
    body: commentBody,
  });
  return { action: "created", commentId: data.id };
}
