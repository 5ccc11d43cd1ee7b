/**
 * Reporting collaborator: sticky PR comment plus commit status
 */

import { ReportingError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";

import { upsertCoverageComment, DEFAULT_COMMENT_MARKER } from "./comment.js";
import { setCoverageStatus, DEFAULT_STATUS_CONTEXT } from "./status.js";

import type { RepoRef, ReportingApi } from "./client.js";
import type { CommentResult } from "./comment.js";
import type { CommitState } from "./status.js";
import type { Result } from "../lib/result.js";

export interface ReportTarget {
  repo: RepoRef;
  prNumber: number;
  /** Head commit receiving the status */
  sha: string;
}

export interface ReportPayload {
  /** Markdown comment body */
  body: string;
  state: CommitState;
  description: string;
  marker?: string;
  statusContext?: string;
}

export interface ReportOutcome {
  comment: CommentResult;
  state: CommitState;
}

const log = logger.child("GitHub");

export async function publishReport(
  api: ReportingApi,
  target: ReportTarget,
  payload: ReportPayload
): Promise<Result<ReportOutcome, ReportingError>> {
  const { repo, prNumber, sha } = target;
  const where = `${repo.owner}/${repo.repo}#${prNumber}`;

  let comment: CommentResult;
  try {
    comment = await upsertCoverageComment(
      api,
      repo,
      prNumber,
      payload.body,
      payload.marker ?? DEFAULT_COMMENT_MARKER
    );
    log.info(`${comment.action === "created" ? "Created" : "Updated"} comment ${comment.commentId} on ${where}`);
  } catch (error) {
    return err(new ReportingError(`Could not upsert comment on ${where}: ${errorMessage(error)}`, { prNumber }));
  }

  try {
    await setCoverageStatus(
      api,
      repo,
      sha,
      payload.state,
      payload.description,
      payload.statusContext ?? DEFAULT_STATUS_CONTEXT
    );
    log.info(`Set ${payload.state} status on ${sha.slice(0, 7)}`);
  } catch (error) {
    return err(new ReportingError(`Could not set commit status on ${sha}: ${errorMessage(error)}`, { sha }));
  }

  return ok({ comment, state: payload.state });
}
