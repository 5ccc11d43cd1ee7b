/**
 * GitHub reporting module
 */

export {
  createReportingApi,
  parseRepoRef,
  type ReportingApi,
  type RepoRef,
  type IssueComment,
} from "./client.js";

export {
  upsertCoverageComment,
  findMarkedComment,
  DEFAULT_COMMENT_MARKER,
  type CommentResult,
} from "./comment.js";

export {
  setCoverageStatus,
  commitStateFor,
  statusDescription,
  DEFAULT_STATUS_CONTEXT,
  type CommitState,
} from "./status.js";

export {
  publishReport,
  type ReportTarget,
  type ReportPayload,
  type ReportOutcome,
} from "./reporter.js";
