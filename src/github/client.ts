/**
 * GitHub API surface used by the reporter
 *
 * Narrowed to the four calls apexcov makes so tests can pass an in-process
 * fake; an `Octokit` instance from @octokit/rest satisfies it via `.rest`.
 */

import { Octokit } from "@octokit/rest";

import { ConfigError } from "../lib/errors.js";

export interface IssueComment {
  id: number;
  body?: string | null;
}

export interface ReportingApi {
  issues: {
    listComments(params: {
      owner: string;
      repo: string;
      issue_number: number;
      per_page?: number;
      page?: number;
    }): Promise<{ data: IssueComment[] }>;
    createComment(params: {
      owner: string;
      repo: string;
      issue_number: number;
      body: string;
    }): Promise<{ data: { id: number } }>;
    updateComment(params: {
      owner: string;
      repo: string;
      comment_id: number;
      body: string;
    }): Promise<unknown>;
  };
  repos: {
    createCommitStatus(params: {
      owner: string;
      repo: string;
      sha: string;
      state: "error" | "failure" | "pending" | "success";
      description?: string;
      context?: string;
      target_url?: string;
    }): Promise<unknown>;
  };
}

export interface RepoRef {
  owner: string;
  repo: string;
}

export function createReportingApi(token: string, baseUrl?: string): ReportingApi {
  if (token.length === 0) {
    throw new ConfigError("GITHUB_TOKEN is not set.");
  }
  const octokit = new Octokit({ auth: token, ...(baseUrl !== undefined && { baseUrl }) });
  return octokit.rest;
}

/**
 * Parse `owner/repo`
 */
export function parseRepoRef(value: string): RepoRef {
  const [owner, repo, ...rest] = value.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigError(`Invalid repository "${value}". Expected owner/repo.`);
  }
  return { owner, repo };
}
