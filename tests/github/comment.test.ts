import { describe, it, expect, beforeEach } from "vitest";

import { DEFAULT_COMMENT_MARKER, findMarkedComment, upsertCoverageComment } from "@/github/comment.js";

import { FakeGitHub } from "../fixtures/github.js";

const repo = { owner: "acme", repo: "force-app" };

describe("upsertCoverageComment", () => {
  let github: FakeGitHub;

  beforeEach(() => {
    github = new FakeGitHub();
  });

  it("creates the comment with the marker prepended", async () => {
    const result = await upsertCoverageComment(github.api, repo, 7, "## Apex Test Coverage");

    expect(result).toEqual({ action: "created", commentId: 1000 });
    expect(github.comments).toEqual([
      { id: 1000, body: `${DEFAULT_COMMENT_MARKER}\n## Apex Test Coverage` },
    ]);
  });

  it("does not prepend a marker the body already carries", async () => {
    const body = `${DEFAULT_COMMENT_MARKER}\n## Apex Test Coverage`;

    await upsertCoverageComment(github.api, repo, 7, body);

    expect(github.comments[0]?.body).toBe(body);
  });

  it("updates the marked comment in place", async () => {
    github.seedComments(2);
    await upsertCoverageComment(github.api, repo, 7, "first run");

    const result = await upsertCoverageComment(github.api, repo, 7, "second run");

    expect(result).toEqual({ action: "updated", commentId: 1000 });
    expect(github.comments).toHaveLength(3);
    expect(github.comments[2]?.body).toBe(`${DEFAULT_COMMENT_MARKER}\nsecond run`);
  });

  it("keeps separate comments for separate markers", async () => {
    await upsertCoverageComment(github.api, repo, 7, "a", "<!-- one -->");
    await upsertCoverageComment(github.api, repo, 7, "b", "<!-- two -->");

    expect(github.comments.map((c) => c.body)).toEqual(["<!-- one -->\na", "<!-- two -->\nb"]);
  });
});

describe("findMarkedComment", () => {
  it("pages past the first hundred comments", async () => {
    const github = new FakeGitHub();
    github.seedComments(150);
    github.comments.push({ id: 999, body: `${DEFAULT_COMMENT_MARKER}\nold report` });

    const found = await findMarkedComment(github.api, repo, 7, DEFAULT_COMMENT_MARKER);

    expect(found?.id).toBe(999);
    expect(github.listCalls).toEqual([1, 2]);
  });

  it("stops at the first short page", async () => {
    const github = new FakeGitHub();
    github.seedComments(100);

    const found = await findMarkedComment(github.api, repo, 7, DEFAULT_COMMENT_MARKER);

    expect(found).toBeUndefined();
    expect(github.listCalls).toEqual([1, 2]);
  });

  it("skips comments without a body", async () => {
    const github = new FakeGitHub();
    github.comments.push({ id: 1, body: null }, { id: 2 });

    expect(await findMarkedComment(github.api, repo, 7, DEFAULT_COMMENT_MARKER)).toBeUndefined();
  });
});
