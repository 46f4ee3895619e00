import { describe, expect, test } from "vitest";
import { createIdentityDirectory } from "../directory/identity-directory.ts";
import { createCapturingLogger } from "../lib/test-logger.ts";
import { unapprovedReviewersOnly } from "./approval.ts";
import { summarizeReviewRequest, type SummarizeContext } from "./summarizer.ts";
import type { RawReviewRequest } from "./types.ts";

const UPDATED = new Date(2026, 9, 18, 6, 0).getTime();
const SIX_HOURS_LATER = new Date(UPDATED + 6 * 60 * 60 * 1000);

function makeRequest(overrides: Partial<RawReviewRequest> = {}): RawReviewRequest {
  return {
    id: 42,
    title: "Add feature",
    author: "Alice Author",
    updatedDate: UPDATED,
    reviewers: [{ email: "a@x.com", approved: false }],
    ...overrides,
  };
}

function makeContext(overrides: Partial<SummarizeContext> = {}) {
  const { logger, lines } = createCapturingLogger();
  const context: SummarizeContext = {
    directory: createIdentityDirectory([
      { email: "a@x.com", slack: "alice" },
      { email: "b@x.com", slack: "bob" },
    ]),
    ignoreWords: [],
    now: SIX_HOURS_LATER,
    staleAfterSeconds: 18_000,
    pullRequestUrl: (id) => `http://localhost:7990/projects/PROJ/pull-requests/${id}`,
    logger,
    ...overrides,
  };
  return { context, lines };
}

describe("summarizeReviewRequest", () => {
  test("stale unapproved request produces a reminder", () => {
    const { context } = makeContext();

    expect(summarizeReviewRequest(makeRequest(), context)).toEqual({
      author: "Alice Author",
      url: "http://localhost:7990/projects/PROJ/pull-requests/42",
      lastUpdated: "2026-10-18 06:00",
      title: "Add feature",
      handles: ["@alice"],
      reviewers: "<@alice>",
      unresolvedReviewers: 0,
    });
  });

  test("any approval means no reminder", () => {
    const { context } = makeContext();
    const request = makeRequest({
      reviewers: [
        { email: "a@x.com", approved: false },
        { email: "b@x.com", approved: true },
      ],
    });

    expect(summarizeReviewRequest(request, context)).toBeNull();
  });

  test("request without reviewers is skipped before title and staleness", () => {
    const { context, lines } = makeContext({ ignoreWords: ["draft"] });
    const request = makeRequest({ reviewers: [], title: "DRAFT: new api" });

    expect(summarizeReviewRequest(request, context)).toBeNull();
    expect(lines).toEqual([]);
  });

  test("ignored title means no reminder and logs the matched words", () => {
    const { context, lines } = makeContext({ ignoreWords: ["wip", "draft"] });
    const request = makeRequest({ title: "DRAFT: new api" });

    expect(summarizeReviewRequest(request, context)).toBeNull();

    const entry = lines.find((line) => line.msg === "Pull request title includes ignore words");
    expect(entry?.pullRequestId).toBe(42);
    expect(entry?.matched).toEqual(["draft"]);
  });

  test("recently updated request means no reminder", () => {
    const { context, lines } = makeContext({ now: new Date(UPDATED + 60_000) });

    expect(summarizeReviewRequest(makeRequest(), context)).toBeNull();

    const entry = lines.find((line) => line.msg === "Pull request was updated recently");
    expect(entry?.elapsedSeconds).toBe(60);
  });

  test("request updated exactly at the threshold is not reminded", () => {
    const { context } = makeContext({ now: new Date(UPDATED + 18_000 * 1000) });
    expect(summarizeReviewRequest(makeRequest(), context)).toBeNull();
  });

  test("unknown reviewers are dropped and counted", () => {
    const { context, lines } = makeContext();
    const request = makeRequest({
      reviewers: [
        { email: "b@x.com", approved: false },
        { email: "ghost@x.com", approved: false },
        { email: "a@x.com", approved: false },
      ],
    });

    const record = summarizeReviewRequest(request, context);

    expect(record?.handles).toEqual(["@bob", "@alice"]);
    expect(record?.reviewers).toBe("<@bob>, <@alice>");
    expect(record?.unresolvedReviewers).toBe(1);

    const entry = lines.find((line) => line.msg === "Dropped reviewers with no Slack handle");
    expect(entry?.unresolvedCount).toBe(1);
    expect(entry?.unresolved).toEqual(["ghost@x.com"]);
  });

  test("reminder is still produced when no reviewer resolves", () => {
    const { context } = makeContext({ directory: createIdentityDirectory([]) });

    const record = summarizeReviewRequest(makeRequest(), context);

    expect(record?.reviewers).toBe("");
    expect(record?.handles).toEqual([]);
    expect(record?.unresolvedReviewers).toBe(1);
  });

  test("email lookup does not normalize case", () => {
    const { context } = makeContext();
    const request = makeRequest({ reviewers: [{ email: "A@X.com", approved: false }] });

    expect(summarizeReviewRequest(request, context)?.reviewers).toBe("");
  });

  test("per-reviewer policy reminds only reviewers who have not approved", () => {
    const { context } = makeContext({ approvalPolicy: unapprovedReviewersOnly });
    const request = makeRequest({
      reviewers: [
        { email: "a@x.com", approved: true },
        { email: "b@x.com", approved: false },
      ],
    });

    expect(summarizeReviewRequest(request, context)?.reviewers).toBe("<@bob>");
  });
});
