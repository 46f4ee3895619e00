import type { Logger } from "pino";
import { z } from "zod";
import { ReviewHostError } from "../lib/errors.ts";
import type { RawReviewRequest, ReviewHostClient } from "../reminder/types.ts";
import type { FetchImpl } from "../lib/fetch.ts";

interface CreateBitbucketClientInput {
  /** Bitbucket Server base URL, e.g. http://localhost:7990 */
  baseUrl: string;
  user: string;
  password: string;
  logger: Logger;
  fetchImpl?: FetchImpl;
}

// Only the fields the reminder reads; Bitbucket sends many more.
const reviewerSchema = z.object({
  user: z.object({
    emailAddress: z.string(),
  }),
  approved: z.boolean(),
});

const pullRequestSchema = z.object({
  id: z.number(),
  title: z.string(),
  updatedDate: z.number(),
  author: z.object({
    user: z.object({
      name: z.string(),
    }),
  }),
  reviewers: z.array(reviewerSchema),
});

const pullRequestPageSchema = z.object({
  size: z.number(),
  isLastPage: z.boolean().optional(),
  values: z.array(pullRequestSchema),
});

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function createBitbucketClient(input: CreateBitbucketClientInput): ReviewHostClient {
  const fetchImpl = input.fetchImpl ?? fetch;
  const baseUrl = trimTrailingSlash(input.baseUrl);
  const authorization = `Basic ${Buffer.from(`${input.user}:${input.password}`).toString("base64")}`;

  return {
    pullRequestUrl(repo: string, id: number): string {
      return `${baseUrl}/projects/${encodeURIComponent(repo)}/pull-requests/${id}`;
    },

    async listOpenPullRequests(repo: string): Promise<RawReviewRequest[]> {
      const url = `${baseUrl}/rest/api/1.0/projects/${encodeURIComponent(repo)}/pull-requests?state=OPEN`;
      const response = await fetchImpl(url, {
        method: "GET",
        headers: {
          authorization,
          accept: "application/json",
        },
      });

      if (!response.ok) {
        throw new ReviewHostError(
          `Bitbucket pull request query failed: ${response.status}`,
          response.status,
        );
      }

      const raw = await response.text();
      let body: unknown;
      try {
        body = JSON.parse(raw);
      } catch {
        throw new ReviewHostError(
          `Bitbucket returned non-JSON response: ${raw.slice(0, 200)}`,
          response.status,
        );
      }

      const parsed = pullRequestPageSchema.safeParse(body);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ");
        throw new ReviewHostError(`Unexpected Bitbucket response: ${issues}`, response.status);
      }

      const page = parsed.data;
      if (page.isLastPage === false) {
        input.logger.warn(
          { repo, size: page.size },
          "Bitbucket returned a partial page; only the first page is checked",
        );
      }

      return page.values.map((pullRequest) => ({
        id: pullRequest.id,
        title: pullRequest.title,
        author: pullRequest.author.user.name,
        updatedDate: pullRequest.updatedDate,
        reviewers: pullRequest.reviewers.map((reviewer) => ({
          email: reviewer.user.emailAddress,
          approved: reviewer.approved,
        })),
      }));
    },
  };
}
