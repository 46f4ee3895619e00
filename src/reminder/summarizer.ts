import type { Logger } from "pino";
import type { IdentityDirectory } from "../directory/identity-directory.ts";
import { pendingReviewers } from "./approval.ts";
import { formatLocalTimestamp, formatMentions } from "./format.ts";
import { elapsedSeconds, isStale } from "./staleness.ts";
import { isAllowedTitle, matchedIgnoreWords } from "./title-filter.ts";
import type { ApprovalPolicy, RawReviewRequest, ReminderRecord } from "./types.ts";

export type SummarizeContext = {
  directory: IdentityDirectory;
  ignoreWords: readonly string[];
  now: Date;
  staleAfterSeconds: number;
  approvalPolicy?: ApprovalPolicy;
  pullRequestUrl: (id: number) => string;
  logger: Logger;
};

/**
 * Turn one open pull request into a reminder, or null when it needs none.
 *
 * The checks short-circuit in a fixed order: approval state first, then the
 * title, then staleness. A settled pull request is dropped without evaluating
 * (or logging) the other two.
 */
export function summarizeReviewRequest(
  request: RawReviewRequest,
  context: SummarizeContext,
): ReminderRecord | null {
  const { directory, ignoreWords, now, staleAfterSeconds, logger } = context;

  const pending = pendingReviewers(request.reviewers, context.approvalPolicy);
  if (!pending) return null;

  const handles: string[] = [];
  const unresolved: string[] = [];
  for (const email of pending) {
    const slack = directory.resolve(email);
    if (slack === undefined) {
      unresolved.push(email);
    } else {
      handles.push(`@${slack}`);
    }
  }

  if (unresolved.length > 0) {
    logger.debug(
      { pullRequestId: request.id, unresolvedCount: unresolved.length, unresolved },
      "Dropped reviewers with no Slack handle",
    );
  }

  if (!isAllowedTitle(request.title, ignoreWords)) {
    logger.info(
      {
        pullRequestId: request.id,
        title: request.title,
        matched: matchedIgnoreWords(request.title, ignoreWords),
      },
      "Pull request title includes ignore words",
    );
    return null;
  }

  const elapsed = elapsedSeconds(request.updatedDate, now);
  if (!isStale(request.updatedDate, now, staleAfterSeconds)) {
    logger.info(
      { pullRequestId: request.id, elapsedSeconds: elapsed },
      "Pull request was updated recently",
    );
    return null;
  }

  logger.info({ pullRequestId: request.id, elapsedSeconds: elapsed }, "Pull request is stale");

  return {
    author: request.author,
    url: context.pullRequestUrl(request.id),
    lastUpdated: formatLocalTimestamp(new Date(request.updatedDate)),
    title: request.title,
    handles,
    reviewers: formatMentions(handles),
    unresolvedReviewers: unresolved.length,
  };
}
