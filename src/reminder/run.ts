import type { IdentityDirectory } from "../directory/identity-directory.ts";
import { createChildLogger, type Logger } from "../lib/logger.ts";
import { buildReminderPayload } from "../slack/webhook.ts";
import { formatAttachment } from "./format.ts";
import { summarizeReviewRequest } from "./summarizer.ts";
import type {
  ApprovalPolicy,
  NotificationAttachment,
  ReminderNotifier,
  ReviewHostClient,
} from "./types.ts";

export type ReminderSettings = {
  ignoreWords: readonly string[];
  staleAfterSeconds: number;
  approvalPolicy?: ApprovalPolicy;
};

export type ReminderRunOptions = {
  repo: string;
  channel: string;
  reviewHost: ReviewHostClient;
  notifier: ReminderNotifier;
  /** Called at most once per run, and only when there are open pull requests */
  loadDirectory: () => Promise<IdentityDirectory>;
  settings: ReminderSettings;
  logger: Logger;
  now?: () => Date;
  /** Log the Slack payload instead of posting it */
  dryRun?: boolean;
};

export type ReminderRunResult = {
  fetched: number;
  reminders: number;
  delivered: boolean;
};

/**
 * One reminder pass over a repository:
 *
 * 1. Fetches open pull requests from the review host
 * 2. Loads the identity directory (skipped when nothing is open)
 * 3. Summarizes each pull request in review-host order
 * 4. Posts every reminder as a single Slack message, or nothing when none qualify
 *
 * Any failure propagates and ends the run; there are no retries.
 */
export async function runReminder(options: ReminderRunOptions): Promise<ReminderRunResult> {
  const { repo, channel, reviewHost, notifier, settings } = options;
  const logger = createChildLogger(options.logger, { repo, channel });
  const now = (options.now ?? (() => new Date()))();

  const pullRequests = await reviewHost.listOpenPullRequests(repo);
  logger.info(
    { count: pullRequests.length, pullRequestIds: pullRequests.map((pr) => pr.id) },
    "Fetched open pull requests",
  );

  if (pullRequests.length === 0) {
    return { fetched: 0, reminders: 0, delivered: false };
  }

  const directory = await options.loadDirectory();
  logger.debug(
    { identities: directory.size(), duplicates: directory.duplicates() },
    "Identity directory loaded",
  );

  const attachments: NotificationAttachment[] = [];
  for (const pullRequest of pullRequests) {
    const record = summarizeReviewRequest(pullRequest, {
      directory,
      ignoreWords: settings.ignoreWords,
      now,
      staleAfterSeconds: settings.staleAfterSeconds,
      approvalPolicy: settings.approvalPolicy,
      pullRequestUrl: (id) => reviewHost.pullRequestUrl(repo, id),
      logger,
    });
    if (record) {
      attachments.push(formatAttachment(record));
    }
  }

  if (attachments.length === 0) {
    logger.info({ fetched: pullRequests.length }, "No pull requests need a reminder");
    return { fetched: pullRequests.length, reminders: 0, delivered: false };
  }

  const message = { channel, attachments };
  if (options.dryRun) {
    logger.info({ payload: buildReminderPayload(message) }, "Dry run, Slack message not sent");
    return { fetched: pullRequests.length, reminders: attachments.length, delivered: false };
  }

  logger.info({ attachments }, "Message is ready for Slack");
  await notifier.postReminder(message);
  logger.info({ reminders: attachments.length }, "Reminder delivered");

  return { fetched: pullRequests.length, reminders: attachments.length, delivered: true };
}
