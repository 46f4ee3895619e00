/** One assigned reviewer on a pull request */
export type ReviewerEntry = {
  email: string;
  approved: boolean;
};

/** Open pull request as returned by the review host. Never mutated. */
export type RawReviewRequest = {
  id: number;
  title: string;
  /** Author display name */
  author: string;
  /** Last update, epoch milliseconds */
  updatedDate: number;
  reviewers: ReviewerEntry[];
};

/** Resolved summary of one pull request that warrants a reminder */
export type ReminderRecord = {
  author: string;
  url: string;
  /** Local time, `YYYY-MM-DD HH:MM` */
  lastUpdated: string;
  title: string;
  /** Resolved Slack handles in reviewer order, each prefixed with `@` */
  handles: string[];
  /** Handles in mention syntax, e.g. `<@alice>, <@bob>` */
  reviewers: string;
  /** Pending reviewers with no entry in the identity directory */
  unresolvedReviewers: number;
};

/** Slack legacy attachment for one reminder */
export type NotificationAttachment = {
  text: string;
  title: string;
  title_link: string;
};

/**
 * Decides whether a pull request still waits on review.
 * Returns the emails to remind, or null when nobody needs a reminder.
 */
export type ApprovalPolicy = (reviewers: readonly ReviewerEntry[]) => string[] | null;

export type ApprovalPolicyName = "any-approval" | "per-reviewer";

export interface ReviewHostClient {
  listOpenPullRequests(repo: string): Promise<RawReviewRequest[]>;
  pullRequestUrl(repo: string, id: number): string;
}

export type ReminderMessage = {
  channel: string;
  attachments: NotificationAttachment[];
};

export interface ReminderNotifier {
  postReminder(message: ReminderMessage): Promise<void>;
}
