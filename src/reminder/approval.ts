import type { ApprovalPolicy, ApprovalPolicyName, ReviewerEntry } from "./types.ts";

/**
 * A single approval settles the whole pull request: nobody is reminded once
 * any reviewer has approved, however many others have not acted yet.
 */
export const anyApprovalSilencesAll: ApprovalPolicy = (reviewers) => {
  if (reviewers.length === 0) return null;

  const emails: string[] = [];
  for (const reviewer of reviewers) {
    if (reviewer.approved) return null;
    emails.push(reviewer.email);
  }
  return emails;
};

/** Reminds only the reviewers who have not approved yet. */
export const unapprovedReviewersOnly: ApprovalPolicy = (reviewers) => {
  const emails = reviewers
    .filter((reviewer) => !reviewer.approved)
    .map((reviewer) => reviewer.email);
  return emails.length > 0 ? emails : null;
};

const POLICIES: Record<ApprovalPolicyName, ApprovalPolicy> = {
  "any-approval": anyApprovalSilencesAll,
  "per-reviewer": unapprovedReviewersOnly,
};

export function resolveApprovalPolicy(name: ApprovalPolicyName): ApprovalPolicy {
  return POLICIES[name];
}

/**
 * Emails of reviewers who still need a reminder, in reviewer order, or null
 * when the pull request is settled. An empty reviewer list counts as settled.
 */
export function pendingReviewers(
  reviewers: readonly ReviewerEntry[],
  policy: ApprovalPolicy = anyApprovalSilencesAll,
): string[] | null {
  return policy(reviewers);
}
