/**
 * Error types for the reminder job.
 *
 * Every failure here is fatal for the run: the entry point logs it and exits
 * non-zero, and the external scheduler is expected to re-invoke the job.
 * Per-item problems (unknown reviewer email, blank CSV row) never reach this
 * module; they are dropped where they occur.
 */

/** Which collaborator a fatal error came from */
export type FailureSource = "review_host" | "slack" | "identity_directory" | "internal";

/** Raised when the review host answers with a non-2xx status or an unexpected body. */
export class ReviewHostError extends Error {
  readonly source = "review_host" as const;

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ReviewHostError";
  }
}

/** Raised when the Slack webhook does not answer 200. */
export class SlackDeliveryError extends Error {
  readonly source = "slack" as const;

  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "SlackDeliveryError";
  }
}

/** Raised when the identity CSV cannot be read or parsed. */
export class IdentityDirectoryError extends Error {
  readonly source = "identity_directory" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IdentityDirectoryError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyFailure(error: unknown): FailureSource {
  if (
    error instanceof ReviewHostError ||
    error instanceof SlackDeliveryError ||
    error instanceof IdentityDirectoryError
  ) {
    return error.source;
  }
  return "internal";
}
