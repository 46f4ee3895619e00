import { z } from "zod";

function required(name: string) {
  return z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);
}

const configSchema = z.object({
  slackWebhookUrl: required("SLACK_WEBHOOK_URL").pipe(
    z.string().url("SLACK_WEBHOOK_URL must be a URL"),
  ),
  bitbucketUser: required("BB_USER"),
  bitbucketPassword: required("BB_PASSWORD"),
  bitbucketBaseUrl: z.string().url("BB_BASE_URL must be a URL").default("http://localhost:7990"),
  defaultRepo: z.string().trim().default(""),
  defaultChannel: z.string().trim().default(""),
  ignoreWords: z
    .string()
    .default("")
    .transform((s) =>
      s
        .split(",")
        .map((word) => word.trim())
        .filter(Boolean),
    ),
  staleAfterSeconds: z.coerce
    .number()
    .int("STALE_AFTER_SECONDS must be a whole number")
    .nonnegative("STALE_AFTER_SECONDS must not be negative")
    .default(18_000),
  peopleCsvPath: z.string().min(1).default("people.csv"),
  approvalPolicy: z
    .enum(["any-approval", "per-reviewer"], {
      errorMap: () => ({ message: "APPROVAL_POLICY must be any-approval or per-reviewer" }),
    })
    .default("any-approval"),
  logFile: z.string().trim().default("pr.log"),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"], {
      errorMap: () => ({
        message: "LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent",
      }),
    })
    .default("info"),
});

export type AppConfig = z.infer<typeof configSchema>;

export type ConfigResult =
  | { success: true; config: AppConfig }
  | { success: false; issues: string[] };

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function parseConfig(env: NodeJS.ProcessEnv): ConfigResult {
  const result = configSchema.safeParse({
    slackWebhookUrl: env.SLACK_WEBHOOK_URL,
    bitbucketUser: env.BB_USER,
    bitbucketPassword: env.BB_PASSWORD,
    bitbucketBaseUrl: blankToUndefined(env.BB_BASE_URL),
    defaultRepo: env.REVIEW_REPO,
    defaultChannel: env.SLACK_CHANNEL,
    ignoreWords: env.IGNORE_WORDS,
    staleAfterSeconds: blankToUndefined(env.STALE_AFTER_SECONDS),
    peopleCsvPath: blankToUndefined(env.PEOPLE_CSV),
    approvalPolicy: blankToUndefined(env.APPROVAL_POLICY),
    logFile: env.LOG_FILE,
    logLevel: blankToUndefined(env.LOG_LEVEL),
  });

  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }

  return { success: true, config: result.data };
}
