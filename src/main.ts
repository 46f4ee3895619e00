import { resolve } from "node:path";
import type { DestinationStream } from "pino";
import { createBitbucketClient } from "./bitbucket/client.ts";
import { USAGE, parseCliArgs, type CliOptions } from "./cli.ts";
import { parseConfig } from "./config.ts";
import { loadIdentityDirectory } from "./directory/identity-directory.ts";
import { classifyFailure, errorMessage } from "./lib/errors.ts";
import { createLogger, type Logger } from "./lib/logger.ts";
import { resolveApprovalPolicy } from "./reminder/approval.ts";
import { runReminder } from "./reminder/run.ts";
import { createSlackWebhookClient } from "./slack/webhook.ts";
import type { FetchImpl } from "./lib/fetch.ts";

export type MainInput = {
  argv: string[];
  env: NodeJS.ProcessEnv;
  cwd?: string;
  fetchImpl?: FetchImpl;
  now?: () => Date;
  /** Overrides LOG_FILE */
  logDestination?: DestinationStream;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
};

/** Runs the job once and returns the process exit code. */
export async function main(input: MainInput): Promise<number> {
  const stdout = input.stdout ?? ((line: string) => console.log(line));
  const stderr = input.stderr ?? ((line: string) => console.error(line));
  const cwd = input.cwd ?? process.cwd();

  let cli: CliOptions;
  try {
    cli = parseCliArgs(input.argv);
  } catch (err) {
    stderr(`FATAL: ${errorMessage(err)}`);
    stderr(USAGE);
    return 1;
  }

  if (cli.help) {
    stdout(USAGE);
    return 0;
  }

  const configResult = parseConfig(input.env);
  if (!configResult.success) {
    stderr("FATAL: Invalid configuration:");
    for (const issue of configResult.issues) {
      stderr(`  ${issue}`);
    }
    return 1;
  }
  const config = configResult.config;
  const repo = cli.repo || config.defaultRepo;
  const channel = cli.channel || config.defaultChannel;

  if (!repo) {
    stderr("FATAL: Invalid configuration:");
    stderr("  repo: pass --repo or set REVIEW_REPO");
    return 1;
  }

  const logFile = config.logFile ? resolve(cwd, config.logFile) : undefined;
  let logger: Logger;
  try {
    logger = createLogger({
      level: config.logLevel,
      logFile,
      destination: input.logDestination,
    });
  } catch (err) {
    stderr(`FATAL: Cannot open log file "${logFile ?? "stdout"}": ${errorMessage(err)}`);
    return 1;
  }

  const reviewHost = createBitbucketClient({
    baseUrl: config.bitbucketBaseUrl,
    user: config.bitbucketUser,
    password: config.bitbucketPassword,
    logger,
    fetchImpl: input.fetchImpl,
  });
  const notifier = createSlackWebhookClient({
    webhookUrl: config.slackWebhookUrl,
    fetchImpl: input.fetchImpl,
  });

  try {
    const result = await runReminder({
      repo,
      channel,
      reviewHost,
      notifier,
      loadDirectory: () => loadIdentityDirectory(resolve(cwd, config.peopleCsvPath)),
      settings: {
        ignoreWords: config.ignoreWords,
        staleAfterSeconds: config.staleAfterSeconds,
        approvalPolicy: resolveApprovalPolicy(config.approvalPolicy),
      },
      logger,
      now: input.now,
      dryRun: cli.dryRun,
    });
    logger.info(result, "Reminder run complete");
    return 0;
  } catch (err) {
    logger.error({ err, source: classifyFailure(err) }, "Reminder run failed");
    stderr(`FATAL: ${errorMessage(err)}`);
    return 1;
  }
}
