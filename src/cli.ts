import { parseArgs } from "node:util";

export const USAGE = `Usage: npm start -- [options]

Posts a Slack reminder for open pull requests that still wait on review.

Options:
  -c, --channel <channel>  Slack channel (default: SLACK_CHANNEL)
  -r, --repo <project>     Bitbucket project to scan (default: REVIEW_REPO)
      --dry-run            Log the Slack message instead of sending it
  -h, --help               Show this help`;

export type CliOptions = {
  repo: string;
  channel: string;
  dryRun: boolean;
  help: boolean;
};

export function parseCliArgs(
  argv: string[],
  defaults: { repo: string; channel: string } = { repo: "", channel: "" },
): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      channel: { type: "string", short: "c" },
      repo: { type: "string", short: "r" },
      "dry-run": { type: "boolean", default: false },
      help: { type: "boolean", default: false, short: "h" },
    },
    strict: true,
  });

  return {
    repo: values.repo?.trim() || defaults.repo,
    channel: values.channel?.trim() || defaults.channel,
    dryRun: values["dry-run"] ?? false,
    help: values.help ?? false,
  };
}
