import { SlackDeliveryError } from "../lib/errors.ts";
import type { NotificationAttachment, ReminderMessage, ReminderNotifier } from "../reminder/types.ts";
import type { FetchImpl } from "../lib/fetch.ts";

interface CreateSlackWebhookClientInput {
  webhookUrl: string;
  fetchImpl?: FetchImpl;
  /** No timeout unless set */
  timeoutMs?: number;
}

export const REMINDER_USERNAME = "Pull Request Reminder";
export const REMINDER_ICON = ":bell:";
export const REMINDER_INTRO =
  "Hi! There's a few open pull requests waiting for your review.\nYou should take a look at:";

export type SlackReminderPayload = {
  channel: string;
  username: string;
  icon_emoji: string;
  text: string;
  attachments: NotificationAttachment[];
};

export function buildReminderPayload(message: ReminderMessage): SlackReminderPayload {
  return {
    channel: message.channel,
    username: REMINDER_USERNAME,
    icon_emoji: REMINDER_ICON,
    text: REMINDER_INTRO,
    attachments: message.attachments,
  };
}

export function createSlackWebhookClient(input: CreateSlackWebhookClientInput): ReminderNotifier {
  const fetchImpl = input.fetchImpl ?? fetch;

  return {
    async postReminder(message: ReminderMessage): Promise<void> {
      const response = await fetchImpl(input.webhookUrl, {
        method: "POST",
        headers: {
          "content-type": "application/json; charset=utf-8",
        },
        body: JSON.stringify(buildReminderPayload(message)),
        signal: input.timeoutMs === undefined ? undefined : AbortSignal.timeout(input.timeoutMs),
      });

      // drain the body so the connection is released
      const raw = await response.text();
      if (response.status !== 200) {
        throw new SlackDeliveryError(
          `Error sending Slack message: ${response.status} ${raw.slice(0, 200)}`.trimEnd(),
          response.status,
        );
      }
    },
  };
}
