import type { NotificationAttachment, ReminderRecord } from "./types.ts";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local-time `YYYY-MM-DD HH:MM` */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/** `["@alice", "@bob"]` becomes `<@alice>, <@bob>` */
export function formatMentions(handles: readonly string[]): string {
  return handles.map((handle) => `<${handle}>`).join(", ");
}

export function formatAttachment(record: ReminderRecord): NotificationAttachment {
  return {
    text: `Reviewers: ${record.reviewers}\nAuthor: ${record.author}\nLastUpdated: ${record.lastUpdated}`,
    title: record.title,
    title_link: record.url,
  };
}
