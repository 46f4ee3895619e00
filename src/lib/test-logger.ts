import { createLogger, type Logger } from "./logger.ts";

export type CapturedLogLine = {
  level: number;
  msg: string;
  [key: string]: unknown;
};

/** Logger that keeps every JSON line in memory, for assertions in tests. */
export function createCapturingLogger(level = "debug"): { logger: Logger; lines: CapturedLogLine[] } {
  const lines: CapturedLogLine[] = [];
  const logger = createLogger({
    level,
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg) as CapturedLogLine);
      },
    },
  });
  return { logger, lines };
}
